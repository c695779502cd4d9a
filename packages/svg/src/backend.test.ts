import { describe, it, expect, vi } from 'vitest';
import {
  Image,
  Points,
  Scene,
  Transform,
  View,
  summarizeReport,
  treeDict,
  type Logger,
  type SyncReport,
} from '@scenesync/core';
import { SvgImageAdaptor } from './adaptors/image';
import { createSvgRegistry, nativeTreeDict, renderToSvg } from './backend';

function mockLogger(): Logger {
  return { debug: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

function basicView() {
  const first = new Image({ data: [[0, 1], [2, 3]] });
  const second = new Image({
    data: [[1, 1], [1, 1]],
    transform: Transform.translation([2, 0]),
  });
  const points = new Points({ coords: [[0, 0], [1, 1]] });
  const view = new View({
    scene: new Scene({ children: [first, second, points] }),
  });
  return { view, first, second, points };
}

describe('SVG backend', () => {
  it('should mirror the model tree in the native tree', () => {
    const { view } = basicView();
    const registry = createSvgRegistry({ logger: mockLogger() });

    registry.show(view);
    const native = registry.getAdaptor(view.scene).getNative();

    expect(nativeTreeDict(native)).toEqual(treeDict(view.scene));
    expect(nativeTreeDict(native).children.map((c) => c.name)).toEqual([
      'Image',
      'Image',
      'Points',
      'Camera',
    ]);
  });

  it('should follow re-parenting', () => {
    const { view, first, points } = basicView();
    const registry = createSvgRegistry({ logger: mockLogger() });
    registry.show(view);

    points.parent = first;

    const native = registry.getAdaptor(view.scene).getNative();
    expect(nativeTreeDict(native)).toEqual(treeDict(view.scene));
    expect(registry.getAdaptor(points).getNative().parent).toBe(
      registry.getAdaptor(first).getNative()
    );
  });

  it('should move an image between scenes', () => {
    const image = new Image({ data: [[1]] });
    const one = new View({ scene: new Scene({ children: [image] }) });
    const two = new View();
    const registry = createSvgRegistry({ logger: mockLogger() });
    registry.show(one);
    registry.show(two);

    two.scene.addChild(image);

    const imageCount = (view: View) =>
      registry
        .getAdaptor(view.scene)
        .getNative()
        .findAll((el) => el.getAttr('data-kind') === 'image').length;
    expect(imageCount(one)).toBe(0);
    expect(imageCount(two)).toBe(1);
  });

  it('should write transforms as SVG matrices', () => {
    const { view, second } = basicView();
    const registry = createSvgRegistry({ logger: mockLogger() });
    registry.show(view);

    const native = registry.getAdaptor(second).getNative();
    expect(native.getAttr('transform')).toBe('matrix(1 0 0 1 2 0)');

    second.transform = Transform.identity();
    expect(native.getAttr('transform')).toBeNull();
  });

  it('should colour pixels through clims and the colormap', () => {
    const { view, first } = basicView();
    const registry = createSvgRegistry({ logger: mockLogger() });
    registry.show(view);
    const native = registry.getAdaptor(first).getNative();
    const fills = () =>
      native.findAll((el) => el.tag === 'rect').map((el) => el.getAttr('fill'));

    expect(fills()).toEqual(['#000000', '#555555', '#aaaaaa', '#ffffff']);

    first.clims = [0, 4];
    expect(fills()).toEqual(['#000000', '#404040', '#808080', '#bfbfbf']);
  });

  it('should redraw once per batch', () => {
    const { view, first } = basicView();
    const registry = createSvgRegistry({ logger: mockLogger() });
    registry.show(view);
    const adaptor = registry.getAdaptor(first);
    if (!(adaptor instanceof SvgImageAdaptor)) {
      throw new Error('expected an SvgImageAdaptor');
    }
    const before = adaptor.redrawCount;

    first.batch(() => {
      first.gamma = 2;
      first.cmap = 'viridis';
      first.clims = [0, 4];
    });
    expect(adaptor.redrawCount).toBe(before + 1);

    first.gamma = 3;
    expect(adaptor.redrawCount).toBe(before + 2);
  });

  it('should fall back to linear for bicubic interpolation', () => {
    const { view, first } = basicView();
    const logger = mockLogger();
    const registry = createSvgRegistry({ logger });
    registry.show(view);

    first.interpolation = 'bicubic';

    expect(logger.warn).toHaveBeenCalledWith(
      'SvgImageAdaptor.setInterpolation: bicubic is not available, using linear'
    );
    const content = registry
      .getAdaptor(first)
      .getNative()
      .find((el) => el.getAttr('data-role') === 'content');
    expect(content?.getAttr('shape-rendering')).toBeNull();
  });

  it('should report volumes as unsupported', () => {
    const volume = new Image({ data: [[[0]], [[1]]] });
    const view = new View({ scene: new Scene({ children: [volume] }) });
    const reports: SyncReport[] = [];
    const registry = createSvgRegistry({
      logger: mockLogger(),
      onReport: (r) => reports.push(r),
    });

    registry.show(view);

    const report = reports.find((r) => r.modelId === volume.modelId);
    expect(report && summarizeReport(report)).toEqual({
      applied: 12,
      unsupported: 1,
      failed: 0,
    });
  });

  it('should drop perspective cameras with a warning', () => {
    const { view } = basicView();
    const logger = mockLogger();
    const registry = createSvgRegistry({ logger });
    registry.show(view);

    view.camera.type = 'perspective';

    expect(view.camera.type).toBe('perspective');
    expect(logger.warn).toHaveBeenCalledWith(
      `AdaptorRegistry: dropped camera #${view.camera.modelId}.type: unsupported capability "camera.type": perspective cameras cannot be drawn as SVG`
    );
  });

  it('should drop marker symbols it cannot draw', () => {
    const { view, points } = basicView();
    const logger = mockLogger();
    const registry = createSvgRegistry({ logger });
    registry.show(view);
    const native = registry.getAdaptor(points).getNative();

    expect(native.findAll((el) => el.tag === 'circle')).toHaveLength(2);

    points.symbol = 'arrow';
    expect(logger.warn).toHaveBeenCalledTimes(1);
    expect(native.findAll((el) => el.tag === 'circle')).toHaveLength(2);

    points.symbol = 'square';
    expect(native.findAll((el) => el.tag === 'rect')).toHaveLength(2);
  });
});

describe('renderToSvg', () => {
  it('should fit the camera to the scene and write the centre back', () => {
    // 1. Build a 4x2 image
    const image = new Image({ data: [[0, 1, 2, 3], [4, 5, 6, 7]] });
    const view = new View({ scene: new Scene({ children: [image] }) });
    const registry = createSvgRegistry({ logger: mockLogger() });

    // 2. Render
    const markup = renderToSvg(view, registry);

    // 3. Inspect
    expect(view.camera.center).toEqual([2, 1, 0]);
    const viewport = registry
      .getAdaptor(view.canvas)
      .getNative()
      .find((el) => el.getAttr('data-role') === 'viewport');
    expect(viewport?.getAttr('viewBox')).toBe('-0.2 -1.2 4.4 4.4');
    expect(markup).toMatch(
      /^<svg xmlns="http:\/\/www\.w3\.org\/2000\/svg" data-id="\d+" width="500" height="500" viewBox="0 0 500 500"><title>scenesync<\/title><svg data-kind="view"/
    );
  });

  it('should keep a centre set after the fit until the range changes', () => {
    const image = new Image({ data: [[0, 1, 2, 3], [4, 5, 6, 7]] });
    const view = new View({ scene: new Scene({ children: [image] }) });
    const registry = createSvgRegistry({ logger: mockLogger() });
    renderToSvg(view, registry);
    const viewport = registry
      .getAdaptor(view.canvas)
      .getNative()
      .find((el) => el.getAttr('data-role') === 'viewport');

    view.camera.center = [100, 100, 0];
    registry.render(view.canvas);

    expect(view.camera.center).toEqual([100, 100, 0]);
    expect(viewport?.getAttr('viewBox')).toBe('97.8 97.8 4.4 4.4');

    view.camera.range = 0.2;
    expect(view.camera.center).toEqual([2, 1, 0]);
  });

  it('should place views by their layout', () => {
    const view = new View({
      layout: { position: [10, 20], size: [100, 50], margin: 5, padding: 2 },
    });
    const registry = createSvgRegistry({ logger: mockLogger() });
    renderToSvg(view, registry);

    const native = registry.getAdaptor(view).getNative();
    expect(native.getAttr('x')).toBe(15);
    expect(native.getAttr('y')).toBe(25);
    expect(native.getAttr('width')).toBe(90);
    expect(native.getAttr('height')).toBe(40);
    const viewport = native.find((el) => el.getAttr('data-role') === 'viewport');
    expect(viewport?.getAttr('width')).toBe(86);
    expect(viewport?.getAttr('height')).toBe(36);
  });

  it('should refuse to render a closed canvas', () => {
    const { view } = basicView();
    const registry = createSvgRegistry({ logger: mockLogger() });
    registry.show(view);

    registry.getAdaptor(view.canvas).close();

    expect(() => registry.render(view.canvas)).toThrow(
      'SvgCanvasAdaptor.render: canvas has been closed'
    );
  });
});
