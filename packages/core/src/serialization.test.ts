import { describe, it, expect } from 'vitest';
import { SerializationError } from './errors';
import { Canvas } from './model/canvas';
import { Image } from './model/image';
import { Points } from './model/points';
import { Scene } from './model/scene';
import { View } from './model/view';
import {
  deserializeCanvas,
  deserializeNode,
  deserializeView,
  serializeCanvas,
  serializeNode,
  serializeView,
} from './serialization';
import { Transform } from './transform';
import { treeRepr } from './util';

describe('Serialization and Deserialization', () => {
  it('omits default values when asked to', () => {
    const points = new Points({ coords: [[1, 2]], size: 4 });
    expect(serializeNode(points, { excludeDefaults: true })).toEqual({
      nodeType: 'points',
      coords: [[1, 2]],
      size: 4,
    });
  });

  it('writes every field by default, but never the parent', () => {
    const scene = new Scene({ name: 'root' });
    new Points({ parent: scene });

    const serialized = serializeNode(scene);

    expect(serialized).toEqual({
      nodeType: 'scene',
      name: 'root',
      visible: true,
      interactive: false,
      opacity: 1,
      order: 0,
      transform: Transform.identity().toJSON(),
      children: [expect.objectContaining({ nodeType: 'points', size: 10 })],
    });
    expect('parent' in serialized).toBe(false);
  });

  it('rebuilds a node tree with its parent links', () => {
    // 1. Build a small tree
    const scene = new Scene();
    const image = new Image({
      data: [
        [0, 1],
        [2, 3],
      ],
      clims: [0, 10],
      transform: Transform.translation([5, 5, 0]),
      parent: scene,
    });
    new Points({ coords: [[1, 1, 1]], symbol: 'star', parent: image });

    // 2. Round-trip through JSON text
    const json = JSON.stringify(serializeNode(scene, { excludeDefaults: true }));
    const restored = deserializeNode(JSON.parse(json));

    // 3. Same shape, same values
    expect(treeRepr(restored)).toBe(treeRepr(scene));
    const restoredImage = restored.children[0];
    if (restoredImage.kind !== 'image') throw new Error('expected an image');
    expect(restoredImage.clims).toEqual([0, 10]);
    expect(restoredImage.transform.equals(image.transform)).toBe(true);
    const restoredPoints = restoredImage.children[0];
    expect(restoredPoints.parent).toBe(restoredImage);
    if (restoredPoints.kind !== 'points') throw new Error('expected points');
    expect(restoredPoints.symbol).toBe('star');
  });

  it('rejects payloads without a known nodeType', () => {
    expect(() => deserializeNode({ name: 'x' })).toThrow(SerializationError);
    expect(() => deserializeNode({ nodeType: 'mesh' })).toThrow(
      'deserializeNode: invalid payload'
    );
  });

  it('reports field values the model refuses', () => {
    expect(() => deserializeNode({ nodeType: 'points', opacity: 5 })).toThrow(
      SerializationError
    );
    expect(() => deserializeNode({ nodeType: 'points', opacity: 5 })).toThrow(
      'deserializeNode: Points.opacity'
    );
  });

  it('writes the view camera once and re-attaches it on load', () => {
    const view = new View({ blending: 'additive' });
    new Image({ data: [[1]], parent: view.scene });

    const serialized = serializeView(view, { excludeDefaults: true });

    expect(serialized.scene.children).toEqual([
      { nodeType: 'image', data: [[1]] },
    ]);
    expect(serialized.camera).toEqual({ nodeType: 'camera' });
    expect(serialized.blending).toBe('additive');

    const restored = deserializeView(serialized);
    expect(restored.camera.parent).toBe(restored.scene);
    expect(treeRepr(restored.scene)).toBe('Scene\n    ├── Image\n    └── Camera');
    expect(restored.blending).toBe('additive');
  });

  it('serializes an all-default view to its node types', () => {
    expect(serializeView(new View(), { excludeDefaults: true })).toEqual({
      scene: { nodeType: 'scene' },
      camera: { nodeType: 'camera' },
    });
  });

  it('round-trips a versioned canvas document', () => {
    const canvas = new Canvas({ width: 300, title: 'demo' });
    canvas.addView(new View({ layout: { position: [10, 0] } }));

    const doc = serializeCanvas(canvas, { excludeDefaults: true });
    expect(doc.version).toBe('scenesync/1');
    expect(doc.width).toBe(300);
    expect(doc.views[0].layout).toEqual({ position: [10, 0] });

    const restored = deserializeCanvas(JSON.parse(JSON.stringify(doc)));
    expect(restored.width).toBe(300);
    expect(restored.height).toBe(500);
    expect(restored.title).toBe('demo');
    expect(restored.views).toHaveLength(1);
    expect(restored.views[0].layout.position).toEqual([10, 0]);
    expect(restored.views[0].attachedCanvas).toBe(restored);
  });

  it('rejects unknown document versions', () => {
    const doc = { ...serializeCanvas(new Canvas()), version: 'scenesync/2' };
    expect(() => deserializeCanvas(doc)).toThrow(
      'deserializeCanvas: unsupported version "scenesync/2" (expected "scenesync/1")'
    );
    expect(() => deserializeCanvas({ views: [] })).toThrow(SerializationError);
  });
});
