import {
  AdaptorRegistry,
  buildTreeDict,
  createConsoleLogger,
  type AdaptorRegistryOptions,
  type Backend,
  type Canvas,
  type Logger,
  type TreeDict,
  type View,
} from '@scenesync/core';
import { SvgCameraAdaptor } from './adaptors/camera';
import { SvgCanvasAdaptor } from './adaptors/canvas';
import { SvgImageAdaptor } from './adaptors/image';
import { isNodeElement, SvgSceneAdaptor } from './adaptors/node';
import type { SvgAdaptorOptions } from './adaptors/options';
import { SvgPointsAdaptor } from './adaptors/points';
import { SvgViewAdaptor } from './adaptors/view';
import type { SvgElement } from './element';
import { DEFAULT_PRECISION } from './format';

export interface SvgBackendOptions {
  /** Decimals kept in emitted numbers. Defaults to 3. */
  precision?: number;
  /** Adaptor diagnostics; defaults to the registry's logger. */
  logger?: Logger;
}

export function createSvgBackend(
  options: SvgBackendOptions = {}
): Backend<SvgElement> {
  const adaptorOptions = (logger: Logger): SvgAdaptorOptions => ({
    logger: options.logger ?? logger,
    precision: options.precision ?? DEFAULT_PRECISION,
  });
  return {
    name: 'svg',
    createScene: (model, ctx) =>
      new SvgSceneAdaptor(model, adaptorOptions(ctx.logger)),
    createCamera: (model, ctx) =>
      new SvgCameraAdaptor(model, adaptorOptions(ctx.logger)),
    createImage: (model, ctx) =>
      new SvgImageAdaptor(model, adaptorOptions(ctx.logger)),
    createPoints: (model, ctx) =>
      new SvgPointsAdaptor(model, adaptorOptions(ctx.logger)),
    createView: (model, ctx) =>
      new SvgViewAdaptor(model, adaptorOptions(ctx.logger)),
    createCanvas: (model, ctx) =>
      new SvgCanvasAdaptor(model, adaptorOptions(ctx.logger)),
  };
}

export type SvgRegistryOptions = SvgBackendOptions &
  Omit<AdaptorRegistryOptions, 'logger'>;

export function createSvgRegistry(
  options: SvgRegistryOptions = {}
): AdaptorRegistry<SvgElement> {
  const { precision, logger = createConsoleLogger(), ...registryOptions } =
    options;
  return new AdaptorRegistry(createSvgBackend({ precision, logger }), {
    ...registryOptions,
    logger,
  });
}

/**
 * Show `target` and return its canvas as an SVG document. Uses a fresh
 * registry unless one is given.
 */
export function renderToSvg(
  target: View | Canvas,
  registry: AdaptorRegistry<SvgElement> = createSvgRegistry()
): string {
  const canvas = registry.show(target);
  const markup = registry.render(canvas);
  if (typeof markup !== 'string') {
    throw new Error(
      `renderToSvg: backend "${registry.backend.name}" did not produce markup`
    );
  }
  return markup;
}

/** `{ name, children }` outline of the node groups under `element`. */
export function nativeTreeDict(element: SvgElement): TreeDict {
  return buildTreeDict(element, {
    children: (el) => el.children.filter(isNodeElement),
    label: (el) => {
      const kind = String(el.getAttr('data-kind'));
      return kind[0].toUpperCase() + kind.slice(1);
    },
  });
}
