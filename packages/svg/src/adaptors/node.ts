import type { Node, NodeAdaptor, Scene, Transform } from '@scenesync/core';
import { SvgElement, type Matrix2D } from '../element';
import { formatNumber } from '../format';
import type { SvgAdaptorOptions } from './options';

/** True for the `<g>` of a scene-graph node, as opposed to drawn content. */
export function isNodeElement(el: SvgElement): boolean {
  return el.getAttr('data-kind') !== null;
}

/** Project a 4x4 transform onto the xy plane. */
export function toMatrix2D(transform: Transform): Matrix2D {
  const m = transform.matrix;
  return [m[0], m[4], m[1], m[5], m[3], m[7]];
}

/**
 * Shared node behaviour: every node is a `<g data-kind>` group. Drawn
 * content lives in a `data-role="content"` group that sorts before the
 * child nodes.
 *
 * Redraws are coalesced: while updates are blocked, `invalidate()` only
 * marks the adaptor dirty and the next `forceUpdate()` redraws once.
 */
export abstract class SvgNodeAdaptor<M extends Node>
  implements NodeAdaptor<SvgElement>
{
  protected readonly element: SvgElement;
  protected readonly model: M;
  protected readonly options: SvgAdaptorOptions;

  private _blocked = 0;
  private _dirty = false;
  private _redraws = 0;

  constructor(model: M, options: SvgAdaptorOptions) {
    this.model = model;
    this.options = options;
    this.element = new SvgElement('g', {
      'data-kind': model.kind,
      'data-id': model.modelId,
    });
  }

  getNative(): SvgElement {
    return this.element;
  }

  /** Number of redraws performed so far. */
  get redrawCount(): number {
    return this._redraws;
  }

  get updatesBlocked(): boolean {
    return this._blocked > 0;
  }

  setVisible(visible: boolean): void {
    this.element.setAttr('display', visible ? null : 'none');
  }

  setName(name: string | null): void {
    this.element.setAttr('data-name', name);
  }

  setOpacity(opacity: number): void {
    this.element.setAttr('opacity', opacity === 1 ? null : opacity);
  }

  setOrder(order: number): void {
    this.element.order = order;
  }

  setInteractive(interactive: boolean): void {
    this.element.setAttr('data-interactive', interactive ? 'true' : null);
  }

  setTransform(transform: Transform): void {
    const matrix = toMatrix2D(transform);
    this.element.matrix = matrix;
    const p = this.options.precision;
    this.element.setAttr(
      'transform',
      transform.isIdentity
        ? null
        : `matrix(${matrix.map((n) => formatNumber(n, p)).join(' ')})`
    );
  }

  setParent(parent: NodeAdaptor<SvgElement> | null): void {
    if (parent) parent.getNative().appendChild(this.element);
    else this.element.remove();
  }

  setChildren(children: readonly NodeAdaptor<SvgElement>[]): void {
    const natives = children.map((c) => c.getNative());
    for (const el of this.element.children) {
      if (isNodeElement(el) && !natives.includes(el)) el.remove();
    }
    for (const el of natives) this.element.appendChild(el);
  }

  addNode(child: NodeAdaptor<SvgElement>): void {
    this.element.appendChild(child.getNative());
  }

  blockUpdates(): void {
    this._blocked++;
  }

  unblockUpdates(): void {
    this._blocked = Math.max(0, this._blocked - 1);
  }

  forceUpdate(): void {
    this._dirty = true;
    if (!this.updatesBlocked) this._flush();
  }

  dispose(): void {
    this.element.remove();
  }

  /** Request a redraw; deferred while updates are blocked. */
  protected invalidate(): void {
    this._dirty = true;
    if (!this.updatesBlocked) this._flush();
  }

  /** Rebuild drawn content from the adaptor's current values. */
  protected redraw(): void {}

  /** A content group placed ahead of every child node. */
  protected createContent(): SvgElement {
    const content = new SvgElement('g', { 'data-role': 'content' });
    content.order = -1;
    this.element.appendChild(content);
    return content;
  }

  private _flush(): void {
    if (!this._dirty) return;
    this._dirty = false;
    this._redraws++;
    this.redraw();
  }
}

export class SvgSceneAdaptor extends SvgNodeAdaptor<Scene> {}
