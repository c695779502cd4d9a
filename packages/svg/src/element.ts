import { formatNumber, escapeXml, DEFAULT_PRECISION } from './format';

export interface Bounds {
  minX: number;
  minY: number;
  maxX: number;
  maxY: number;
}

/** SVG `matrix(a b c d e f)`: `x' = a·x + c·y + e`, `y' = b·x + d·y + f`. */
export type Matrix2D = readonly [number, number, number, number, number, number];

export const IDENTITY_2D: Matrix2D = [1, 0, 0, 1, 0, 0];

export type AttrValue = string | number;

/** A static value, or a function evaluated each time the markup is built. */
export type AttrSource = AttrValue | (() => AttrValue | null);

export function unionBounds(a: Bounds | null, b: Bounds | null): Bounds | null {
  if (!a) return b;
  if (!b) return a;
  return {
    minX: Math.min(a.minX, b.minX),
    minY: Math.min(a.minY, b.minY),
    maxX: Math.max(a.maxX, b.maxX),
    maxY: Math.max(a.maxY, b.maxY),
  };
}

export function mapBounds(m: Matrix2D, b: Bounds): Bounds {
  const [a, bb, c, d, e, f] = m;
  const corners = [
    [b.minX, b.minY],
    [b.maxX, b.minY],
    [b.minX, b.maxY],
    [b.maxX, b.maxY],
  ].map(([x, y]) => [a * x + c * y + e, bb * x + d * y + f]);
  const xs = corners.map((p) => p[0]);
  const ys = corners.map((p) => p[1]);
  return {
    minX: Math.min(...xs),
    minY: Math.min(...ys),
    maxX: Math.max(...xs),
    maxY: Math.max(...ys),
  };
}

/**
 * Retained SVG element. An element has at most one parent; appending it
 * elsewhere moves it, as in the DOM. Children are kept sorted by `order`
 * (stable for equal orders).
 */
export class SvgElement {
  readonly tag: string;
  text: string | null = null;
  /** Extent of this element's own drawing, in local coordinates. */
  localBounds: Bounds | null = null;
  /** Local-to-parent transform, used for bounds. */
  matrix: Matrix2D = IDENTITY_2D;

  private _order = 0;
  private readonly _attrs = new Map<string, AttrSource>();
  private _children: SvgElement[] = [];
  private _parent: SvgElement | null = null;

  constructor(tag: string, attrs: Record<string, AttrSource | null> = {}) {
    this.tag = tag;
    for (const [name, value] of Object.entries(attrs)) this.setAttr(name, value);
  }

  get parent(): SvgElement | null {
    return this._parent;
  }

  get children(): readonly SvgElement[] {
    return this._children;
  }

  get order(): number {
    return this._order;
  }
  set order(value: number) {
    this._order = value;
    const parent = this._parent;
    if (!parent) return;
    parent._detach(this);
    parent._insert(this);
  }

  /** `null` removes the attribute. */
  setAttr(name: string, value: AttrSource | null): this {
    if (value === null) this._attrs.delete(name);
    else this._attrs.set(name, value);
    return this;
  }

  getAttr(name: string): AttrValue | null {
    const source = this._attrs.get(name);
    if (source === undefined) return null;
    return typeof source === 'function' ? source() : source;
  }

  get hidden(): boolean {
    return this.getAttr('display') === 'none';
  }

  appendChild(child: SvgElement): this {
    if (child._parent === this) return this;
    for (let node: SvgElement | null = this; node; node = node._parent) {
      if (node === child) {
        throw new Error(
          `SvgElement.appendChild: <${child.tag}> cannot contain itself`
        );
      }
    }
    child.remove();
    this._insert(child);
    return this;
  }

  removeChild(child: SvgElement): void {
    if (child._parent === this) this._detach(child);
  }

  remove(): void {
    this._parent?._detach(this);
  }

  clear(): void {
    for (const child of [...this._children]) this._detach(child);
  }

  /** Depth-first search, this element included. */
  find(predicate: (el: SvgElement) => boolean): SvgElement | null {
    if (predicate(this)) return this;
    for (const child of this._children) {
      const hit = child.find(predicate);
      if (hit) return hit;
    }
    return null;
  }

  findAll(predicate: (el: SvgElement) => boolean): SvgElement[] {
    const out: SvgElement[] = predicate(this) ? [this] : [];
    for (const child of this._children) out.push(...child.findAll(predicate));
    return out;
  }

  /** Union of the visible children's bounds, in this element's frame. */
  contentBounds(): Bounds | null {
    let bounds: Bounds | null = null;
    for (const child of this._children) {
      bounds = unionBounds(bounds, child.boundsInParent());
    }
    return bounds;
  }

  boundsInParent(): Bounds | null {
    if (this.hidden) return null;
    const own = unionBounds(this.localBounds, this.contentBounds());
    return own ? mapBounds(this.matrix, own) : null;
  }

  markup(precision = DEFAULT_PRECISION): string {
    let attrs = '';
    for (const name of this._attrs.keys()) {
      const value = this.getAttr(name);
      if (value === null) continue;
      const text =
        typeof value === 'number' ? formatNumber(value, precision) : value;
      attrs += ` ${name}="${escapeXml(text)}"`;
    }
    const inner =
      (this.text === null ? '' : escapeXml(this.text)) +
      this._children.map((c) => c.markup(precision)).join('');
    if (inner === '') return `<${this.tag}${attrs}/>`;
    return `<${this.tag}${attrs}>${inner}</${this.tag}>`;
  }

  toString(): string {
    return this.markup();
  }

  private _insert(child: SvgElement): void {
    const index = this._children.findIndex((c) => c._order > child._order);
    if (index === -1) this._children.push(child);
    else this._children.splice(index, 0, child);
    child._parent = this;
  }

  private _detach(child: SvgElement): void {
    this._children = this._children.filter((c) => c !== child);
    child._parent = null;
  }
}

/**
 * Stand-in that renders (and measures) another element without owning it,
 * so one scene can be drawn by several views.
 */
export class SvgSlot extends SvgElement {
  private readonly _source: () => SvgElement | null;

  constructor(source: () => SvgElement | null) {
    super('g');
    this._source = source;
  }

  override boundsInParent(): Bounds | null {
    return this._source()?.boundsInParent() ?? null;
  }

  override markup(precision = DEFAULT_PRECISION): string {
    return this._source()?.markup(precision) ?? '';
  }
}
