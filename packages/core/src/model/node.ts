import { z } from 'zod';
import { CycleError, NoCommonAncestorError } from '../errors';
import { Transform } from '../transform';
import { EventedModel, type FieldSchemas } from './evented';
import type { Camera } from './camera';
import type { Image } from './image';
import type { Points } from './points';
import type { Scene } from './scene';

/** Closed union of every concrete node type. */
export type Node = Scene | Camera | Image | Points;

export type NodeKind = Node['kind'];

export interface NodeState {
  name: string | null;
  visible: boolean;
  interactive: boolean;
  /** 0 (transparent) to 1 (opaque). */
  opacity: number;
  /** Draw priority among siblings; children always draw after their parent. */
  order: number;
  /** Maps this node's local frame into its parent's frame. */
  transform: Transform;
  parent: Node | null;
  children: readonly Node[];
}

export type NodeValues = Omit<NodeState, 'parent' | 'children'>;

/** Constructor options shared by every node type. */
export interface NodeInit extends Partial<NodeValues> {
  parent?: Node | null;
  children?: readonly Node[];
}

export const NODE_DEFAULTS: Readonly<NodeValues> = {
  name: null,
  visible: true,
  interactive: false,
  opacity: 1,
  order: 0,
  transform: Transform.identity(),
};

export function isNode(value: unknown): value is Node {
  return value instanceof NodeBase;
}

export const nodeSchemas: FieldSchemas<NodeState> = {
  name: z.string().nullable(),
  visible: z.boolean(),
  interactive: z.boolean(),
  opacity: z.number().min(0).max(1),
  order: z.number().int().nonnegative(),
  transform: z.instanceof(Transform),
  parent: z.custom<Node | null>((v) => v === null || isNode(v), {
    message: 'expected a scene-graph node or null',
  }),
  children: z.custom<readonly Node[]>(
    (v) => Array.isArray(v) && v.every(isNode),
    { message: 'expected an array of scene-graph nodes' }
  ),
};

export function describeNode(node: Node): string {
  const name = node.name === null ? '' : ` "${node.name}"`;
  return `${node.kind} #${node.modelId}${name}`;
}

/**
 * Shared behaviour of every scene-graph node.
 *
 * The `parent` setter is the one structural mutation; `addChild` and
 * `removeChild` go through it, and `children` is only ever rewritten by it.
 * Direct construction of this base throws a `TypeError`.
 */
export abstract class NodeBase<
  F extends NodeState = NodeState,
> extends EventedModel<F> {
  abstract override readonly kind: NodeKind;

  protected constructor(
    schemas: FieldSchemas<F>,
    initial: F,
    parent: Node | null,
    children: readonly Node[]
  ) {
    if (new.target === NodeBase) {
      throw new TypeError(
        'Node cannot be instantiated directly. Use Scene, Camera, Image or Points.'
      );
    }
    super(schemas, initial);
    for (const child of children) this.addChild(child);
    if (parent) this.parent = parent;
  }

  /** This node seen as a member of the closed `Node` union. */
  protected abstract _self(): Node;

  get name(): string | null {
    return this._get('name');
  }
  set name(value: string | null) {
    this._assign('name', value);
  }

  get visible(): boolean {
    return this._get('visible');
  }
  set visible(value: boolean) {
    this._assign('visible', value);
  }

  get interactive(): boolean {
    return this._get('interactive');
  }
  set interactive(value: boolean) {
    this._assign('interactive', value);
  }

  get opacity(): number {
    return this._get('opacity');
  }
  set opacity(value: number) {
    this._assign('opacity', value);
  }

  get order(): number {
    return this._get('order');
  }
  set order(value: number) {
    this._assign('order', value);
  }

  get transform(): Transform {
    return this._get('transform');
  }
  set transform(value: Transform) {
    this._assign('transform', value);
  }

  get children(): readonly Node[] {
    return this._get('children');
  }

  get parent(): Node | null {
    return this._get('parent');
  }

  /**
   * Re-link this node under `value` (or make it a root with `null`).
   *
   * Notifications go out in the order: old parent `children`, this node's
   * `parent`, new parent `children`.
   */
  set parent(value: Node | null) {
    const current = this._get('parent');
    if (current === value) return;
    const self = this._self();
    if (value !== null) {
      for (const ancestor of value.iterParents()) {
        if (ancestor === self) {
          throw new CycleError(
            `Node.parent: ${describeNode(self)} cannot be a descendant of itself`
          );
        }
      }
    }
    if (current) current._unlinkChild(self);
    this._assign('parent', value);
    if (value) value._linkChild(self);
  }

  addChild(node: Node): void {
    const self = this._self();
    if (node.parent === self) {
      this._linkChild(node);
      return;
    }
    node.parent = self;
  }

  removeChild(node: Node): void {
    if (node.parent === this._self()) node.parent = null;
  }

  /** True when `node` is a direct child of this node. */
  contains(node: Node): boolean {
    return this.children.includes(node);
  }

  /** This node, then each ancestor up to the root. */
  *iterParents(): Generator<Node> {
    let node: Node | null = this._self();
    while (node) {
      yield node;
      node = node.parent;
    }
  }

  /**
   * The path between this node and `other`: the ascent from this node to the
   * lowest common ancestor (inclusive), then the descent from that ancestor
   * (exclusive) down to `other`.
   *
   * ```
   * A --- B --- C --- D
   *        \
   *         --- E --- F
   * ```
   * `D.pathTo(F)` is `[[D, C, B], [E, F]]`.
   */
  pathTo(other: Node): [Node[], Node[]] {
    const mine = [...this.iterParents()];
    const theirs = [...other.iterParents()];
    const common = mine.find((n) => theirs.includes(n));
    if (!common) {
      throw new NoCommonAncestorError(
        `Node.pathTo: no common ancestor between ${describeNode(this._self())} and ${describeNode(other)}`
      );
    }
    const up = mine.slice(0, mine.indexOf(common) + 1);
    const down = theirs.slice(0, theirs.indexOf(common)).reverse();
    return [up, down];
  }

  /** Transform mapping coordinates in this node's frame to `other`'s frame. */
  transformTo(other: Node): Transform {
    const [up, down] = this.pathTo(other);
    const steps = [
      ...up.slice(0, -1).map((n) => n.transform),
      ...down.map((n) => n.transform.inverse()),
    ];
    return Transform.chain(...steps.reverse());
  }

  /** @internal */
  _linkChild(child: Node): void {
    const children = this.children;
    if (children.includes(child)) return;
    this._assign('children', [...children, child]);
  }

  /** @internal */
  _unlinkChild(child: Node): void {
    const children = this.children;
    if (!children.includes(child)) return;
    this._assign(
      'children',
      children.filter((c) => c !== child)
    );
  }
}
