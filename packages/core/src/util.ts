import { StructuralError } from './errors';
import { describeNode, type Node } from './model/node';

/** How to read a tree whose node type is `T`. */
export interface TreeAccessors<T> {
  children(node: T): Iterable<T>;
  label(node: T): string;
}

export interface TreeDict {
  name: string;
  children: TreeDict[];
}

/** `'image'` -> `'Image'`. */
export function kindLabel(node: Node): string {
  return node.kind[0].toUpperCase() + node.kind.slice(1);
}

export const nodeAccessors: TreeAccessors<Node> = {
  children: (node) => node.children,
  label: kindLabel,
};

/**
 * Render any tree as text:
 * ```
 * Scene
 *     ├── Image
 *     └── Camera
 * ```
 */
export function formatTree<T>(root: T, accessors: TreeAccessors<T>): string {
  const lines = [accessors.label(root)];
  const visit = (node: T, prefix: string) => {
    const children = [...accessors.children(node)];
    children.forEach((child, i) => {
      const last = i === children.length - 1;
      lines.push(`${prefix}${last ? '└── ' : '├── '}${accessors.label(child)}`);
      visit(child, prefix + (last ? '    ' : '│   '));
    });
  };
  visit(root, '    ');
  return lines.join('\n');
}

/** Text outline of the model subtree under `node`. */
export function treeRepr(
  node: Node,
  label: (node: Node) => string = kindLabel
): string {
  return formatTree(node, { ...nodeAccessors, label });
}

export function buildTreeDict<T>(root: T, accessors: TreeAccessors<T>): TreeDict {
  return {
    name: accessors.label(root),
    children: [...accessors.children(root)].map((child) =>
      buildTreeDict(child, accessors)
    ),
  };
}

/** Nested `{ name, children }` outline, comparable across model and native trees. */
export function treeDict(
  node: Node,
  label: (node: Node) => string = kindLabel
): TreeDict {
  return buildTreeDict(node, { ...nodeAccessors, label });
}

/** Depth-first, parents before children. */
export function* walk(node: Node): Generator<Node> {
  yield node;
  for (const child of node.children) yield* walk(child);
}

/** `node`, then each of its ancestors. */
export function iterParents(node: Node): Generator<Node> {
  return node.iterParents();
}

/**
 * Check the parent/child links of the subtree under `root`: every child
 * points back at its parent, appears once, and no node is reached twice.
 */
export function assertTreeInvariants(root: Node): void {
  const seen = new Set<Node>();
  const visit = (node: Node) => {
    if (seen.has(node)) {
      throw new StructuralError(
        `assertTreeInvariants: ${describeNode(node)} is reachable more than once`
      );
    }
    seen.add(node);
    const children = node.children;
    if (new Set(children).size !== children.length) {
      throw new StructuralError(
        `assertTreeInvariants: ${describeNode(node)} lists a child twice`
      );
    }
    for (const child of children) {
      if (child.parent !== node) {
        throw new StructuralError(
          `assertTreeInvariants: ${describeNode(child)} is a child of ${describeNode(node)} but its parent is ${child.parent ? describeNode(child.parent) : 'null'}`
        );
      }
      visit(child);
    }
  };
  visit(root);
}
