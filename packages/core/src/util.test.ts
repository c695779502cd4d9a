import { describe, it, expect } from 'vitest';
import { StructuralError } from './errors';
import { Camera } from './model/camera';
import { Image } from './model/image';
import { Points } from './model/points';
import { Scene } from './model/scene';
import { assertTreeInvariants, treeDict, treeRepr, walk } from './util';

function basicScene() {
  const scene = new Scene();
  new Image({ data: [[1]], parent: scene });
  new Image({ data: [[2]], parent: scene });
  new Points({ parent: scene });
  new Camera({ parent: scene });
  return scene;
}

describe('treeRepr', () => {
  it('lists children with box-drawing branches', () => {
    expect(treeRepr(basicScene())).toBe(
      [
        'Scene',
        '    ├── Image',
        '    ├── Image',
        '    ├── Points',
        '    └── Camera',
      ].join('\n')
    );
  });

  it('indents nested levels under open and closed branches', () => {
    const scene = new Scene();
    const group = new Scene({ parent: scene });
    new Image({ data: [[1]], parent: group });
    const points = new Points({ parent: scene });
    new Points({ parent: points });

    expect(treeRepr(scene)).toBe(
      [
        'Scene',
        '    ├── Scene',
        '    │   └── Image',
        '    └── Points',
        '        └── Points',
      ].join('\n')
    );
  });

  it('accepts a custom label', () => {
    const scene = new Scene({ name: 'root' });
    expect(treeRepr(scene, (n) => n.name ?? '?')).toBe('root');
  });
});

describe('treeDict', () => {
  it('nests names and children', () => {
    const scene = new Scene();
    new Points({ parent: scene });
    expect(treeDict(scene)).toEqual({
      name: 'Scene',
      children: [{ name: 'Points', children: [] }],
    });
  });
});

describe('walk', () => {
  it('visits parents before children', () => {
    const scene = new Scene();
    const a = new Points({ parent: scene });
    const b = new Points({ parent: a });
    const c = new Points({ parent: scene });
    expect([...walk(scene)]).toEqual([scene, a, b, c]);
  });
});

describe('assertTreeInvariants', () => {
  it('accepts a consistent tree', () => {
    expect(() => assertTreeInvariants(basicScene())).not.toThrow();
  });

  it('detects a child whose parent link is missing', () => {
    const scene = new Scene();
    const stray = new Points();
    scene._linkChild(stray);
    expect(() => assertTreeInvariants(scene)).toThrow(StructuralError);
  });
});
