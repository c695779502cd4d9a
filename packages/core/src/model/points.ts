import { z } from 'zod';
import { resolveFields, type FieldSchemas } from './evented';
import {
  NODE_DEFAULTS,
  NodeBase,
  nodeSchemas,
  type Node,
  type NodeInit,
  type NodeState,
} from './node';

export const SYMBOLS = [
  'disc',
  'arrow',
  'ring',
  'clobber',
  'square',
  'x',
  'diamond',
  'vbar',
  'hbar',
  'cross',
  'tailed_arrow',
  'triangle_up',
  'triangle_down',
  'star',
  'cross_lines',
] as const;

export type SymbolName = (typeof SYMBOLS)[number];

/**
 * How marker size responds to zoom: `fixed` keeps screen size, `scene`
 * scales with the scene, `visual` scales with the view but not the scene.
 */
export type ScalingMode = 'fixed' | 'scene' | 'visual';

export type Coord = [number, number] | [number, number, number];

export interface PointsState extends NodeState {
  coords: Coord[];
  size: number;
  faceColor: string;
  edgeColor: string;
  edgeWidth: number;
  symbol: SymbolName;
  scaling: ScalingMode;
  antialias: number;
}

export type PointsValues = Omit<PointsState, 'parent' | 'children'>;

export interface PointsInit extends NodeInit, Partial<PointsValues> {}

export const POINTS_DEFAULTS: Readonly<PointsValues> = {
  ...NODE_DEFAULTS,
  coords: [],
  size: 10,
  faceColor: 'white',
  edgeColor: 'black',
  edgeWidth: 1,
  symbol: 'disc',
  scaling: 'fixed',
  antialias: 1,
};

const color = z.string().min(1);

export const pointsSchemas: FieldSchemas<PointsState> = {
  ...nodeSchemas,
  coords: z.array(
    z.union([
      z.tuple([z.number(), z.number()]),
      z.tuple([z.number(), z.number(), z.number()]),
    ])
  ),
  size: z.number().nonnegative(),
  faceColor: color,
  edgeColor: color,
  edgeWidth: z.number().nonnegative(),
  symbol: z.enum(SYMBOLS),
  scaling: z.enum(['fixed', 'scene', 'visual']),
  antialias: z.number().nonnegative(),
};

/** A set of markers. */
export class Points extends NodeBase<PointsState> {
  get kind(): 'points' {
    return 'points';
  }

  constructor(init: PointsInit = {}) {
    const { parent = null, children = [], ...values } = init;
    super(
      pointsSchemas,
      resolveFields(
        'Points',
        pointsSchemas,
        { ...POINTS_DEFAULTS, parent: null, children: [] },
        values
      ),
      parent,
      children
    );
  }

  protected _self(): Node {
    return this;
  }

  get coords(): Coord[] {
    return this._get('coords');
  }
  set coords(value: Coord[]) {
    this._assign('coords', value);
  }

  get size(): number {
    return this._get('size');
  }
  set size(value: number) {
    this._assign('size', value);
  }

  get faceColor(): string {
    return this._get('faceColor');
  }
  set faceColor(value: string) {
    this._assign('faceColor', value);
  }

  get edgeColor(): string {
    return this._get('edgeColor');
  }
  set edgeColor(value: string) {
    this._assign('edgeColor', value);
  }

  get edgeWidth(): number {
    return this._get('edgeWidth');
  }
  set edgeWidth(value: number) {
    this._assign('edgeWidth', value);
  }

  get symbol(): SymbolName {
    return this._get('symbol');
  }
  set symbol(value: SymbolName) {
    this._assign('symbol', value);
  }

  get scaling(): ScalingMode {
    return this._get('scaling');
  }
  set scaling(value: ScalingMode) {
    this._assign('scaling', value);
  }

  get antialias(): number {
    return this._get('antialias');
  }
  set antialias(value: number) {
    this._assign('antialias', value);
  }
}
