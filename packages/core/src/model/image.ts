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

/** Rows of samples, or a stack of such planes. */
export type ImageArray = number[][] | number[][][];

export type Interpolation = 'nearest' | 'linear' | 'bicubic';

export interface ImageState extends NodeState {
  data: ImageArray;
  cmap: string;
  /** Contrast limits; `null` derives them from the data. */
  clims: [number, number] | null;
  gamma: number;
  interpolation: Interpolation;
}

export type ImageValues = Omit<ImageState, 'parent' | 'children'>;

export interface ImageInit extends NodeInit, Partial<Omit<ImageValues, 'data'>> {
  data: ImageArray;
}

export const IMAGE_DEFAULTS: Readonly<Omit<ImageValues, 'data'>> = {
  ...NODE_DEFAULTS,
  cmap: 'gray',
  clims: null,
  gamma: 1,
  interpolation: 'nearest',
};

function isRectangular(rows: readonly (readonly unknown[])[]): boolean {
  return rows.every((row) => row.length === rows[0].length);
}

const plane = z
  .array(z.array(z.number()))
  .refine(isRectangular, 'image rows must all have the same length');

const volume = z
  .array(z.array(z.array(z.number())).refine(isRectangular))
  .refine(
    (planes) =>
      planes.every(
        (p) => p.length === planes[0].length && p[0]?.length === planes[0][0]?.length
      ),
    'image planes must all have the same shape'
  );

export const imageSchemas: FieldSchemas<ImageState> = {
  ...nodeSchemas,
  data: z.union([plane, volume]),
  cmap: z.string().min(1),
  clims: z
    .tuple([z.number(), z.number()])
    .refine(([lo, hi]) => lo <= hi, 'clims must be ordered [min, max]')
    .nullable(),
  gamma: z.number().positive(),
  interpolation: z.enum(['nearest', 'linear', 'bicubic']),
};

/** Shape of image data: `[rows, cols]` or `[planes, rows, cols]`. */
export function imageShape(data: ImageArray): number[] {
  const first = data[0];
  if (first === undefined) return [0, 0];
  const cell = first[0];
  if (Array.isArray(cell)) return [data.length, first.length, cell.length];
  return [data.length, first.length];
}

export class Image extends NodeBase<ImageState> {
  get kind(): 'image' {
    return 'image';
  }

  constructor(init: ImageInit) {
    const { parent = null, children = [], ...values } = init;
    super(
      imageSchemas,
      resolveFields(
        'Image',
        imageSchemas,
        { ...IMAGE_DEFAULTS, data: [], parent: null, children: [] },
        values
      ),
      parent,
      children
    );
  }

  protected _self(): Node {
    return this;
  }

  get data(): ImageArray {
    return this._get('data');
  }
  set data(value: ImageArray) {
    this._assign('data', value);
  }

  get cmap(): string {
    return this._get('cmap');
  }
  set cmap(value: string) {
    this._assign('cmap', value);
  }

  get clims(): [number, number] | null {
    return this._get('clims');
  }
  set clims(value: [number, number] | null) {
    this._assign('clims', value);
  }

  get gamma(): number {
    return this._get('gamma');
  }
  set gamma(value: number) {
    this._assign('gamma', value);
  }

  get interpolation(): Interpolation {
    return this._get('interpolation');
  }
  set interpolation(value: Interpolation) {
    this._assign('interpolation', value);
  }

  get shape(): number[] {
    return imageShape(this.data);
  }
}
