import { z } from 'zod';
import { validateField } from './evented';

export interface LayoutValues {
  /** Top-left corner inside the canvas, in pixels. */
  position: [number, number];
  /** `null` fills the canvas. */
  size: [number, number] | null;
  backgroundColor: string | null;
  borderWidth: number;
  borderColor: string | null;
  padding: number;
  margin: number;
}

export const LAYOUT_DEFAULTS: Readonly<LayoutValues> = {
  position: [0, 0],
  size: null,
  backgroundColor: null,
  borderWidth: 0,
  borderColor: null,
  padding: 0,
  margin: 0,
};

export const layoutSchema = z
  .object({
    position: z.tuple([z.number(), z.number()]),
    size: z.tuple([z.number().positive(), z.number().positive()]).nullable(),
    backgroundColor: z.string().min(1).nullable(),
    borderWidth: z.number().nonnegative(),
    borderColor: z.string().min(1).nullable(),
    padding: z.number().int().nonnegative(),
    margin: z.number().int().nonnegative(),
  })
  .strict();

/** Placement of a view on its canvas. Frozen once built. */
export class Layout implements Readonly<LayoutValues> {
  readonly position: [number, number];
  readonly size: [number, number] | null;
  readonly backgroundColor: string | null;
  readonly borderWidth: number;
  readonly borderColor: string | null;
  readonly padding: number;
  readonly margin: number;

  constructor(init: Partial<LayoutValues> = {}) {
    const values = validateField('Layout', 'init', layoutSchema, {
      ...LAYOUT_DEFAULTS,
      ...withoutUndefined(init),
    });
    this.position = values.position;
    this.size = values.size;
    this.backgroundColor = values.backgroundColor;
    this.borderWidth = values.borderWidth;
    this.borderColor = values.borderColor;
    this.padding = values.padding;
    this.margin = values.margin;
    Object.freeze(this.position);
    if (this.size) Object.freeze(this.size);
    Object.freeze(this);
  }

  /** A copy with some values replaced. */
  with(patch: Partial<LayoutValues>): Layout {
    return new Layout({ ...this.toJSON(), ...withoutUndefined(patch) });
  }

  toJSON(): LayoutValues {
    return {
      position: [...this.position],
      size: this.size ? [...this.size] : null,
      backgroundColor: this.backgroundColor,
      borderWidth: this.borderWidth,
      borderColor: this.borderColor,
      padding: this.padding,
      margin: this.margin,
    };
  }

  equals(other: unknown): boolean {
    if (!(other instanceof Layout)) return false;
    const a = this.toJSON();
    const b = other.toJSON();
    return (
      a.position[0] === b.position[0] &&
      a.position[1] === b.position[1] &&
      a.size?.[0] === b.size?.[0] &&
      a.size?.[1] === b.size?.[1] &&
      a.backgroundColor === b.backgroundColor &&
      a.borderWidth === b.borderWidth &&
      a.borderColor === b.borderColor &&
      a.padding === b.padding &&
      a.margin === b.margin
    );
  }
}

function withoutUndefined<T extends object>(values: Partial<T>): Partial<T> {
  const out: Partial<T> = {};
  for (const key in values) {
    if (values[key] !== undefined) out[key] = values[key];
  }
  return out;
}
