import { SingularTransformError, ValidationError } from './errors';

/** 16 numbers, row-major. */
export type Matrix4 = readonly number[];

export type Vec2 = readonly [number, number];
export type Vec3 = readonly [number, number, number];

const IDENTITY: Matrix4 = [1, 0, 0, 0, 0, 1, 0, 0, 0, 0, 1, 0, 0, 0, 0, 1];

const SINGULAR_EPSILON = 1e-12;

function multiply(a: Matrix4, b: Matrix4): number[] {
  const out = new Array<number>(16).fill(0);
  for (let r = 0; r < 4; r++) {
    for (let c = 0; c < 4; c++) {
      let sum = 0;
      for (let k = 0; k < 4; k++) {
        sum += a[r * 4 + k] * b[k * 4 + c];
      }
      out[r * 4 + c] = sum;
    }
  }
  return out;
}

/**
 * Affine map from a node's local frame to its parent's frame.
 *
 * Points are column vectors (`p' = M · p`), so in a product the right-most
 * transform is applied first. Instances are immutable.
 */
export class Transform {
  readonly matrix: Matrix4;

  constructor(matrix: ArrayLike<number> = IDENTITY) {
    if (matrix.length !== 16) {
      throw new ValidationError(
        `Transform: expected 16 matrix entries, got ${matrix.length}`
      );
    }
    const values = Array.from(matrix);
    if (!values.every((v) => Number.isFinite(v))) {
      throw new ValidationError('Transform: matrix entries must be finite');
    }
    this.matrix = Object.freeze(values);
  }

  static identity(): Transform {
    return new Transform(IDENTITY);
  }

  static translation(offset: readonly number[]): Transform {
    const [x = 0, y = 0, z = 0] = offset;
    return new Transform([1, 0, 0, x, 0, 1, 0, y, 0, 0, 1, z, 0, 0, 0, 1]);
  }

  static scaling(factors: readonly number[]): Transform {
    const [x = 1, y = 1, z = 1] = factors;
    return new Transform([x, 0, 0, 0, 0, y, 0, 0, 0, 0, z, 0, 0, 0, 0, 1]);
  }

  /** Rotation of `degrees` about `axis` (right-hand rule). */
  static rotation(degrees: number, axis: Vec3 = [0, 0, 1]): Transform {
    const len = Math.hypot(axis[0], axis[1], axis[2]);
    if (len === 0) {
      throw new ValidationError('Transform.rotation: axis must be non-zero');
    }
    const [x, y, z] = [axis[0] / len, axis[1] / len, axis[2] / len];
    const rad = (degrees * Math.PI) / 180;
    const c = Math.cos(rad);
    const s = Math.sin(rad);
    const t = 1 - c;
    return new Transform([
      t * x * x + c,
      t * x * y - s * z,
      t * x * z + s * y,
      0,
      t * x * y + s * z,
      t * y * y + c,
      t * y * z - s * x,
      0,
      t * x * z - s * y,
      t * y * z + s * x,
      t * z * z + c,
      0,
      0,
      0,
      0,
      1,
    ]);
  }

  /**
   * Compose transforms into one: `chain(a, b, c)` is `a · b · c`, so `c` is
   * applied first.
   */
  static chain(...transforms: Transform[]): Transform {
    let acc: Matrix4 = IDENTITY;
    for (const t of transforms) {
      acc = multiply(acc, t.matrix);
    }
    return new Transform(acc);
  }

  static fromJSON(rows: readonly (readonly number[])[]): Transform {
    if (rows.length !== 4 || rows.some((row) => row.length !== 4)) {
      throw new ValidationError('Transform.fromJSON: expected a 4x4 matrix');
    }
    return new Transform(rows.flat());
  }

  toJSON(): number[][] {
    return [0, 1, 2, 3].map((r) => this.matrix.slice(r * 4, r * 4 + 4));
  }

  get isIdentity(): boolean {
    return this.equals(IDENTITY);
  }

  /** `this · other`: `other` is applied first. */
  dot(other: Transform): Transform {
    return new Transform(multiply(this.matrix, other.matrix));
  }

  translated(offset: readonly number[]): Transform {
    return Transform.translation(offset).dot(this);
  }

  scaled(factors: readonly number[]): Transform {
    return Transform.scaling(factors).dot(this);
  }

  rotated(degrees: number, axis?: Vec3): Transform {
    return Transform.rotation(degrees, axis).dot(this);
  }

  inverse(): Transform {
    // Gauss-Jordan elimination with partial pivoting on [M | I].
    const m = Array.from(this.matrix);
    const inv = Array.from(IDENTITY);
    for (let col = 0; col < 4; col++) {
      let pivot = col;
      for (let r = col + 1; r < 4; r++) {
        if (Math.abs(m[r * 4 + col]) > Math.abs(m[pivot * 4 + col])) pivot = r;
      }
      if (Math.abs(m[pivot * 4 + col]) < SINGULAR_EPSILON) {
        throw new SingularTransformError(
          'Transform.inverse: matrix is not invertible'
        );
      }
      if (pivot !== col) {
        for (let k = 0; k < 4; k++) {
          swap(m, col * 4 + k, pivot * 4 + k);
          swap(inv, col * 4 + k, pivot * 4 + k);
        }
      }
      const p = m[col * 4 + col];
      for (let k = 0; k < 4; k++) {
        m[col * 4 + k] /= p;
        inv[col * 4 + k] /= p;
      }
      for (let r = 0; r < 4; r++) {
        if (r === col) continue;
        const f = m[r * 4 + col];
        if (f === 0) continue;
        for (let k = 0; k < 4; k++) {
          m[r * 4 + k] -= f * m[col * 4 + k];
          inv[r * 4 + k] -= f * inv[col * 4 + k];
        }
      }
    }
    return new Transform(inv);
  }

  /** Map a 2-D or 3-D point through this transform. */
  map(point: readonly number[]): [number, number, number] {
    const [x = 0, y = 0, z = 0] = point;
    const m = this.matrix;
    const w = m[12] * x + m[13] * y + m[14] * z + m[15];
    return [
      (m[0] * x + m[1] * y + m[2] * z + m[3]) / w,
      (m[4] * x + m[5] * y + m[6] * z + m[7]) / w,
      (m[8] * x + m[9] * y + m[10] * z + m[11]) / w,
    ];
  }

  /** Map a point through the inverse of this transform. */
  imap(point: readonly number[]): [number, number, number] {
    return this.inverse().map(point);
  }

  equals(other: unknown, tolerance = 1e-9): boolean {
    const matrix =
      other instanceof Transform
        ? other.matrix
        : Array.isArray(other)
          ? other
          : null;
    if (!matrix || matrix.length !== 16) return false;
    return this.matrix.every((v, i) => {
      const o = matrix[i];
      return typeof o === 'number' && Math.abs(v - o) <= tolerance;
    });
  }
}

function swap(values: number[], i: number, j: number): void {
  const tmp = values[i];
  values[i] = values[j];
  values[j] = tmp;
}
