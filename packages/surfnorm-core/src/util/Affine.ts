import { Matrix4 } from 'three';
import type { AffineTransform, Vec3 } from '../types/SurfaceTypes';
import { SingularMatrixError } from './Errors';

//
// Matrix4 stores column-major: element (row r, col c) lives at elements[c * 4 + r].
//

export function identity(): AffineTransform {
    return new Matrix4();
}

export function fromRows(rows: readonly (readonly number[])[]): AffineTransform {
    if (rows.length !== 4 || rows.some((r) => r.length !== 4)) {
        throw new RangeError(`Affine transform needs 4 rows of 4 values, got ${rows.map((r) => r.length).join('/')}`);
    }
    // fromArray reads column-major, so load the rows and transpose
    return new Matrix4().fromArray(rows.flat()).transpose();
}

export function toRows(m: AffineTransform): number[][] {
    const e = m.elements;
    const rows: number[][] = [];
    for (let r = 0; r < 4; ++r) {
        rows.push([e[r], e[4 + r], e[8 + r], e[12 + r]]);
    }
    return rows;
}

export function translation(offset: Vec3): AffineTransform {
    return new Matrix4().makeTranslation(offset[0], offset[1], offset[2]);
}

/** a · b: applying the result is applying b, then a */
export function compose(a: AffineTransform, b: AffineTransform): AffineTransform {
    return new Matrix4().multiplyMatrices(a, b);
}

export function invert(m: AffineTransform): AffineTransform {
    const det = m.determinant();
    if (det === 0 || !Number.isFinite(det)) {
        throw new SingularMatrixError(`Matrix is singular (determinant ${det}) and cannot be inverted`);
    }
    return m.clone().invert();
}

export function isIdentity(m: AffineTransform): boolean {
    return m.equals(identity());
}

/**
 * Computes m · [x, y, z, 1]ᵀ for every point of a flat 3*N buffer and keeps xyz.
 * All points go through the same float64 loop whatever N is.
 */
export function apply(points: ArrayLike<number>, m: AffineTransform): Float64Array {
    if (points.length % 3 !== 0) {
        throw new RangeError(`Point buffer length ${points.length} is not a multiple of 3`);
    }
    const e = m.elements;
    const m00 = e[0], m01 = e[4], m02 = e[8], m03 = e[12];
    const m10 = e[1], m11 = e[5], m12 = e[9], m13 = e[13];
    const m20 = e[2], m21 = e[6], m22 = e[10], m23 = e[14];

    const out = new Float64Array(points.length);
    for (let i = 0; i < points.length; i += 3) {
        const x = points[i], y = points[i + 1], z = points[i + 2];
        out[i] = m00 * x + m01 * y + m02 * z + m03;
        out[i + 1] = m10 * x + m11 * y + m12 * z + m13;
        out[i + 2] = m20 * x + m21 * y + m22 * z + m23;
    }
    return out;
}

export function addOffset(points: ArrayLike<number>, offset: Vec3): Float64Array {
    if (points.length % 3 !== 0) {
        throw new RangeError(`Point buffer length ${points.length} is not a multiple of 3`);
    }
    const out = new Float64Array(points.length);
    for (let i = 0; i < points.length; i += 3) {
        out[i] = points[i] + offset[0];
        out[i + 1] = points[i + 1] + offset[1];
        out[i + 2] = points[i + 2] + offset[2];
    }
    return out;
}
