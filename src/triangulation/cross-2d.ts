import { vec2 } from 'gl-matrix';

import type { ReadonlyVec2 } from 'gl-matrix';

/** Componentwise vector addition; gl-matrix's vec2.add. */
export const add2D = vec2.add;
/** Componentwise vector subtraction; gl-matrix's vec2.sub. */
export const sub2D = vec2.sub;

/**
 * Get the scalar 2D cross product (z component of the 3D cross product) of
 * two vectors. Positive if `b` is counter-clockwise from `a`.
 */
export default function cross2D(a: ReadonlyVec2, b: ReadonlyVec2): number {
    return a[0] * b[1] - a[1] * b[0];
}
