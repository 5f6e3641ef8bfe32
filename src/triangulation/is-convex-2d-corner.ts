import { vec2 } from 'gl-matrix';
import cross2D from './cross-2d';

import type { ReadonlyVec2 } from 'gl-matrix';

const temp0 = vec2.create();
const temp1 = vec2.create();

/**
 * Check if the corner at `current` is convex. Only valid for vertices taken
 * from a clockwise polyline; on a counter-clockwise polyline the result is
 * inverted.
 *
 * @param prev - The vertex before the corner.
 * @param current - The corner vertex.
 * @param next - The vertex after the corner.
 * @returns True if the corner is convex. Collinear corners are not convex.
 */
export default function isConvex2DCorner(prev: ReadonlyVec2, current: ReadonlyVec2, next: ReadonlyVec2): boolean {
    const prevEdge = vec2.sub(temp0, prev, current);
    const nextEdge = vec2.sub(temp1, next, current);
    return cross2D(prevEdge, nextEdge) > 0;
}
