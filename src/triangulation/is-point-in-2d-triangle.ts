import { vec2 } from 'gl-matrix';
import cross2D from './cross-2d';

import type { ReadonlyVec2 } from 'gl-matrix';

const edge = vec2.create();
const toPoint = vec2.create();

function edgeSide(point: ReadonlyVec2, from: ReadonlyVec2, to: ReadonlyVec2): number {
    vec2.sub(edge, to, from);
    vec2.sub(toPoint, point, from);
    return cross2D(edge, toPoint);
}

/**
 * Check if a point is inside a triangle by checking which side of each
 * triangle edge the point is on. Points exactly on an edge or a corner are
 * inside.
 *
 * Sign meaning depends on winding order; this expects a triangle taken from a
 * clockwise polyline.
 *
 * @param point - The point to test.
 * @param prev - The first corner of the triangle.
 * @param current - The second corner of the triangle.
 * @param next - The third corner of the triangle.
 */
export default function isPointIn2DTriangle(point: ReadonlyVec2, prev: ReadonlyVec2, current: ReadonlyVec2, next: ReadonlyVec2): boolean {
    const alpha = edgeSide(point, prev, current);
    if (alpha > 0) {
        return false;
    }

    const beta = edgeSide(point, current, next);
    if (beta > 0) {
        return false;
    }

    const gamma = edgeSide(point, next, prev);
    return gamma <= 0;
}
