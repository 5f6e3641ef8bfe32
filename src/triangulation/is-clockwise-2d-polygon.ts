import type { ReadonlyVec2 } from 'gl-matrix';

/**
 * Check if a polyline has a clockwise winding order.
 *
 * @param polyline - The polyline to check; a list of 2D vertices, in order.
 * @returns True if the polyline has a clockwise winding order, false if it is counter-clockwise or has no area.
 */
export default function isClockwise2DPolygon(polyline: ReadonlyArray<ReadonlyVec2>): boolean {
    // sum up all the edges of the polygon to get -2x signed area. if the sum
    // is positive, then the polygon is clockwise. zero-area polygons are never
    // clockwise
    let sum = 0;
    const vertCount = polyline.length;

    for (let i = 0; i < vertCount; i++) {
        const current = polyline[i];
        const next = polyline[(i + 1) % vertCount];
        sum += (next[0] - current[0]) * (next[1] + current[1]);
    }

    return sum > 0;
}
