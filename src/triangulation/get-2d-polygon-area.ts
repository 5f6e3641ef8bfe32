import type { ReadonlyVec2 } from 'gl-matrix';

/**
 * Get the signed area of a polyline. Positive if counter-clockwise, negative
 * if clockwise.
 */
export function get2DPolygonSignedArea(polyline: ReadonlyArray<ReadonlyVec2>): number {
    // same sum as isClockwise2DPolygon, which is -2x the signed area
    let sum = 0;
    const vertCount = polyline.length;

    for (let i = 0; i < vertCount; i++) {
        const current = polyline[i];
        const next = polyline[(i + 1) % vertCount];
        sum += (next[0] - current[0]) * (next[1] + current[1]);
    }

    return -sum / 2;
}

export function get2DPolygonArea(polyline: ReadonlyArray<ReadonlyVec2>): number {
    return Math.abs(get2DPolygonSignedArea(polyline));
}

export function get2DTriangleArea(triangle: Readonly<[ReadonlyVec2, ReadonlyVec2, ReadonlyVec2]>): number {
    const [a, b, c] = triangle;
    return Math.abs((b[0] - a[0]) * (c[1] - a[1]) - (b[1] - a[1]) * (c[0] - a[0])) / 2;
}
