import { vec2 } from 'gl-matrix';
import earClip2DPolygon from './triangulation/ear-clip-2d-polygon';
import format2DTriangle from './triangulation/format-2d-triangle';

const FRACTION_DIGITS = 6;

export function logDemo(callback: (message: string) => void, message: unknown) {
    callback(`[Demo] ${message}`);
}

export function makeDemoPolyline(): Array<vec2> {
    return [
        vec2.fromValues(-1, -1),
        vec2.fromValues(-2, 1),
        vec2.fromValues(1, 1),
        vec2.fromValues(0, 0),
        vec2.fromValues(3, -1),
    ];
}

/**
 * Triangulate a polygon (the demo polygon by default) and get one formatted
 * line per triangle.
 *
 * @param print - Called with each output line.
 * @param warn - Called with a warning if the triangulation is partial. console.warn by default.
 * @param polyline - The polyline to triangulate. Consumed.
 */
export function runDemo(print: (line: string) => void, warn: (message: string) => void = console.warn, polyline = makeDemoPolyline()): void {
    const result = earClip2DPolygon(polyline);

    for (const triangle of result.triangles) {
        print(format2DTriangle(triangle, FRACTION_DIGITS));
    }

    if (!result.complete) {
        logDemo(warn, `No ear found with ${result.remainingVertexCount} vertices left; triangulation is partial`);
    }
}
