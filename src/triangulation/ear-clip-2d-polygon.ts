import { vec2 } from 'gl-matrix';
import isClockwise2DPolygon from './is-clockwise-2d-polygon';
import isConvex2DCorner from './is-convex-2d-corner';
import is2DEar from './is-2d-ear';
import { InsufficientVerticesError } from './InsufficientVerticesError';

import type { Triangle2D } from './Triangle2D';

export interface EarClipResult {
    /** Clipped triangles, in clipping order. The last one is made from the leftover vertices. */
    triangles: Array<Triangle2D>;
    /**
     * False if clipping stopped because no ear could be found (degenerate or
     * self-intersecting input). The triangles then don't cover the polygon.
     */
    complete: boolean;
    /** How many vertices were left when clipping stopped. 3 if complete. */
    remainingVertexCount: number;
}

function copyVertex(vertex: vec2): vec2 {
    // vec2.clone always makes a Float32Array, which would round plain array
    // vertices to single precision
    if (vertex instanceof Float32Array) {
        return vec2.clone(vertex);
    }

    return [vertex[0], vertex[1]];
}

function makeTriangle(prev: vec2, current: vec2, next: vec2): Triangle2D {
    return [copyVertex(prev), copyVertex(current), copyVertex(next)];
}

/**
 * Triangulate a simple polygon by repeatedly clipping ears.
 *
 * WARNING: the polyline is consumed. It is reversed if counter-clockwise, and
 * a vertex is removed from it for each clipped ear. Pass a copy if the
 * original is still needed.
 *
 * @param polyline - The polyline to triangulate. Must have at least 3 vertices.
 * @param output - An array to append the triangles to. A new array is created if not supplied.
 * @param isClockwiseHint - The winding order of the polyline, if already known. Computed if not supplied.
 */
export default function earClip2DPolygon(polyline: Array<vec2>, output?: Array<Triangle2D>, isClockwiseHint?: boolean): EarClipResult {
    if (polyline.length < 3) {
        throw new InsufficientVerticesError(polyline.length);
    }

    if (!output) {
        output = [];
    }

    if (isClockwiseHint === undefined) {
        isClockwiseHint = isClockwise2DPolygon(polyline);
    }

    // XXX convexity and containment checks assume a clockwise winding order
    if (!isClockwiseHint) {
        polyline.reverse();
    }

    let complete = true;

    while (polyline.length > 3) {
        const vertexCount = polyline.length;
        let earFound = false;

        // scan is restarted from the start after every clip, since removing
        // a vertex shifts all the indices after it
        for (let i = 0; i < vertexCount; i++) {
            const prevIndex = (i - 1 + vertexCount) % vertexCount;
            const nextIndex = (i + 1) % vertexCount;
            const prev = polyline[prevIndex];
            const current = polyline[i];
            const next = polyline[nextIndex];

            if (isConvex2DCorner(prev, current, next) && is2DEar(polyline, prevIndex, i, nextIndex)) {
                output.push(makeTriangle(prev, current, next));
                polyline.splice(i, 1);
                earFound = true;
                break;
            }
        }

        if (!earFound) {
            // no ear; stop instead of looping forever. the leftover vertices
            // past the third are not covered by the output
            complete = false;
            break;
        }
    }

    const remainingVertexCount = polyline.length;
    output.push(makeTriangle(polyline[0], polyline[1], polyline[2]));

    return { triangles: output, complete, remainingVertexCount };
}
