import earClip2DPolygon from './ear-clip-2d-polygon';

import type { vec2 } from 'gl-matrix';
import type { Triangle2D } from './Triangle2D';

/**
 * Triangulate a simple polygon into a list of triangles. Same as
 * earClip2DPolygon, but without reporting whether clipping completed; the
 * polyline is consumed the same way.
 *
 * @param polyline - The polyline to triangulate. Must have at least 3 vertices.
 * @param output - An array to append the triangles to.
 * @param isClockwiseHint - The winding order of the polyline, if already known.
 * @returns The output array.
 */
export default function triangulate2DPolygon(polyline: Array<vec2>, output?: Array<Triangle2D>, isClockwiseHint?: boolean): Array<Triangle2D> {
    return earClip2DPolygon(polyline, output, isClockwiseHint).triangles;
}
