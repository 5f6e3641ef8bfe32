import isPointIn2DTriangle from './is-point-in-2d-triangle';

import type { ReadonlyVec2 } from 'gl-matrix';

/**
 * Check if no other vertex of a polyline is inside the triangle formed by a
 * vertex and its neighbours. Convexity is not checked here; see
 * isConvex2DCorner.
 *
 * Other vertices are told apart by index, so a duplicate of a triangle corner
 * at another index counts as inside.
 *
 * @param polyline - The polyline the triangle is taken from.
 * @param prevIndex - Index of the vertex before the candidate.
 * @param currentIndex - Index of the candidate ear tip.
 * @param nextIndex - Index of the vertex after the candidate.
 */
export default function is2DEar(polyline: ReadonlyArray<ReadonlyVec2>, prevIndex: number, currentIndex: number, nextIndex: number): boolean {
    const prev = polyline[prevIndex];
    const current = polyline[currentIndex];
    const next = polyline[nextIndex];
    const vertexCount = polyline.length;

    for (let j = 0; j < vertexCount; j++) {
        if (j === prevIndex || j === currentIndex || j === nextIndex) {
            continue;
        }

        if (isPointIn2DTriangle(polyline[j], prev, current, next)) {
            return false;
        }
    }

    return true;
}
