import { vec2 } from 'gl-matrix';

const TAU = Math.PI * 2;

/**
 * Make a star polyline, centred at the origin, alternating between outer
 * (tip) and inner vertices, starting with a tip pointing up (+Y). The result
 * is concave, with 2 vertices per point.
 *
 * @param outerRadius - Distance from the centre to each tip.
 * @param innerRadius - Distance from the centre to each inner vertex.
 * @param points - Number of tips. Must be at least 3.
 * @param clockwise - Should the polyline be in clockwise order? False by default.
 */
export function makeStarPolyline(outerRadius: number, innerRadius: number, points: number, clockwise = false): Array<vec2> {
    if (points < 3) {
        throw new Error(`There must be at least 3 points in a star polyline, got ${points}`);
    }

    const vertexCount = points * 2;
    const direction = clockwise ? 1 : -1;
    const polyline = new Array<vec2>(vertexCount);

    for (let i = 0; i < vertexCount; i++) {
        const angle = direction * TAU * i / vertexCount;
        const radius = i % 2 === 0 ? outerRadius : innerRadius;
        polyline[i] = vec2.fromValues(Math.sin(angle) * radius, Math.cos(angle) * radius);
    }

    return polyline;
}
