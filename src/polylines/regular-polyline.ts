import { vec2 } from 'gl-matrix';

const TAU = Math.PI * 2;

/**
 * Make a regular polygon polyline, centred at the origin, with the first
 * vertex pointing up (+Y).
 *
 * @param radius - Distance from the centre to each vertex.
 * @param sides - Vertex count. Must be at least 3.
 * @param clockwise - Should the polyline be in clockwise order? False by default.
 */
export function makeRegularPolyline(radius: number, sides: number, clockwise = false): Array<vec2> {
    if (sides < 3) {
        throw new Error(`There must be at least 3 sides in a regular polyline, got ${sides}`);
    }

    const direction = clockwise ? 1 : -1;
    const polyline = new Array<vec2>(sides);

    for (let i = 0; i < sides; i++) {
        const angle = direction * TAU * i / sides;
        polyline[i] = vec2.fromValues(Math.sin(angle) * radius, Math.cos(angle) * radius);
    }

    return polyline;
}
