import { vec2 } from 'gl-matrix';

/**
 * Make a rectangle polyline, centred at the origin, starting at the top-right
 * corner.
 *
 * @param width - The width of the rectangle (X).
 * @param height - The height of the rectangle (Y).
 * @param clockwise - Should the polyline be in clockwise order? False by default.
 */
export function makeRectanglePolyline(width: number, height: number, clockwise = false): Array<vec2> {
    const halfWidth = width / 2;
    const halfHeight = height / 2;
    const topRight = vec2.fromValues(halfWidth, halfHeight);
    const topLeft = vec2.fromValues(-halfWidth, halfHeight);
    const bottomLeft = vec2.fromValues(-halfWidth, -halfHeight);
    const bottomRight = vec2.fromValues(halfWidth, -halfHeight);

    return clockwise
        ? [topRight, bottomRight, bottomLeft, topLeft]
        : [topRight, topLeft, bottomLeft, bottomRight];
}

/**
 * Make a square polyline; a rectangle with equal sides.
 *
 * @param length - The side length of the square.
 * @param clockwise - Should the polyline be in clockwise order? False by default.
 */
export function makeSquarePolyline(length: number, clockwise = false): Array<vec2> {
    return makeRectanglePolyline(length, length, clockwise);
}
