import type { ReadonlyVec2 } from 'gl-matrix';
import type { Triangle2D } from './Triangle2D';

function formatPoint(point: ReadonlyVec2, fractionDigits: number) {
    return `(${point[0].toFixed(fractionDigits)}, ${point[1].toFixed(fractionDigits)})`;
}

/**
 * Format a triangle as a single line of text, for example
 * `Triangle: (0.000000, 0.000000) (1.000000, 0.000000) (0.000000, 1.000000)`.
 *
 * @param triangle - The triangle to format.
 * @param fractionDigits - Digits after the decimal point for each coordinate. 6 by default.
 */
export default function format2DTriangle(triangle: Triangle2D, fractionDigits = 6): string {
    return `Triangle: ${triangle.map((point) => formatPoint(point, fractionDigits)).join(' ')}`;
}
