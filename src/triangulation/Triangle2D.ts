import type { vec2 } from 'gl-matrix';

/**
 * A triangle clipped from a polyline, with its corners in the order they had
 * in the polyline when the triangle was clipped.
 */
export type Triangle2D = [prev: vec2, current: vec2, next: vec2];
