export { default as cross2D } from './triangulation/cross-2d';
export { add2D, sub2D } from './triangulation/cross-2d';
export { default as isClockwise2DPolygon } from './triangulation/is-clockwise-2d-polygon';
export { default as isConvex2DCorner } from './triangulation/is-convex-2d-corner';
export { default as isPointIn2DTriangle } from './triangulation/is-point-in-2d-triangle';
export { default as is2DEar } from './triangulation/is-2d-ear';
export { default as earClip2DPolygon } from './triangulation/ear-clip-2d-polygon';
export { default as triangulate2DPolygon } from './triangulation/triangulate-2d-polygon';
export { default as format2DTriangle } from './triangulation/format-2d-triangle';
export * from './triangulation/get-2d-polygon-area';
export * from './triangulation/InsufficientVerticesError';

export * from './polylines/rectangle-polyline';
export * from './polylines/regular-polyline';
export * from './polylines/star-polyline';

export type { EarClipResult } from './triangulation/ear-clip-2d-polygon';
export type { Triangle2D } from './triangulation/Triangle2D';
