/**
 * Thrown when a polyline has too few vertices to form a polygon.
 */
export class InsufficientVerticesError extends Error {
    constructor(readonly vertexCount: number) {
        super(`Expected input polyline with 3 or more vertices, got ${vertexCount}`);
        this.name = 'InsufficientVerticesError';
    }
}
