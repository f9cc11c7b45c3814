/**
 * A bounding box in the format [minX, minY, maxX, maxY].
 * GeoJSON.BBox allows for 3D bounding boxes, but geometries only ever emit 2D ones.
 */
export type Bbox2D = [minX: number, minY: number, maxX: number, maxY: number]

/**
 * Log sink. Components that report anything take one of these and default to
 * the console.
 */
export type Logger = (...args: unknown[]) => void
