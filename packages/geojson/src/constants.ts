/** GeoJSON geometry object member names. */
export const Field = {
	TYPE: "type",
	BOUNDING_BOX: "bbox",
	COORDINATES: "coordinates",
	GEOMETRIES: "geometries",
} as const

/** Fraction digits kept when encoding ordinates. */
export const DEFAULT_DECIMAL_PLACES = 8

/** `Number.prototype.toFixed` accepts at most this many fraction digits. */
export const MAX_DECIMAL_PLACES = 100

/** SRID of the geometry factory used when none is configured (WGS 84). */
export const DEFAULT_SRID = 4326

/** GeometryCollection nesting allowed when decoding. Unbounded by default. */
export const DEFAULT_MAX_DEPTH = Number.POSITIVE_INFINITY
