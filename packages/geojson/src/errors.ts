/**
 * Errors raised while configuring, encoding or decoding geometries. Messages
 * are stable; callers match on their prefixes.
 *
 * @module
 */

/** Base class of every codec error. */
export class GeoJsonError extends Error {
	constructor(message: string) {
		super(message)
		this.name = "GeoJsonError"
	}
}

/** A codec option is out of range. */
export class InvalidConfigurationError extends GeoJsonError {
	constructor(message: string) {
		super(message)
		this.name = "InvalidConfigurationError"
	}
}

/** The encoder was given a geometry class outside the seven GeoJSON kinds. */
export class UnsupportedGeometryError extends GeoJsonError {
	constructor(readonly geometryClass: string) {
		super(`Geometry type ${geometryClass} is not supported.`)
		this.name = "UnsupportedGeometryError"
	}
}

/** The `type` member does not name a GeoJSON geometry kind. */
export class UnknownGeometryTypeError extends GeoJsonError {
	constructor(readonly typeName: string) {
		super(`Invalid geometry type: ${typeName}`)
		this.name = "UnknownGeometryTypeError"
	}
}

/**
 * A `coordinates` or `geometries` member, or a coordinate inside one, has the
 * wrong shape.
 */
export class MalformedCoordinatesError extends GeoJsonError {
	constructor(message: string) {
		super(message)
		this.name = "MalformedCoordinatesError"
	}
}

/** The node being decoded is not a geometry object, or is nested too deep. */
export class MalformedGeometryError extends GeoJsonError {
	constructor(message: string) {
		super(message)
		this.name = "MalformedGeometryError"
	}
}

/** A typed decode produced a geometry of another class. */
export class TypeMismatchError extends GeoJsonError {
	constructor(
		readonly expected: string,
		readonly actual: string,
	) {
		super(`Invalid type for ${expected}: ${actual}`)
		this.name = "TypeMismatchError"
	}
}
