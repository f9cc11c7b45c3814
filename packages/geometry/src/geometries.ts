/**
 * The geometry object model.
 *
 * Seven concrete kinds mirror the GeoJSON geometry types. Every geometry owns
 * copies of its coordinates and children, and carries the SRID of the factory
 * that built it. Nothing is mutable after construction.
 *
 * @module
 */

import { assertValue } from "@geobind/shared/assert"
import { type Coordinate, copyCoordinate, equals2D } from "./coordinate"
import { Envelope } from "./envelope"

/** The GeoJSON type tag of each geometry kind. */
export type GeometryType =
	| "Point"
	| "LineString"
	| "Polygon"
	| "MultiPoint"
	| "MultiLineString"
	| "MultiPolygon"
	| "GeometryCollection"

export abstract class Geometry {
	abstract readonly type: GeometryType
	readonly srid: number

	constructor(srid = 0) {
		this.srid = srid
	}

	abstract isEmpty(): boolean

	/** All vertices of the geometry, in order. */
	abstract getCoordinates(): Coordinate[]

	getNumPoints() {
		return this.getCoordinates().length
	}

	/** Bounding envelope, or null for an empty geometry. */
	getEnvelope(): Envelope | null {
		return Envelope.fromCoordinates(this.getCoordinates())
	}
}

export class Point extends Geometry {
	readonly type = "Point"
	readonly coordinate: Coordinate | null

	constructor(coordinate: Coordinate | null, srid?: number) {
		super(srid)
		this.coordinate = coordinate ? copyCoordinate(coordinate) : null
	}

	get x() {
		assertValue(this.coordinate, "Empty point has no X ordinate")
		return this.coordinate.x
	}

	get y() {
		assertValue(this.coordinate, "Empty point has no Y ordinate")
		return this.coordinate.y
	}

	isEmpty() {
		return this.coordinate === null
	}

	getCoordinates() {
		return this.coordinate ? [this.coordinate] : []
	}
}

export class LineString extends Geometry {
	readonly type = "LineString"
	readonly coordinates: readonly Coordinate[]

	constructor(coordinates: readonly Coordinate[], srid?: number) {
		super(srid)
		this.coordinates = coordinates.map(copyCoordinate)
	}

	isEmpty() {
		return this.coordinates.length === 0
	}

	isClosed() {
		const first = this.coordinates[0]
		const last = this.coordinates[this.coordinates.length - 1]
		if (!first || !last) return false
		return equals2D(first, last)
	}

	getCoordinates() {
		return [...this.coordinates]
	}
}

/**
 * A closed line string bounding a polygon shell or hole. Either empty, or at
 * least four coordinates with the first equal to the last.
 */
export class LinearRing extends LineString {
	static readonly MINIMUM_VALID_SIZE = 4

	constructor(coordinates: readonly Coordinate[], srid?: number) {
		super(coordinates, srid)
		if (this.isEmpty()) return
		if (!this.isClosed()) {
			throw Error("Points of LinearRing do not form a closed linestring")
		}
		if (this.coordinates.length < LinearRing.MINIMUM_VALID_SIZE) {
			throw Error(
				`Invalid number of points in LinearRing (found ${this.coordinates.length} - must be 0 or >= ${LinearRing.MINIMUM_VALID_SIZE})`,
			)
		}
	}
}

export class Polygon extends Geometry {
	readonly type = "Polygon"
	readonly shell: LinearRing
	readonly holes: readonly LinearRing[]

	constructor(
		shell: LinearRing,
		holes: readonly LinearRing[] = [],
		srid?: number,
	) {
		super(srid)
		if (shell.isEmpty() && holes.some((hole) => !hole.isEmpty())) {
			throw Error("shell is empty but holes are not")
		}
		this.shell = shell
		this.holes = [...holes]
	}

	isEmpty() {
		return this.shell.isEmpty()
	}

	getCoordinates() {
		return [
			...this.shell.coordinates,
			...this.holes.flatMap((hole) => hole.coordinates),
		]
	}

	/** Holes lie inside the shell, so its envelope covers the polygon. */
	getEnvelope() {
		return this.shell.getEnvelope()
	}
}

/** Type tags of a geometry collection and of the multi kinds built on it. */
export type CollectionType =
	| "MultiPoint"
	| "MultiLineString"
	| "MultiPolygon"
	| "GeometryCollection"

/**
 * Ordered list of other geometries. The multi kinds are collections whose
 * members are all of one kind.
 */
export class GeometryCollection<T extends Geometry = Geometry> extends Geometry {
	readonly type: CollectionType = "GeometryCollection"
	readonly geometries: readonly T[]

	constructor(geometries: readonly T[], srid?: number) {
		super(srid)
		this.geometries = [...geometries]
	}

	getNumGeometries() {
		return this.geometries.length
	}

	getGeometryN(index: number): T {
		const geometry = this.geometries[index]
		assertValue(geometry, `No geometry at index ${index}`)
		return geometry
	}

	isEmpty() {
		return this.geometries.every((geometry) => geometry.isEmpty())
	}

	getCoordinates() {
		return this.geometries.flatMap((geometry) => geometry.getCoordinates())
	}
}

export class MultiPoint extends GeometryCollection<Point> {
	readonly type = "MultiPoint"
}

export class MultiLineString extends GeometryCollection<LineString> {
	readonly type = "MultiLineString"
}

export class MultiPolygon extends GeometryCollection<Polygon> {
	readonly type = "MultiPolygon"
}

/**
 * Any constructor of a geometry class, including abstract ones. Used to ask
 * for a geometry of a particular class or one of its subclasses.
 */
export type GeometryClass<T extends Geometry = Geometry> = abstract new (
	...args: never[]
) => T
