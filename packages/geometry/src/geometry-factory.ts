import type { Coordinate } from "./coordinate"
import {
	type Geometry,
	GeometryCollection,
	LinearRing,
	LineString,
	MultiLineString,
	MultiPoint,
	MultiPolygon,
	Point,
	Polygon,
} from "./geometries"

export interface GeometryFactoryOptions {
	/** Spatial reference id stamped on every geometry built. Defaults to 0. */
	srid?: number
}

/**
 * Builds geometries that share one spatial reference id. Holds no state beyond
 * its options, so a single instance can serve any number of callers.
 */
export class GeometryFactory {
	readonly srid: number

	constructor({ srid = 0 }: GeometryFactoryOptions = {}) {
		this.srid = srid
	}

	/** Build a point. A null or absent coordinate builds an empty point. */
	createPoint(coordinate: Coordinate | null = null) {
		return new Point(coordinate, this.srid)
	}

	createLineString(coordinates: readonly Coordinate[] = []) {
		return new LineString(coordinates, this.srid)
	}

	/**
	 * Build a closed ring.
	 * @throws Error if the coordinates are not closed or there are fewer than four.
	 */
	createLinearRing(coordinates: readonly Coordinate[] = []) {
		return new LinearRing(coordinates, this.srid)
	}

	/** Build a polygon. Without a shell the polygon is empty. */
	createPolygon(
		shell: LinearRing | null = null,
		holes: readonly LinearRing[] = [],
	) {
		return new Polygon(shell ?? this.createLinearRing(), holes, this.srid)
	}

	createMultiPoint(points: readonly Point[] = []) {
		return new MultiPoint(points, this.srid)
	}

	createMultiPointFromCoords(coordinates: readonly Coordinate[]) {
		return this.createMultiPoint(coordinates.map((c) => this.createPoint(c)))
	}

	createMultiLineString(lineStrings: readonly LineString[] = []) {
		return new MultiLineString(lineStrings, this.srid)
	}

	createMultiPolygon(polygons: readonly Polygon[] = []) {
		return new MultiPolygon(polygons, this.srid)
	}

	createGeometryCollection(geometries: readonly Geometry[] = []) {
		return new GeometryCollection(geometries, this.srid)
	}
}
