import {
	type Geometry,
	GeometryCollection,
	LineString,
	MultiLineString,
	MultiPoint,
	MultiPolygon,
	Point,
	Polygon,
} from "@geobind/geometry"
import type * as GeoJSON from "geojson"
import { BoundingBoxPolicy } from "./bounding-box-policy"
import { CoordinateCodec } from "./coordinate-codec"
import { UnsupportedGeometryError } from "./errors"
import type { GeometryEncoderOptions } from "./types"

/**
 * Encodes geometries as GeoJSON geometry objects.
 *
 * Members are written in the order `type`, `bbox`, then `coordinates` or
 * `geometries`. A `bbox` is written only when the bounding box policy includes
 * the geometry's kind and the geometry is not empty. Its values are the raw
 * envelope, not rounded like the coordinates.
 *
 * @example
 * ```ts
 * const encoder = new GeometryEncoder({ decimalPlaces: 2 })
 * encoder.encode(factory.createPoint({ x: 1.123456789, y: 2 }))
 * // { type: "Point", coordinates: [1.12, 2] }
 * ```
 */
export class GeometryEncoder {
	readonly boundingBoxPolicy: BoundingBoxPolicy
	readonly coordinates: CoordinateCodec

	constructor({
		boundingBoxPolicy = BoundingBoxPolicy.never(),
		decimalPlaces,
	}: GeometryEncoderOptions = {}) {
		this.boundingBoxPolicy = boundingBoxPolicy
		this.coordinates = new CoordinateCodec(decimalPlaces)
	}

	encode(geometry: Geometry): GeoJSON.Geometry
	encode(geometry: Geometry | null): GeoJSON.Geometry | null
	encode(geometry: Geometry | null): GeoJSON.Geometry | null {
		if (geometry === null) return null
		if (geometry instanceof Point) {
			return {
				type: "Point",
				...this.boundingBox(geometry),
				coordinates: this.encodePoint(geometry),
			}
		}
		if (geometry instanceof LineString) {
			return {
				type: "LineString",
				...this.boundingBox(geometry),
				coordinates: this.encodeLineString(geometry),
			}
		}
		if (geometry instanceof Polygon) {
			return {
				type: "Polygon",
				...this.boundingBox(geometry),
				coordinates: this.encodePolygon(geometry),
			}
		}
		// Multi kinds before GeometryCollection, which they extend
		if (geometry instanceof MultiPoint) {
			return {
				type: "MultiPoint",
				...this.boundingBox(geometry),
				coordinates: geometry.geometries.map((point) => this.encodePoint(point)),
			}
		}
		if (geometry instanceof MultiLineString) {
			return {
				type: "MultiLineString",
				...this.boundingBox(geometry),
				coordinates: geometry.geometries.map((line) =>
					this.encodeLineString(line),
				),
			}
		}
		if (geometry instanceof MultiPolygon) {
			return {
				type: "MultiPolygon",
				...this.boundingBox(geometry),
				coordinates: geometry.geometries.map((polygon) =>
					this.encodePolygon(polygon),
				),
			}
		}
		if (geometry instanceof GeometryCollection) {
			return {
				type: "GeometryCollection",
				...this.boundingBox(geometry),
				geometries: geometry.geometries.map((child: Geometry) =>
					this.encode(child),
				),
			}
		}
		throw new UnsupportedGeometryError(geometry.constructor.name)
	}

	/** `{ bbox }` when one should be written, otherwise an empty object. */
	private boundingBox(geometry: Geometry): { bbox?: GeoJSON.BBox } {
		if (!this.boundingBoxPolicy.shouldIncludeBoundingBoxFor(geometry.type)) {
			return {}
		}
		const envelope = geometry.getEnvelope()
		return envelope ? { bbox: envelope.toBbox() } : {}
	}

	/** An empty point encodes as an empty position. */
	private encodePoint(point: Point): GeoJSON.Position {
		return point.coordinate ? this.coordinates.encode(point.coordinate) : []
	}

	private encodeLineString(line: LineString): GeoJSON.Position[] {
		return line.coordinates.map((c) => this.coordinates.encode(c))
	}

	/** Shell first, then holes. An empty polygon has no rings at all. */
	private encodePolygon(polygon: Polygon): GeoJSON.Position[][] {
		if (polygon.isEmpty()) return []
		return [polygon.shell, ...polygon.holes].map((ring) =>
			this.encodeLineString(ring),
		)
	}
}
