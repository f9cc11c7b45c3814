import {
	type Coordinate,
	type Geometry,
	GeometryFactory,
	type LinearRing,
	type LineString,
	type Polygon,
} from "@geobind/geometry"
import { assertUnreachable } from "@geobind/shared/assert"
import { CoordinateCodec } from "./coordinate-codec"
import { DEFAULT_MAX_DEPTH, DEFAULT_SRID, Field } from "./constants"
import {
	InvalidConfigurationError,
	MalformedCoordinatesError,
	MalformedGeometryError,
	UnknownGeometryTypeError,
} from "./errors"
import { parseGeometryKind } from "./geometry-kind"
import {
	describeJsonNode,
	isJsonObject,
	type JsonObject,
	jsonNodeType,
} from "./json-node"
import type { GeometryDecoderOptions } from "./types"

/**
 * Require an array where the GeoJSON structure needs one.
 * @param name - Member being read, used in the error message.
 */
function requireArray(node: unknown, name: string): unknown[] {
	if (!Array.isArray(node)) {
		throw new MalformedCoordinatesError(
			`Invalid ${name}, expecting an array but got: ${jsonNodeType(node)}`,
		)
	}
	return node
}

/**
 * Decodes GeoJSON geometry objects into geometries.
 *
 * Walks the JSON tree top-down, dispatching on the `type` member of every
 * geometry object. Every geometry of one decode call is built by the same
 * factory. Input is either fully decoded or rejected with a `GeoJsonError`;
 * ring closure errors from the factory propagate as they are.
 *
 * @example
 * ```ts
 * const decoder = new GeometryDecoder()
 * const point = decoder.decode(JSON.parse('{"type":"Point","coordinates":[1,2]}'))
 * point?.srid // 4326
 * ```
 */
export class GeometryDecoder {
	readonly geometryFactory: GeometryFactory
	readonly maxDepth: number
	private coordinates: CoordinateCodec

	constructor({
		geometryFactory = new GeometryFactory({ srid: DEFAULT_SRID }),
		maxDepth = DEFAULT_MAX_DEPTH,
		log = console.warn,
	}: GeometryDecoderOptions = {}) {
		if (!(maxDepth >= 1)) {
			throw new InvalidConfigurationError(`maxDepth must be at least 1, got ${maxDepth}`)
		}
		this.geometryFactory = geometryFactory
		this.maxDepth = maxDepth
		this.coordinates = new CoordinateCodec(undefined, log)
	}

	/** Decode a geometry object. JSON `null` decodes to `null`. */
	decode(node: unknown): Geometry | null {
		if (node === null) return null
		return this.decodeGeometry(node, 1)
	}

	private decodeGeometry(node: unknown, depth: number): Geometry {
		if (depth > this.maxDepth) {
			throw new MalformedGeometryError(
				`Maximum geometry nesting depth of ${this.maxDepth} exceeded`,
			)
		}
		if (!isJsonObject(node)) {
			throw new MalformedGeometryError(
				`Invalid geometry, expecting an object but got: ${jsonNodeType(node)}`,
			)
		}
		const typeName = node[Field.TYPE]
		const kind = parseGeometryKind(typeName)
		if (kind === undefined) {
			throw new UnknownGeometryTypeError(
				typeof typeName === "string" ? typeName : describeJsonNode(typeName),
			)
		}

		const factory = this.geometryFactory
		switch (kind) {
			case "Point":
				return this.decodePoint(this.coordinatesOf(node))
			case "LineString":
				return this.decodeLineString(this.coordinatesOf(node))
			case "Polygon":
				return this.decodePolygon(this.coordinatesOf(node))
			case "MultiPoint":
				return factory.createMultiPoint(
					this.coordinatesOf(node).map((position) => this.decodePoint(position)),
				)
			case "MultiLineString":
				return factory.createMultiLineString(
					this.coordinatesOf(node).map((line) => this.decodeLineString(line)),
				)
			case "MultiPolygon":
				return factory.createMultiPolygon(
					this.coordinatesOf(node).map((rings) => this.decodePolygon(rings)),
				)
			case "GeometryCollection":
				return factory.createGeometryCollection(
					this.geometriesOf(node).map((child) =>
						this.decodeGeometry(child, depth + 1),
					),
				)
			default:
				return assertUnreachable(kind)
		}
	}

	private coordinatesOf(node: JsonObject): unknown[] {
		return requireArray(node[Field.COORDINATES], Field.COORDINATES)
	}

	/** An absent `geometries` member is an empty collection. */
	private geometriesOf(node: JsonObject): unknown[] {
		const geometries = node[Field.GEOMETRIES]
		if (geometries === undefined) return []
		return requireArray(geometries, Field.GEOMETRIES)
	}

	/** An empty position is an empty point. */
	private decodePoint(position: unknown) {
		if (Array.isArray(position) && position.length === 0) {
			return this.geometryFactory.createPoint()
		}
		return this.geometryFactory.createPoint(this.coordinates.decode(position))
	}

	private decodeCoordinates(node: unknown): Coordinate[] {
		return requireArray(node, Field.COORDINATES).map((position) =>
			this.coordinates.decode(position),
		)
	}

	private decodeLineString(node: unknown): LineString {
		return this.geometryFactory.createLineString(this.decodeCoordinates(node))
	}

	private decodeLinearRing(node: unknown): LinearRing {
		return this.geometryFactory.createLinearRing(this.decodeCoordinates(node))
	}

	/** First ring is the shell, the rest are holes. No rings is an empty polygon. */
	private decodePolygon(node: unknown): Polygon {
		const [shell, ...holes] = requireArray(node, Field.COORDINATES)
		if (shell === undefined) return this.geometryFactory.createPolygon()
		return this.geometryFactory.createPolygon(
			this.decodeLinearRing(shell),
			holes.map((hole) => this.decodeLinearRing(hole)),
		)
	}
}
