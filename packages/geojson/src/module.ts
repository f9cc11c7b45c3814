import { Geometry, type GeometryClass } from "@geobind/geometry"
import { GeometryDecoder } from "./geometry-decoder"
import { GeometryEncoder } from "./geometry-encoder"
import { assertGeometryClass, typedDecoder } from "./typed-decode"
import type { GeoJsonModuleOptions } from "./types"

/** Property names mapped to the geometry class expected under them. */
export type GeometryFields = Record<string, GeometryClass>

/**
 * Plugs the codec into `JSON.stringify` and `JSON.parse`.
 *
 * One module holds one encoder and one decoder configured from the same
 * options. Both are immutable and can be shared freely.
 *
 * @example
 * ```ts
 * const geojson = new GeoJsonModule({ boundingBoxPolicy: BoundingBoxPolicy.exceptPoints() })
 *
 * // Geometries anywhere in a value are written as GeoJSON
 * const text = JSON.stringify({ id: 1, area: polygon }, geojson.replacer)
 *
 * // Named properties are read back as geometries of the given class
 * const record = geojson.parse(text, { area: Polygon })
 * ```
 */
export class GeoJsonModule {
	readonly encoder: GeometryEncoder
	readonly decoder: GeometryDecoder

	constructor(options: GeoJsonModuleOptions = {}) {
		this.encoder = new GeometryEncoder(options)
		this.decoder = new GeometryDecoder(options)
	}

	serialize(geometry: Geometry | null): string {
		return JSON.stringify(this.encoder.encode(geometry))
	}

	deserialize(text: string): Geometry | null {
		return this.decoder.decode(JSON.parse(text))
	}

	/** A deserializer that only accepts geometries of `geometryClass`. */
	deserializerFor<T extends Geometry>(
		geometryClass: GeometryClass<T>,
	): (text: string) => T | null {
		const decode = typedDecoder(this.decoder, geometryClass)
		return (text) => decode(JSON.parse(text))
	}

	/** `JSON.stringify` replacer encoding every geometry it meets. */
	replacer = (_key: string, value: unknown): unknown => {
		return value instanceof Geometry ? this.encoder.encode(value) : value
	}

	/**
	 * `JSON.parse` reviver decoding every property whose name is in `fields`,
	 * checked against the class mapped to that name.
	 */
	reviver(fields: GeometryFields) {
		return (key: string, value: unknown): unknown => {
			const geometryClass = fields[key]
			if (geometryClass === undefined || !Object.hasOwn(fields, key)) {
				return value
			}
			return assertGeometryClass(this.decoder.decode(value), geometryClass)
		}
	}

	/** `JSON.parse` with `reviver(fields)`. */
	parse(text: string, fields: GeometryFields): unknown {
		return JSON.parse(text, this.reviver(fields))
	}
}
