import { type Coordinate, hasZ } from "@geobind/geometry"
import type { Logger } from "@geobind/shared/types"
import type { Position } from "geojson"
import { DEFAULT_DECIMAL_PLACES, MAX_DECIMAL_PLACES } from "./constants"
import { InvalidConfigurationError, MalformedCoordinatesError } from "./errors"
import { describeJsonNode, isJsonObject, jsonNodeType } from "./json-node"

/**
 * Read one ordinate. Anything but a JSON number is rejected with the kind of
 * node that was found.
 */
function decodeOrdinate(node: unknown): number {
	if (typeof node !== "number") {
		throw new MalformedCoordinatesError(
			`Invalid coordinates, expecting numbers but got: ${jsonNodeType(node)}`,
		)
	}
	return node
}

/**
 * Converts single coordinates to and from GeoJSON positions.
 *
 * Encoded ordinates are rounded half-up to at most `decimalPlaces` fraction
 * digits. Trailing zeros are dropped, so `2.0` encodes as `2`.
 */
export class CoordinateCodec {
	readonly decimalPlaces: number
	private readonly log: Logger

	constructor(decimalPlaces = DEFAULT_DECIMAL_PLACES, log: Logger = console.warn) {
		if (decimalPlaces < 0) {
			throw new InvalidConfigurationError("decimalPlaces < 0")
		}
		if (!Number.isInteger(decimalPlaces)) {
			throw new InvalidConfigurationError(
				`decimalPlaces must be an integer, got ${decimalPlaces}`,
			)
		}
		if (decimalPlaces > MAX_DECIMAL_PLACES) {
			throw new InvalidConfigurationError(`decimalPlaces > ${MAX_DECIMAL_PLACES}`)
		}
		this.decimalPlaces = decimalPlaces
		this.log = log
	}

	/**
	 * Round an ordinate. `toFixed` works on the exact binary value and breaks
	 * ties away from zero, which is half-up rounding.
	 */
	format(value: number): number {
		return Number(value.toFixed(this.decimalPlaces))
	}

	/** Encode x, y and, when finite, z. */
	encode(coordinate: Coordinate): Position {
		const position = [this.format(coordinate.x), this.format(coordinate.y)]
		if (hasZ(coordinate)) position.push(this.format(coordinate.z))
		return position
	}

	/**
	 * Decode either a position array `[x, y, z?]` or an object `{ x, y, z? }`.
	 * Array elements past the Z ordinate are dropped.
	 */
	decode(node: unknown): Coordinate {
		if (Array.isArray(node)) {
			if (node.length < 2) {
				throw new MalformedCoordinatesError(
					`Invalid number of ordinates: ${node.length}`,
				)
			}
			const x = decodeOrdinate(node[0])
			const y = decodeOrdinate(node[1])
			if (node.length < 3) return { x, y }
			if (node.length > 3) {
				this.log(`Dropping ${node.length - 3} ordinate(s) beyond Z`)
			}
			return { x, y, z: decodeOrdinate(node[2]) }
		}
		if (isJsonObject(node)) {
			const x = decodeOrdinate(node["x"])
			const y = decodeOrdinate(node["y"])
			const z = node["z"]
			if (z === undefined || z === null) return { x, y }
			return { x, y, z: decodeOrdinate(z) }
		}
		throw new MalformedCoordinatesError(
			`Unknown coordinates format: ${describeJsonNode(node)}`,
		)
	}
}
