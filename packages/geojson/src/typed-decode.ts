import type { Geometry, GeometryClass } from "@geobind/geometry"
import { TypeMismatchError } from "./errors"
import type { GeometryDecoder } from "./geometry-decoder"

/**
 * Check that a decoded geometry is an instance of `geometryClass` (or of a
 * subclass). `null` passes through.
 * @throws TypeMismatchError naming the expected and the actual class.
 */
export function assertGeometryClass<T extends Geometry>(
	geometry: Geometry | null,
	geometryClass: GeometryClass<T>,
): T | null {
	if (geometry === null) return null
	if (geometry instanceof geometryClass) return geometry
	throw new TypeMismatchError(geometryClass.name, geometry.constructor.name)
}

/**
 * Decode a node and require the result to be a `geometryClass`.
 *
 * @example
 * ```ts
 * const polygon = decodeAs(decoder, node, Polygon) // Polygon | null
 * ```
 */
export function decodeAs<T extends Geometry>(
	decoder: GeometryDecoder,
	node: unknown,
	geometryClass: GeometryClass<T>,
): T | null {
	return assertGeometryClass(decoder.decode(node), geometryClass)
}

/** Bind `decodeAs` to one decoder and class. */
export function typedDecoder<T extends Geometry>(
	decoder: GeometryDecoder,
	geometryClass: GeometryClass<T>,
): (node: unknown) => T | null {
	return (node) => decodeAs(decoder, node, geometryClass)
}
