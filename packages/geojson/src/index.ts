/**
 * @geobind/geojson - Encode and decode geometries as GeoJSON.
 *
 * Converts between `@geobind/geometry` objects and GeoJSON geometry objects
 * (the plain values `JSON.parse` produces and `JSON.stringify` consumes):
 * - **Encode**: `GeometryEncoder` writes `type`, an optional `bbox` and the
 *   `coordinates` or `geometries` of each kind, rounding ordinates to a fixed
 *   number of decimal places.
 * - **Decode**: `GeometryDecoder` dispatches on `type` and rebuilds the
 *   geometry graph through a `GeometryFactory`, rejecting malformed input with
 *   typed errors.
 * - **Typed decode**: `decodeAs` and `typedDecoder` also require a class.
 * - **Bind**: `GeoJsonModule` wires both into `JSON.stringify` / `JSON.parse`.
 *
 * @example
 * ```ts
 * import { BoundingBoxPolicy, GeometryDecoder, GeometryEncoder } from "@geobind/geojson"
 *
 * const encoder = new GeometryEncoder({ boundingBoxPolicy: BoundingBoxPolicy.always() })
 * const json = encoder.encode(polygon)
 * const copy = new GeometryDecoder().decode(json)
 * ```
 *
 * @module @geobind/geojson
 */

export * from "./bounding-box-policy"
export * from "./constants"
export * from "./coordinate-codec"
export * from "./errors"
export * from "./geometry-decoder"
export * from "./geometry-encoder"
export * from "./geometry-kind"
export * from "./json-node"
export * from "./module"
export * from "./typed-decode"
export * from "./types"
