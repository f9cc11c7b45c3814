/**
 * @geobind/geometry - Immutable vector geometry model.
 *
 * Points, line strings, polygons, their multi variants and heterogeneous
 * collections, each carrying a spatial reference id and an optional Z
 * ordinate per coordinate. Geometries are built through a `GeometryFactory`
 * so that every geometry in one graph shares the same SRID.
 *
 * @example
 * ```ts
 * import { GeometryFactory } from "@geobind/geometry"
 *
 * const factory = new GeometryFactory({ srid: 4326 })
 * const shell = factory.createLinearRing([
 *   { x: 0, y: 0 }, { x: 1, y: 0 }, { x: 1, y: 1 }, { x: 0, y: 0 },
 * ])
 * const polygon = factory.createPolygon(shell)
 * polygon.getEnvelope()?.toBbox() // [0, 0, 1, 1]
 * ```
 *
 * @module @geobind/geometry
 */

export * from "./coordinate"
export * from "./envelope"
export * from "./geometries"
export * from "./geometry-factory"
export * from "./utils"
