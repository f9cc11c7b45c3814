import {
	type Geometry,
	GeometryCollection,
	type GeometryType,
	LineString,
	MultiLineString,
	MultiPoint,
	MultiPolygon,
	Point,
	Polygon,
} from "@geobind/geometry"

/**
 * The seven GeoJSON geometry kinds. The position of each kind is its bit in a
 * kind set.
 */
export const GEOMETRY_KINDS = [
	"Point",
	"LineString",
	"Polygon",
	"MultiPoint",
	"MultiLineString",
	"MultiPolygon",
	"GeometryCollection",
] as const satisfies readonly GeometryType[]

export type GeometryKind = (typeof GEOMETRY_KINDS)[number]

/** Bit of a kind in a kind set. */
export function geometryKindMask(kind: GeometryKind) {
	return 1 << GEOMETRY_KINDS.indexOf(kind)
}

/** Look up a kind by its GeoJSON `type` tag. */
export function parseGeometryKind(value: unknown): GeometryKind | undefined {
	return GEOMETRY_KINDS.find((kind) => kind === value)
}

/**
 * Kind of a geometry instance, or undefined if its class is not one of the
 * seven kinds. A `LinearRing` is a `LineString` and each multi kind is more
 * specific than `GeometryCollection`.
 */
export function geometryKindOf(geometry: Geometry): GeometryKind | undefined {
	if (geometry instanceof Point) return "Point"
	if (geometry instanceof LineString) return "LineString"
	if (geometry instanceof Polygon) return "Polygon"
	if (geometry instanceof MultiPoint) return "MultiPoint"
	if (geometry instanceof MultiLineString) return "MultiLineString"
	if (geometry instanceof MultiPolygon) return "MultiPolygon"
	if (geometry instanceof GeometryCollection) return "GeometryCollection"
	return undefined
}
