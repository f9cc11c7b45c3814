import type { Geometry } from "@geobind/geometry"
import {
	GEOMETRY_KINDS,
	type GeometryKind,
	geometryKindMask,
	geometryKindOf,
} from "./geometry-kind"

/**
 * Which geometry kinds are encoded with a `bbox` member.
 *
 * Immutable: every builder method returns a new policy, so a single policy can
 * be shared by any number of encoders.
 *
 * @example
 * ```ts
 * const policy = BoundingBoxPolicy.never().forPolygon().forMultiGeometry()
 * policy.shouldIncludeBoundingBoxFor("MultiPoint") // true
 * policy.shouldIncludeBoundingBoxFor("Point") // false
 * ```
 */
export class BoundingBoxPolicy {
	private constructor(private readonly mask: number) {}

	/** No kind carries a bounding box. */
	static never() {
		return new BoundingBoxPolicy(0)
	}

	/** Every kind carries a bounding box. */
	static always() {
		return GEOMETRY_KINDS.reduce(
			(policy, kind) => policy.include(kind),
			BoundingBoxPolicy.never(),
		)
	}

	/** Every kind except `Point` carries a bounding box. */
	static exceptPoints() {
		return BoundingBoxPolicy.never()
			.forLineString()
			.forPolygon()
			.forMultiGeometry()
	}

	include(kind: GeometryKind) {
		return new BoundingBoxPolicy(this.mask | geometryKindMask(kind))
	}

	forPoint() {
		return this.include("Point")
	}

	forLineString() {
		return this.include("LineString")
	}

	forPolygon() {
		return this.include("Polygon")
	}

	forMultiPoint() {
		return this.include("MultiPoint")
	}

	forMultiLineString() {
		return this.include("MultiLineString")
	}

	forMultiPolygon() {
		return this.include("MultiPolygon")
	}

	forGeometryCollection() {
		return this.include("GeometryCollection")
	}

	/** Include every kind that is a list of geometries. */
	forMultiGeometry() {
		return this.forMultiPoint()
			.forMultiLineString()
			.forMultiPolygon()
			.forGeometryCollection()
	}

	shouldIncludeBoundingBoxFor(kindOrGeometry: GeometryKind | Geometry) {
		const kind =
			typeof kindOrGeometry === "string"
				? kindOrGeometry
				: geometryKindOf(kindOrGeometry)
		if (kind === undefined) return false
		return (this.mask & geometryKindMask(kind)) !== 0
	}

	/** The kinds this policy includes, in GeoJSON order. */
	kinds(): GeometryKind[] {
		return GEOMETRY_KINDS.filter((kind) => this.shouldIncludeBoundingBoxFor(kind))
	}
}
