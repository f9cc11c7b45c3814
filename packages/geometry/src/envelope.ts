import type { Bbox2D } from "@geobind/shared/types"
import type { Coordinate } from "./coordinate"

/**
 * Axis-aligned rectangle containing a set of coordinates.
 */
export class Envelope {
	constructor(
		readonly minX: number,
		readonly minY: number,
		readonly maxX: number,
		readonly maxY: number,
	) {}

	/**
	 * Build the smallest envelope containing every coordinate. Returns null when
	 * there are no coordinates.
	 */
	static fromCoordinates(coordinates: Iterable<Coordinate>): Envelope | null {
		let minX = Number.POSITIVE_INFINITY
		let minY = Number.POSITIVE_INFINITY
		let maxX = Number.NEGATIVE_INFINITY
		let maxY = Number.NEGATIVE_INFINITY
		let count = 0
		for (const { x, y } of coordinates) {
			if (x < minX) minX = x
			if (y < minY) minY = y
			if (x > maxX) maxX = x
			if (y > maxY) maxY = y
			count++
		}
		if (count === 0) return null
		return new Envelope(minX, minY, maxX, maxY)
	}

	toBbox(): Bbox2D {
		return [this.minX, this.minY, this.maxX, this.maxY]
	}
}
