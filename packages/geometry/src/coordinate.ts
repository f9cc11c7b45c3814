/**
 * A position in a planar coordinate system. `z` is optional and only counts
 * when it is a finite number.
 */
export interface Coordinate {
	readonly x: number
	readonly y: number
	readonly z?: number
}

/** Check if a coordinate carries a usable Z ordinate. */
export function hasZ(coordinate: Coordinate): coordinate is Required<Coordinate> {
	return coordinate.z !== undefined && Number.isFinite(coordinate.z)
}

/**
 * Copy a coordinate, dropping a Z ordinate that is not finite.
 */
export function copyCoordinate(coordinate: Coordinate): Coordinate {
	return hasZ(coordinate)
		? { x: coordinate.x, y: coordinate.y, z: coordinate.z }
		: { x: coordinate.x, y: coordinate.y }
}

/** Compare the X and Y ordinates of two coordinates. */
export function equals2D(a: Coordinate, b: Coordinate) {
	return a.x === b.x && a.y === b.y
}
