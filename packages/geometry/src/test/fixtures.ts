/**
 * Geometries shared by the test suites of every package.
 */

import type { Coordinate } from "../coordinate"
import { GeometryFactory } from "../geometry-factory"

export const factory = new GeometryFactory({ srid: 4326 })

/** Closed square from (0, 0) to (10, 10). */
export const SHELL: Coordinate[] = [
	{ x: 0, y: 0 },
	{ x: 10, y: 0 },
	{ x: 10, y: 10 },
	{ x: 0, y: 10 },
	{ x: 0, y: 0 },
]

/** Closed square from (2, 2) to (4, 4), inside `SHELL`. */
export const HOLE: Coordinate[] = [
	{ x: 2, y: 2 },
	{ x: 4, y: 2 },
	{ x: 4, y: 4 },
	{ x: 2, y: 4 },
	{ x: 2, y: 2 },
]

/** Closed triangle from (20, 20) to (30, 25). */
export const TRIANGLE: Coordinate[] = [
	{ x: 20, y: 20 },
	{ x: 30, y: 20 },
	{ x: 25, y: 25 },
	{ x: 20, y: 20 },
]

export function squareWithHole() {
	return factory.createPolygon(factory.createLinearRing(SHELL), [
		factory.createLinearRing(HOLE),
	])
}

export function triangle() {
	return factory.createPolygon(factory.createLinearRing(TRIANGLE))
}

/**
 * One geometry of every kind, non-empty, nesting a collection. Also a multi
 * point with one empty member.
 */
export function everyKind() {
	const point = factory.createPoint({ x: 1.5, y: -2.25, z: 3 })
	const line = factory.createLineString([
		{ x: 0, y: 0 },
		{ x: 1, y: 1 },
		{ x: 2, y: 0 },
	])
	const polygon = squareWithHole()
	const multiPoint = factory.createMultiPointFromCoords([
		{ x: 5, y: 5 },
		{ x: 6, y: 7 },
	])
	const partlyEmptyMultiPoint = factory.createMultiPoint([
		factory.createPoint({ x: 1, y: 2 }),
		factory.createPoint(),
	])
	const multiLineString = factory.createMultiLineString([
		line,
		factory.createLineString([
			{ x: -1, y: -1 },
			{ x: -2, y: -3 },
		]),
	])
	const multiPolygon = factory.createMultiPolygon([polygon, triangle()])
	const collection = factory.createGeometryCollection([
		point,
		line,
		factory.createGeometryCollection([polygon]),
	])
	return {
		point,
		line,
		polygon,
		multiPoint,
		partlyEmptyMultiPoint,
		multiLineString,
		multiPolygon,
		collection,
	}
}

/** One empty geometry of every kind. */
export function everyEmptyKind() {
	return {
		point: factory.createPoint(),
		line: factory.createLineString(),
		polygon: factory.createPolygon(),
		multiPoint: factory.createMultiPoint(),
		multiLineString: factory.createMultiLineString(),
		multiPolygon: factory.createMultiPolygon(),
		collection: factory.createGeometryCollection(),
	}
}
