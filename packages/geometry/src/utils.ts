/**
 * Geometry comparison utilities.
 *
 * @module
 */

import { dequal } from "dequal/lite"
import type { Geometry } from "./geometries"

/**
 * Check if two geometries are structurally equal: same class, same SRID and
 * the same coordinates and children in the same order.
 */
export function geometryEquals(a: Geometry, b: Geometry) {
	return dequal(a, b)
}
