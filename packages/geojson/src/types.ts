/**
 * Option types for the codec components.
 * @module
 */

import type { GeometryFactory } from "@geobind/geometry"
import type { Logger } from "@geobind/shared/types"
import type { BoundingBoxPolicy } from "./bounding-box-policy"

export interface GeometryEncoderOptions {
	/** Which kinds carry a `bbox`. Defaults to `BoundingBoxPolicy.never()`. */
	boundingBoxPolicy?: BoundingBoxPolicy
	/** Fraction digits kept per ordinate. Defaults to 8. */
	decimalPlaces?: number
}

export interface GeometryDecoderOptions {
	/**
	 * Builds every geometry of a decode call. Defaults to a factory with
	 * SRID 4326.
	 */
	geometryFactory?: GeometryFactory
	/**
	 * Deepest geometry nesting accepted. The top-level geometry is at depth 1
	 * and each GeometryCollection adds one for its members. Unbounded by
	 * default.
	 */
	maxDepth?: number
	/** Receives warnings about dropped input. Defaults to `console.warn`. */
	log?: Logger
}

export interface GeoJsonModuleOptions
	extends GeometryEncoderOptions,
		GeometryDecoderOptions {}
