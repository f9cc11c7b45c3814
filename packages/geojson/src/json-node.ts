/**
 * Introspection of the plain JSON value tree produced by `JSON.parse`.
 *
 * @module
 */

/** Kind of a JSON node, as reported in error messages. */
export type JsonNodeType =
	| "ARRAY"
	| "OBJECT"
	| "STRING"
	| "NUMBER"
	| "BOOLEAN"
	| "NULL"
	| "MISSING"

export type JsonObject = { [key: string]: unknown }

/** Classify a value read from a JSON tree. `undefined` is an absent member. */
export function jsonNodeType(node: unknown): JsonNodeType {
	if (node === undefined) return "MISSING"
	if (node === null) return "NULL"
	if (Array.isArray(node)) return "ARRAY"
	switch (typeof node) {
		case "string":
			return "STRING"
		case "number":
		case "bigint":
			return "NUMBER"
		case "boolean":
			return "BOOLEAN"
		default:
			return "OBJECT"
	}
}

/** Type guard: a JSON object (not null, not an array). */
export function isJsonObject(node: unknown): node is JsonObject {
	return typeof node === "object" && node !== null && !Array.isArray(node)
}

/** Render a node for a diagnostic message. */
export function describeJsonNode(node: unknown) {
	return node === undefined ? "undefined" : JSON.stringify(node)
}
