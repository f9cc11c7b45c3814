/**
 * Assertion utilities.
 *
 * Typed helpers that throw when a condition is not met, used for index
 * access and null/undefined guards inside the geometry model and codec.
 *
 * @module
 */

/**
 * Assert that a value is neither null nor undefined.
 *
 * @param value - The value to check.
 * @param message - Optional error message if assertion fails.
 * @throws Error if value is null or undefined.
 *
 * @example
 * ```ts
 * const ring = rings[index]
 * assertValue(ring, `No ring at index ${index}`)
 * // TypeScript now knows ring is non-nullable
 * ```
 */
export function assertValue<T>(
	value?: T,
	message?: string,
): asserts value is NonNullable<T> {
	if (value === undefined || value === null) {
		throw Error(message ?? "Value is undefined or null")
	}
}

/**
 * Mark a branch that the type checker has proven unreachable. Throws if it is
 * reached at runtime anyway.
 */
export function assertUnreachable(value: never, message?: string): never {
	throw Error(message ?? `Unexpected value: ${String(value)}`)
}
