/**
 * Narrow `value` to a present value, or throw.
 *
 * Indexed reads are typed `T | undefined` in this project, so lookups that
 * are known to hit (an id for a decoded element, the first geometry of a
 * non-empty batch) go through here.
 *
 * @example
 * ```ts
 * const id = ids[index]
 * assertValue(id, `No id for element ${index}`)
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
