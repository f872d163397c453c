/**
 * Fixed-width integer helpers for scaled coordinates.
 *
 * Coordinates are stored as signed 32-bit integers after scaling by a power of
 * ten. At 1e7 the whole longitude range (±1.8e9) still fits.
 *
 * @module
 */

export const INT32_MIN = -(2 ** 31)
export const INT32_MAX = 2 ** 31 - 1

/** Largest unsigned value a zigzag-mapped int32 can take. */
export const UINT32_MAX = 2 ** 32 - 1

/**
 * Check that a value is an integer within the signed 32-bit range.
 */
export function isInt32(value: number): boolean {
	return Number.isInteger(value) && value >= INT32_MIN && value <= INT32_MAX
}

/**
 * Round to the nearest integer, ties away from zero.
 * `Math.round` alone rounds -2.5 to -2; this returns -3. Never returns -0.
 *
 * @example
 * ```ts
 * roundHalfAwayFromZero(2.5) // 3
 * roundHalfAwayFromZero(-2.5) // -3
 * ```
 */
export function roundHalfAwayFromZero(value: number): number {
	const rounded = value < 0 ? -Math.round(-value) : Math.round(value)
	return rounded === 0 ? 0 : rounded
}

/**
 * Scale a real value to a whole number: multiply by `scale` and round.
 */
export function toScaled(value: number, scale: number): number {
	return roundHalfAwayFromZero(value * scale)
}

/**
 * Convert a scaled whole number back to a real value by multiplying with the
 * reciprocal scale.
 */
export function fromScaled(scaled: number, reciprocal: number): number {
	return scaled * reciprocal
}
