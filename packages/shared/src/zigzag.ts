/**
 * Zigzag mapping between signed and unsigned integers.
 *
 * Interleaves negative and positive values so that small magnitudes map to
 * small unsigned values: 0 -> 0, -1 -> 1, 1 -> 2, -2 -> 3, 2 -> 4.
 *
 * @module
 */

/**
 * Zigzag encode a number using arithmetic operations.
 * Equivalent to `n < 0 ? ~(n << 1) : n << 1` for 32-bit inputs, but the result
 * stays unsigned for the whole int32 range (up to 2^32 - 1).
 */
export function zigzag(num: number): number {
	return num < 0 ? -2 * num - 1 : 2 * num
}

/**
 * Decode zigzag-encoded number back to original value.
 * Arithmetic rather than bitwise so that values above 2^31 decode correctly.
 *
 * Formula: (encoded & 1) === 1 ? -(encoded + 1) / 2 : encoded / 2
 */
export function decodeZigzag(encoded: number): number {
	return (encoded & 1) === 1 ? -(encoded + 1) / 2 : encoded / 2
}
