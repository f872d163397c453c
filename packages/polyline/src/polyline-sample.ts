/**
 * Encoded polyline value codec (5-bit chunks).
 *
 * Each signed value is zigzag mapped, split into 5-bit chunks from the least
 * significant end, flagged with 0x20 while more chunks follow, and biased by
 * 63 so every character lands in printable ASCII (63..126).
 *
 * @see https://developers.google.com/maps/documentation/utilities/polylinealgorithm
 *
 * @module
 */

import { isInt32, UINT32_MAX } from "@polyline-codec/shared/coordinates"
import { decodeZigzag, zigzag } from "@polyline-codec/shared/zigzag"
import type { ShapeCursor } from "./cursor"
import { ShapeCodecError } from "./errors"

export const POLYLINE_BIAS = 63
export const POLYLINE_CONTINUATION = 0x20
export const POLYLINE_CHUNK_MASK = 0x1f

/** Highest character a well-formed polyline may contain. */
export const POLYLINE_MAX_CHAR = POLYLINE_BIAS + 0x3f

// 7 chunks of 5 bits cover a zigzagged int32
const MAX_SHIFT = 30

/**
 * Append the characters for one signed delta to `output` as char codes.
 *
 * @throws ShapeCodecError (`overflow`) if `delta` is not an int32.
 */
export function encodePolylineSample(delta: number, output: number[]): void {
	if (!isInt32(delta)) throw ShapeCodecError.overflow("Delta", delta)
	let value = zigzag(delta)
	while (value >= POLYLINE_CONTINUATION) {
		output.push(
			(POLYLINE_CONTINUATION | (value & POLYLINE_CHUNK_MASK)) + POLYLINE_BIAS,
		)
		value >>>= 5
	}
	output.push(value + POLYLINE_BIAS)
}

/**
 * Decode one value from the cursor and add it to `previous`.
 *
 * @returns The absolute value, still scaled.
 * @throws ShapeCodecError (`malformed`) on truncated input or a character
 * outside 63..126, (`overflow`) when the value exceeds 32 bits.
 */
export function decodePolylineSample(
	cursor: ShapeCursor,
	previous: number,
): number {
	const start = cursor.position
	let result = 0
	let shift = 0
	let chunk: number
	do {
		const offset = cursor.position
		const code = cursor.next()
		if (code < POLYLINE_BIAS || code > POLYLINE_MAX_CHAR) {
			throw ShapeCodecError.invalidCharacter(code, offset)
		}
		if (shift > MAX_SHIFT) throw ShapeCodecError.runTooLong(start)
		chunk = code - POLYLINE_BIAS
		result += (chunk & POLYLINE_CHUNK_MASK) * 2 ** shift
		shift += 5
	} while (chunk & POLYLINE_CONTINUATION)

	if (result > UINT32_MAX) throw ShapeCodecError.runTooLong(start)
	const value = previous + decodeZigzag(result)
	if (!isInt32(value)) throw ShapeCodecError.overflow("Decoded value", value)
	return value
}
