/**
 * Varint value codec (7-bit chunks).
 *
 * Same zigzag and delta scheme as the polyline codec, but values are written
 * as little-endian base-128 groups: the low 7 bits of each byte carry data and
 * the high bit (0x80) marks that another byte follows. Bytes are not biased,
 * so the output is binary and needs a byte-safe transport.
 *
 * @module
 */

import { isInt32, UINT32_MAX } from "@polyline-codec/shared/coordinates"
import { decodeZigzag, zigzag } from "@polyline-codec/shared/zigzag"
import type { ShapeCursor } from "./cursor"
import { ShapeCodecError } from "./errors"

export const VARINT_CONTINUATION = 0x80
export const VARINT_CHUNK_MASK = 0x7f

// 5 chunks of 7 bits cover a zigzagged int32
const MAX_SHIFT = 28

/**
 * Append the bytes for one sample, already scaled to a whole number.
 *
 * @throws ShapeCodecError (`overflow`) if `value` is not an int32.
 */
export function encode7Sample(value: number, output: number[]): void {
	if (!isInt32(value)) throw ShapeCodecError.overflow("Delta", value)
	let remaining = zigzag(value)
	while (remaining > VARINT_CHUNK_MASK) {
		output.push(VARINT_CONTINUATION | (remaining & VARINT_CHUNK_MASK))
		remaining >>>= 7
	}
	output.push(remaining)
}

/**
 * Decode one sample from the cursor and add it to `previous`.
 *
 * @returns The absolute value, still scaled.
 * @throws ShapeCodecError (`malformed`) on truncated input or a string code
 * unit above 0xff, (`overflow`) when the value exceeds 32 bits.
 */
export function decode7Sample(cursor: ShapeCursor, previous: number): number {
	const start = cursor.position
	let result = 0
	let shift = 0
	let byte: number
	do {
		const offset = cursor.position
		byte = cursor.next()
		if (byte > 0xff) throw ShapeCodecError.invalidCharacter(byte, offset)
		if (shift > MAX_SHIFT) throw ShapeCodecError.runTooLong(start)
		result += (byte & VARINT_CHUNK_MASK) * 2 ** shift
		shift += 7
	} while (byte & VARINT_CONTINUATION)

	if (result > UINT32_MAX) throw ShapeCodecError.runTooLong(start)
	const decoded = previous + decodeZigzag(result)
	if (!isInt32(decoded)) throw ShapeCodecError.overflow("Decoded value", decoded)
	return decoded
}
