/**
 * Read position over an encoded shape.
 *
 * @module
 */

import { ShapeCodecError } from "./errors"
import type { EncodedInput } from "./options"

/**
 * Forward-only cursor over a string or byte array, bounded by `end`.
 * Strings are read one UTF-16 code unit at a time; the sample decoders decide
 * which code units are valid for their format.
 */
export class ShapeCursor {
	readonly input: EncodedInput
	readonly end: number
	position: number

	constructor(input: EncodedInput, begin = 0, end = input.length) {
		if (begin < 0 || end > input.length || begin > end) {
			throw new RangeError(
				`Invalid range [${begin}, ${end}) for input of length ${input.length}`,
			)
		}
		this.input = input
		this.position = begin
		this.end = end
	}

	isAtEnd(): boolean {
		return this.position >= this.end
	}

	/**
	 * Read the next code unit or byte and advance.
	 * @throws ShapeCodecError (`malformed`) when the cursor is already at the end.
	 */
	next(): number {
		if (this.isAtEnd()) throw ShapeCodecError.truncated(this.position)
		const index = this.position++
		if (typeof this.input === "string") return this.input.charCodeAt(index)
		const byte = this.input[index]
		if (byte === undefined) throw ShapeCodecError.truncated(index)
		return byte
	}
}
