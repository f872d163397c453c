/**
 * Errors raised by the shape codecs.
 *
 * Every failure carries a `kind` so callers can tell malformed input apart
 * from an exhausted decoder or an out-of-range value without parsing messages.
 *
 * @module
 */

export type ShapeCodecErrorKind =
	/** Input ends mid-value, lacks a longitude, or holds an invalid character. */
	| "malformed"
	/** `pop()` was called on a decoder with no input left. */
	| "exhausted"
	/** A scaled coordinate, delta or decoded value left the signed 32-bit range. */
	| "overflow"
	/** Precision is not a positive finite number. */
	| "precision"
	/** An input coordinate or sample is not a finite number. */
	| "coordinate"

export class ShapeCodecError extends Error {
	constructor(
		public kind: ShapeCodecErrorKind,
		message: string,
	) {
		super(message)
		this.name = "ShapeCodecError"
	}

	static truncated(offset: number): ShapeCodecError {
		return new ShapeCodecError(
			"malformed",
			`Bad encoded shape: unexpected end of input at offset ${offset}`,
		)
	}

	static invalidCharacter(code: number, offset: number): ShapeCodecError {
		return new ShapeCodecError(
			"malformed",
			`Bad encoded shape: invalid character code ${code} at offset ${offset}`,
		)
	}

	static missingLongitude(offset: number): ShapeCodecError {
		return new ShapeCodecError(
			"malformed",
			`Bad encoded shape: latitude without longitude at offset ${offset}`,
		)
	}

	static exhausted(): ShapeCodecError {
		return new ShapeCodecError("exhausted", "Decoder is exhausted")
	}

	static overflow(what: string, value: number): ShapeCodecError {
		return new ShapeCodecError(
			"overflow",
			`${what} ${value} does not fit in a signed 32-bit integer`,
		)
	}

	static runTooLong(offset: number): ShapeCodecError {
		return new ShapeCodecError(
			"overflow",
			`Encoded value starting at offset ${offset} is wider than 32 bits`,
		)
	}

	static precision(value: number): ShapeCodecError {
		return new ShapeCodecError(
			"precision",
			`Precision must be a positive finite number, got ${value}`,
		)
	}

	static coordinate(value: number, index: number): ShapeCodecError {
		return new ShapeCodecError(
			"coordinate",
			`Value at index ${index} is not a finite number: ${value}`,
		)
	}
}
