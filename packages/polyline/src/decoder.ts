/**
 * Streaming shape decoders.
 *
 * A decoder pulls one point at a time from an encoded shape. Each `pop()`
 * reads exactly two values, latitude then longitude, and adds them to the
 * running position.
 *
 * @example
 * ```ts
 * const decoder = new PolylineDecoder(shape, lonLatPoint)
 * while (!decoder.isEmpty()) {
 *   const [lon, lat] = decoder.pop()
 * }
 * ```
 *
 * @module
 */

import { ShapeCursor } from "./cursor"
import { DeltaTracker } from "./delta"
import { ShapeCodecError } from "./errors"
import { polylineCodec, type SampleCodec, sampleCodec, varintCodec } from "./formats"
import {
	assertPrecision,
	DEFAULT_DECODE_PRECISION,
	type EncodedInput,
	type PointFactory,
	type ShapeFormat,
} from "./options"

export abstract class ShapeDecoder<P> implements Iterable<P> {
	protected readonly cursor: ShapeCursor
	private readonly position = new DeltaTracker()

	constructor(
		input: EncodedInput,
		private readonly point: PointFactory<P>,
		readonly precision: number = DEFAULT_DECODE_PRECISION,
	) {
		assertPrecision(precision)
		this.cursor = new ShapeCursor(input)
	}

	/** Decode one value and return `previous` plus the decoded delta. */
	protected abstract next(previous: number): number

	isEmpty(): boolean {
		return this.cursor.isAtEnd()
	}

	/** Offset of the next unread code unit or byte. */
	get offset(): number {
		return this.cursor.position
	}

	/**
	 * Decode the next point.
	 * @throws ShapeCodecError (`exhausted`) when no input is left.
	 */
	pop(): P {
		if (this.isEmpty()) throw ShapeCodecError.exhausted()
		this.position.lat = this.next(this.position.lat)
		if (this.isEmpty()) throw ShapeCodecError.missingLongitude(this.offset)
		this.position.lon = this.next(this.position.lon)
		return this.point(
			this.position.lon * this.precision,
			this.position.lat * this.precision,
		)
	}

	/** Pop every remaining point. */
	*[Symbol.iterator](): Generator<P, void, undefined> {
		while (!this.isEmpty()) yield this.pop()
	}
}

/**
 * Decoder over a shape written with the sample routines of `codec`.
 */
class CodecShapeDecoder<P> extends ShapeDecoder<P> {
	constructor(
		private readonly codec: SampleCodec<ShapeFormat>,
		input: EncodedInput,
		point: PointFactory<P>,
		precision?: number,
	) {
		super(input, point, precision)
	}

	protected override next(previous: number): number {
		return this.codec.read(this.cursor, previous)
	}
}

/** Decoder for encoded polyline strings (5-bit chunks). */
export class PolylineDecoder<P> extends CodecShapeDecoder<P> {
	constructor(input: EncodedInput, point: PointFactory<P>, precision?: number) {
		super(polylineCodec, input, point, precision)
	}
}

/** Decoder for varint shapes (7-bit chunks). */
export class VarintDecoder<P> extends CodecShapeDecoder<P> {
	constructor(input: EncodedInput, point: PointFactory<P>, precision?: number) {
		super(varintCodec, input, point, precision)
	}
}

/**
 * Create the decoder for a format.
 */
export function createDecoder<P>(
	format: ShapeFormat,
	input: EncodedInput,
	point: PointFactory<P>,
	precision?: number,
): ShapeDecoder<P> {
	return new CodecShapeDecoder(sampleCodec(format), input, point, precision)
}
