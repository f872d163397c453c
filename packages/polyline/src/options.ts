/**
 * Codec defaults and option types.
 *
 * Shapes are stored with 6 digits of precision by default. Encoding takes a
 * multiplier (`1e6`) while decoding takes its reciprocal (`1e-6`); the encoded
 * shape does not record which was used, so passing mismatched values decodes
 * to valid but wrong coordinates.
 *
 * @module
 */

import type { LonLat } from "@polyline-codec/shared/types"
import { ShapeCodecError } from "./errors"

export const DEFAULT_DIGITS = 6
export const DEFAULT_ENCODE_PRECISION = 1e6
export const DEFAULT_DECODE_PRECISION = 1e-6

/** Most digits whose scaled longitudes still fit in 32 bits. */
export const MAX_DIGITS = 7

/**
 * Wire format of an encoded shape.
 * - `"polyline"`: 5-bit chunks biased into printable ASCII (63..126).
 * - `"varint"`: 7-bit chunks with a high continuation bit, raw bytes.
 */
export const ShapeFormat = {
	Polyline: "polyline",
	Varint: "varint",
} as const
export type ShapeFormat = (typeof ShapeFormat)[keyof typeof ShapeFormat]

/** Output type produced by each format. */
export interface EncodedOutput {
	polyline: string
	varint: Uint8Array
}

/** Encoded input accepted by every decoder. Strings are read one code unit per byte. */
export type EncodedInput = string | Uint8Array

/** Build a decoded point from its longitude and latitude. */
export type PointFactory<P> = (lon: number, lat: number) => P

/** Read the longitude and latitude of a point to encode. */
export type PointAccessor<P> = (point: P) => Readonly<LonLat>

/** Default factory: `[lon, lat]` tuples. */
export const lonLatPoint: PointFactory<LonLat> = (lon, lat) => [lon, lat]

/** Default accessor: points already are `[lon, lat]` tuples. */
export const lonLatCoordinates: PointAccessor<Readonly<LonLat>> = (point) =>
	point

export interface EncodeOptions<P, F extends ShapeFormat = ShapeFormat> {
	format: F
	/** Multiplier applied before rounding. Defaults to `1e6`. */
	precision?: number
	coordinates: PointAccessor<P>
}

export interface DecodeOptions<P> {
	format?: ShapeFormat
	/** Reciprocal of the encode precision. Defaults to `1e-6`. */
	precision?: number
	point: PointFactory<P>
}

/**
 * Encode and decode precision for a number of decimal digits.
 *
 * @example
 * ```ts
 * precisionForDigits(5) // { encode: 100000, decode: 0.00001 }
 * ```
 */
export function precisionForDigits(digits: number): {
	encode: number
	decode: number
} {
	if (!Number.isInteger(digits) || digits < 0 || digits > MAX_DIGITS) {
		throw new ShapeCodecError(
			"precision",
			`Digits must be an integer from 0 to ${MAX_DIGITS}, got ${digits}`,
		)
	}
	const encode = 10 ** digits
	return { encode, decode: 1 / encode }
}

/**
 * Throw unless `precision` is a positive finite number.
 */
export function assertPrecision(precision: number): void {
	if (!Number.isFinite(precision) || precision <= 0) {
		throw ShapeCodecError.precision(precision)
	}
}
