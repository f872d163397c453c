/**
 * Single-channel sample codec.
 *
 * Encodes a flat list of reals, such as an elevation profile, with the same
 * scale, round and delta steps used for coordinates, one value per sample.
 *
 * @module
 */

import { fromScaled } from "@polyline-codec/shared/coordinates"
import { ShapeCursor } from "./cursor"
import { scaleCoordinate } from "./encode"
import { sampleCodec } from "./formats"
import {
	assertPrecision,
	type EncodedInput,
	type EncodedOutput,
	ShapeFormat,
} from "./options"

/**
 * Encode samples with the given format.
 *
 * @param precision - A power of ten for the digits to keep, e.g. `100`.
 */
export function encodeSamplesAs<F extends ShapeFormat>(
	values: Iterable<number>,
	precision: number,
	format: F,
): EncodedOutput[F] {
	assertPrecision(precision)
	const codec = sampleCodec(format)
	const output: number[] = []
	let last = 0
	let index = 0
	for (const value of values) {
		const scaled = scaleCoordinate(value, precision, index++)
		codec.write(scaled - last, output)
		last = scaled
	}
	return codec.finish(output)
}

/**
 * Decode samples written with the given format.
 *
 * @param precision - Reciprocal of the encode precision, e.g. `0.01`.
 */
export function decodeSamplesAs(
	input: EncodedInput,
	precision: number,
	format: ShapeFormat,
): number[] {
	assertPrecision(precision)
	const codec = sampleCodec(format)
	const cursor = new ShapeCursor(input)
	const values: number[] = []
	let last = 0
	while (!cursor.isAtEnd()) {
		last = codec.read(cursor, last)
		values.push(fromScaled(last, precision))
	}
	return values
}

/** Encode samples as a polyline string. */
export function encodeSamples(
	values: Iterable<number>,
	precision: number,
): string {
	return encodeSamplesAs(values, precision, ShapeFormat.Polyline)
}

/** Decode samples from a polyline string. */
export function decodeSamples(input: EncodedInput, precision: number): number[] {
	return decodeSamplesAs(input, precision, ShapeFormat.Polyline)
}

/** Encode samples as varint bytes. */
export function encode7Samples(
	values: Iterable<number>,
	precision: number,
): Uint8Array {
	return encodeSamplesAs(values, precision, ShapeFormat.Varint)
}

/** Decode samples from varint bytes. */
export function decode7Samples(
	input: EncodedInput,
	precision: number,
): number[] {
	return decodeSamplesAs(input, precision, ShapeFormat.Varint)
}
