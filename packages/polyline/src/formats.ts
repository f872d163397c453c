/**
 * Per-format sample routines.
 *
 * The sequence encoder, streaming decoders and sample codec are written once
 * against `SampleCodec` and pick the polyline or varint routines by format.
 *
 * @module
 */

import type { ShapeCursor } from "./cursor"
import {
	type EncodedOutput,
	ShapeFormat,
} from "./options"
import { decodePolylineSample, encodePolylineSample } from "./polyline-sample"
import { decode7Sample, encode7Sample } from "./varint-sample"

export interface SampleCodec<F extends ShapeFormat> {
	format: F
	/** Append the encoding of one whole-number delta. */
	write(delta: number, output: number[]): void
	/** Decode one delta and return `previous` plus that delta. */
	read(cursor: ShapeCursor, previous: number): number
	/** Turn collected char codes or bytes into the format's output type. */
	finish(output: number[]): EncodedOutput[F]
}

// String.fromCharCode takes its codes as arguments; stay below engine limits
const CHAR_CODE_BATCH = 0x2000

function charCodesToString(codes: number[]): string {
	let result = ""
	for (let i = 0; i < codes.length; i += CHAR_CODE_BATCH) {
		result += String.fromCharCode(...codes.slice(i, i + CHAR_CODE_BATCH))
	}
	return result
}

export const polylineCodec: SampleCodec<"polyline"> = {
	format: ShapeFormat.Polyline,
	write: encodePolylineSample,
	read: decodePolylineSample,
	finish: charCodesToString,
}

export const varintCodec: SampleCodec<"varint"> = {
	format: ShapeFormat.Varint,
	write: encode7Sample,
	read: decode7Sample,
	finish: (bytes) => Uint8Array.from(bytes),
}

const SAMPLE_CODECS: { [F in ShapeFormat]: SampleCodec<F> } = {
	polyline: polylineCodec,
	varint: varintCodec,
}

/**
 * Look up the sample routines for a format.
 */
export function sampleCodec<F extends ShapeFormat>(format: F): SampleCodec<F> {
	const codec = SAMPLE_CODECS[format]
	if (codec === undefined) throw Error(`Unknown shape format: ${format}`)
	return codec
}
