/**
 * Decode driver: drains a streaming decoder into any point container.
 *
 * @module
 */

import type { LonLat } from "@polyline-codec/shared/types"
import { createDecoder } from "./decoder"
import {
	DEFAULT_DECODE_PRECISION,
	type DecodeOptions,
	type EncodedInput,
	lonLatPoint,
	ShapeFormat,
} from "./options"

/**
 * Anything decoded points can be appended to. Arrays qualify as-is.
 * `reserve` is called once with a capacity hint when present.
 */
export interface PointSink<P> {
	push(point: P): unknown
	reserve?(capacity: number): void
}

/**
 * Decode every point of `input` into `container` and return it.
 *
 * @example
 * ```ts
 * const coords = decodeInto(shape, new LonLatList(), { point: lonLatPoint })
 * const stops: Stop[] = []
 * decodeInto(shape, stops, {
 *   format: ShapeFormat.Varint,
 *   point: (lon, lat) => ({ lon, lat }),
 * })
 * ```
 */
export function decodeInto<P, C extends PointSink<P>>(
	input: EncodedInput,
	container: C,
	options: DecodeOptions<P>,
): C {
	const decoder = createDecoder(
		options.format ?? ShapeFormat.Polyline,
		input,
		options.point,
		options.precision,
	)
	// Shapes rarely take fewer than 4 bytes per point
	container.reserve?.(Math.floor(input.length / 4))
	while (!decoder.isEmpty()) {
		container.push(decoder.pop())
	}
	return container
}

/**
 * Decode an encoded polyline string into `[lon, lat]` points.
 *
 * @param precision - Reciprocal of the encode precision, `1e-6` by default.
 */
export function decode(
	input: EncodedInput,
	precision = DEFAULT_DECODE_PRECISION,
): LonLat[] {
	return decodeInto<LonLat, LonLat[]>(input, [], {
		format: ShapeFormat.Polyline,
		precision,
		point: lonLatPoint,
	})
}

/**
 * Decode a varint shape into `[lon, lat]` points.
 */
export function decode7(
	input: EncodedInput,
	precision = DEFAULT_DECODE_PRECISION,
): LonLat[] {
	return decodeInto<LonLat, LonLat[]>(input, [], {
		format: ShapeFormat.Varint,
		precision,
		point: lonLatPoint,
	})
}
