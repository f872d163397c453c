/**
 * Sequence encoder for coordinate lists.
 *
 * @module
 */

import { isInt32, toScaled } from "@polyline-codec/shared/coordinates"
import type { LonLat } from "@polyline-codec/shared/types"
import { DeltaTracker } from "./delta"
import { ShapeCodecError } from "./errors"
import { sampleCodec } from "./formats"
import {
	assertPrecision,
	DEFAULT_ENCODE_PRECISION,
	type EncodedOutput,
	type EncodeOptions,
	lonLatCoordinates,
	ShapeFormat,
} from "./options"

/**
 * Scale a coordinate to a whole number, rejecting values that are not finite
 * or do not fit in 32 bits once scaled.
 */
export function scaleCoordinate(
	value: number,
	precision: number,
	index: number,
): number {
	if (!Number.isFinite(value)) throw ShapeCodecError.coordinate(value, index)
	const scaled = toScaled(value, precision)
	if (!isInt32(scaled)) throw ShapeCodecError.overflow("Scaled coordinate", scaled)
	return scaled
}

/**
 * Encode points with the given format.
 *
 * Each point's longitude and latitude are scaled by `precision`, rounded half
 * away from zero, and written as the difference from the previous point,
 * latitude first. No point count is stored.
 *
 * @example
 * ```ts
 * const shape = encodeShape(stops, {
 *   format: ShapeFormat.Varint,
 *   precision: 1e6,
 *   coordinates: (stop) => [stop.lon, stop.lat],
 * })
 * ```
 */
export function encodeShape<P, F extends ShapeFormat>(
	points: Iterable<P>,
	options: EncodeOptions<P, F>,
): EncodedOutput[F] {
	const precision = options.precision ?? DEFAULT_ENCODE_PRECISION
	assertPrecision(precision)
	const codec = sampleCodec(options.format)
	const tracker = new DeltaTracker()
	const output: number[] = []

	let index = 0
	for (const point of points) {
		const [lon, lat] = options.coordinates(point)
		const [dLat, dLon] = tracker.delta(
			scaleCoordinate(lat, precision, index),
			scaleCoordinate(lon, precision, index),
		)
		codec.write(dLat, output)
		codec.write(dLon, output)
		index++
	}
	return codec.finish(output)
}

/**
 * Encode `[lon, lat]` points as an encoded polyline string.
 *
 * @param precision - Multiplier applied before rounding, `1e6` by default.
 *
 * @example
 * ```ts
 * encode([[-120.2, 38.5], [-120.95, 40.7]], 1e5) // "_p~iF~ps|U_ulLnnqC"
 * ```
 */
export function encode(
	points: Iterable<Readonly<LonLat>>,
	precision = DEFAULT_ENCODE_PRECISION,
): string {
	return encodeShape(points, {
		format: ShapeFormat.Polyline,
		precision,
		coordinates: lonLatCoordinates,
	})
}

/**
 * Encode `[lon, lat]` points as varint bytes.
 */
export function encode7(
	points: Iterable<Readonly<LonLat>>,
	precision = DEFAULT_ENCODE_PRECISION,
): Uint8Array {
	return encodeShape(points, {
		format: ShapeFormat.Varint,
		precision,
		coordinates: lonLatCoordinates,
	})
}
