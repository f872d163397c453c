/**
 * LineString geometry to encoded shape conversion.
 *
 * @module
 */

import {
	DEFAULT_ENCODE_PRECISION,
	decode,
	decodeSamples,
	encodeShape,
	encodeSamples,
	ShapeFormat,
} from "@polyline-codec/polyline"
import type { LonLat } from "@polyline-codec/shared/types"
import type { LineString, Position } from "geojson"
import type { EncodedShape, GeoJsonShapeOptions } from "./types"

export const DEFAULT_ELEVATION_PRECISION = 10

function positionLonLat(position: Position): LonLat {
	const [lon, lat] = position
	if (lon === undefined || lat === undefined) {
		throw Error(`Position needs a longitude and latitude: [${position}]`)
	}
	return [lon, lat]
}

/**
 * Encode a LineString geometry.
 *
 * Elevation is kept only when every position has a third ordinate.
 *
 * @example
 * ```ts
 * encodeLineString({ type: "LineString", coordinates: [[-120.2, 38.5]] }, { precision: 1e5 })
 * // { shape: "_p~iF~ps|U" }
 * ```
 */
export function encodeLineString(
	line: LineString,
	options: GeoJsonShapeOptions = {},
): EncodedShape {
	const shape = encodeShape(line.coordinates, {
		format: ShapeFormat.Polyline,
		precision: options.precision ?? DEFAULT_ENCODE_PRECISION,
		coordinates: positionLonLat,
	})
	const elevations: number[] = []
	for (const position of line.coordinates) {
		const elevation = position[2]
		if (elevation === undefined) return { shape }
		elevations.push(elevation)
	}
	if (elevations.length === 0) return { shape }
	return {
		shape,
		elevation: encodeSamples(
			elevations,
			options.elevationPrecision ?? DEFAULT_ELEVATION_PRECISION,
		),
	}
}

/**
 * Decode an encoded shape back to a LineString geometry.
 *
 * @throws Error if the elevation samples do not match the positions one to one.
 */
export function decodeLineString(
	encoded: EncodedShape,
	options: GeoJsonShapeOptions = {},
): LineString {
	const precision = options.precision ?? DEFAULT_ENCODE_PRECISION
	const positions: Position[] = decode(encoded.shape, 1 / precision)
	if (encoded.elevation === undefined) {
		return { type: "LineString", coordinates: positions }
	}

	const elevationPrecision =
		options.elevationPrecision ?? DEFAULT_ELEVATION_PRECISION
	const elevations = decodeSamples(encoded.elevation, 1 / elevationPrecision)
	if (elevations.length !== positions.length) {
		throw Error(
			`Elevation has ${elevations.length} samples for ${positions.length} positions`,
		)
	}
	return {
		type: "LineString",
		coordinates: positions.map((position, i) => {
			const elevation = elevations[i]
			if (elevation === undefined) throw Error(`No elevation for position ${i}`)
			return [...position, elevation]
		}),
	}
}
