/**
 * Batch conversion between LineString feature collections and encoded shapes.
 *
 * @module
 */

import {
	logProgress,
	type ProgressEvent,
	progressEvent,
} from "@polyline-codec/shared/progress"
import type { GeoJsonProperties } from "geojson"
import { decodeLineString, encodeLineString } from "./line-string"
import type {
	EncodedShapeFeature,
	GeoJsonShapeOptions,
	LineStringCollection,
	LineStringFeature,
} from "./types"

/** Features converted between intermediate progress events. */
export const PROGRESS_INTERVAL = 1_000

/**
 * Encode every feature of a LineString collection, keeping ids and properties.
 *
 * @param collection - FeatureCollection whose geometries are all LineStrings.
 * @param options - Coordinate and elevation precision.
 * @param onProgress - Progress callback, logs to the console by default.
 *
 * @example
 * ```ts
 * const shapes = encodeFeatures(routes, { precision: 1e5 }, () => {})
 * // [{ id: "r1", properties: { name: "Ridge" }, shape: "_p~iF~ps|U" }]
 * ```
 */
export function encodeFeatures<P = GeoJsonProperties>(
	collection: LineStringCollection<P>,
	options: GeoJsonShapeOptions = {},
	onProgress: (progress: ProgressEvent) => void = logProgress,
): EncodedShapeFeature<P>[] {
	const total = collection.features.length
	onProgress(progressEvent(`Encoding ${total} line strings...`))

	const encoded: EncodedShapeFeature<P>[] = []
	for (const feature of collection.features) {
		const shape: EncodedShapeFeature<P> = {
			...encodeLineString(feature.geometry, options),
			properties: feature.properties,
		}
		if (feature.id !== undefined) shape.id = feature.id
		encoded.push(shape)
		if (encoded.length % PROGRESS_INTERVAL === 0 && encoded.length < total) {
			onProgress(progressEvent("Encoding line strings", encoded.length, total))
		}
	}

	onProgress(progressEvent(`Encoded ${total} line strings.`))
	return encoded
}

/**
 * Decode encoded shapes back into a LineString FeatureCollection.
 */
export function decodeFeatures<P = GeoJsonProperties>(
	shapes: EncodedShapeFeature<P>[],
	options: GeoJsonShapeOptions = {},
	onProgress: (progress: ProgressEvent) => void = logProgress,
): LineStringCollection<P> {
	const total = shapes.length
	onProgress(progressEvent(`Decoding ${total} line strings...`))

	const features: LineStringFeature<P>[] = []
	for (const shape of shapes) {
		const feature: LineStringFeature<P> = {
			type: "Feature",
			geometry: decodeLineString(shape, options),
			properties: shape.properties,
		}
		if (shape.id !== undefined) feature.id = shape.id
		features.push(feature)
		if (features.length % PROGRESS_INTERVAL === 0 && features.length < total) {
			onProgress(progressEvent("Decoding line strings", features.length, total))
		}
	}

	onProgress(progressEvent(`Decoded ${total} line strings.`))
	return { type: "FeatureCollection", features }
}
