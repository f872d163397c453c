import type { GeoJsonObject, LineString } from "geojson"
import type {
	LineStringCollection,
	LineStringFeature,
	ReadGeoJsonDataTypes,
} from "./types"

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null
}

function isLineString(value: unknown): value is LineString {
	return (
		isRecord(value) &&
		value.type === "LineString" &&
		Array.isArray(value.coordinates) &&
		value.coordinates.every(
			(position: unknown) =>
				Array.isArray(position) &&
				position.length >= 2 &&
				position.every((n: unknown) => typeof n === "number"),
		)
	)
}

function isLineStringFeature(value: unknown): value is LineStringFeature {
	return (
		isRecord(value) &&
		value.type === "Feature" &&
		isLineString(value.geometry) &&
		(value.properties === null || isRecord(value.properties))
	)
}

/**
 * Type guard: a FeatureCollection whose features all have LineString geometry.
 */
export function isLineStringCollection(
	value: unknown,
): value is LineStringCollection {
	return (
		isRecord(value) &&
		value.type === "FeatureCollection" &&
		Array.isArray(value.features) &&
		value.features.every(isLineStringFeature)
	)
}

function parseLineStrings(text: string): LineStringCollection {
	const parsed: unknown = JSON.parse(text)
	if (!isLineStringCollection(parsed)) {
		const type = isRecord(parsed) ? String(parsed.type) : typeof parsed
		throw new Error(
			`Expected a FeatureCollection of LineStrings, got ${type}`,
		)
	}
	return parsed
}

/**
 * Read data as a LineString FeatureCollection.
 * Supports string, ReadableStream, ArrayBufferLike, and an already parsed collection.
 */
export async function readLineStrings(
	data: ReadGeoJsonDataTypes | GeoJsonObject,
): Promise<LineStringCollection> {
	if (data == null) throw new Error("Data is null")
	if (typeof data === "string") return parseLineStrings(data)

	if (data instanceof ReadableStream) {
		const reader = data.getReader()
		const decoder = new TextDecoder()
		let result = ""
		while (true) {
			const { done, value } = await reader.read()
			if (done) break
			result += decoder.decode(value, { stream: true })
		}
		reader.releaseLock()
		return parseLineStrings(result + decoder.decode())
	}
	if (data instanceof ArrayBuffer || data instanceof SharedArrayBuffer) {
		const decoder = new TextDecoder()
		return parseLineStrings(decoder.decode(new Uint8Array(data)))
	}
	if (isLineStringCollection(data)) return data
	throw new Error(
		"Invalid data type. Accepts string, ReadableStream, ArrayBufferLike, or a FeatureCollection of LineStrings.",
	)
}
