/**
 * Type definitions for GeoJSON-shape conversion.
 * @module
 */

import type {
	Feature,
	FeatureCollection,
	GeoJsonProperties,
	LineString,
} from "geojson"

/**
 * A line string in encoded form.
 *
 * `shape` holds the polyline-encoded positions. `elevation` holds the third
 * ordinate of every position as encoded samples, when the source had one.
 */
export interface EncodedShape {
	shape: string
	elevation?: string
}

/**
 * An encoded line string with the id and properties of its source feature.
 */
export interface EncodedShapeFeature<P = GeoJsonProperties>
	extends EncodedShape {
	id?: string | number
	properties: P
}

export type LineStringFeature<P = GeoJsonProperties> = Feature<LineString, P>

export type LineStringCollection<P = GeoJsonProperties> = FeatureCollection<
	LineString,
	P
>

/** Data types accepted by `readLineStrings`. */
export type ReadGeoJsonDataTypes =
	| string
	| ArrayBufferLike
	| ReadableStream<Uint8Array>
	| LineStringCollection

export interface GeoJsonShapeOptions {
	/** Multiplier for longitude and latitude. Defaults to `1e6`. */
	precision?: number
	/** Multiplier for elevation samples. Defaults to `10` (decimeters). */
	elevationPrecision?: number
}
