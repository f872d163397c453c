/**
 * @polyline-codec/geojson - Convert GeoJSON line strings to and from encoded shapes.
 *
 * - **Geometries**: `encodeLineString` / `decodeLineString`, with an optional
 *   elevation profile carried as encoded samples.
 * - **Collections**: `encodeFeatures` / `decodeFeatures` keep feature ids and
 *   properties and report progress.
 * - **Input**: `readLineStrings` parses strings, streams and buffers.
 *
 * @example
 * ```ts
 * import { decodeFeatures, encodeFeatures, readLineStrings } from "@polyline-codec/geojson"
 *
 * const routes = await readLineStrings(await readFile("routes.geojson", "utf8"))
 * const shapes = encodeFeatures(routes, { precision: 1e6 })
 * const restored = decodeFeatures(shapes, { precision: 1e6 })
 * ```
 *
 * @module @polyline-codec/geojson
 */

export * from "./features"
export * from "./line-string"
export * from "./read"
export * from "./types"
