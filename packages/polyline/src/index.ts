/**
 * @polyline-codec/polyline - Compact string and byte encodings for coordinate
 * sequences.
 *
 * Points are scaled to whole numbers, delta coded against the previous point
 * and written as self-terminating variable-length values, latitude first.
 *
 * Key capabilities:
 * - **Polyline format**: 5-bit chunks in printable ASCII, safe to embed in JSON.
 * - **Varint format**: 7-bit chunks in raw bytes, for binary storage.
 * - **Streaming decoders**: pull one point at a time with `pop()` or iterate.
 * - **Any container**: `decodeInto` fills arrays, `LonLatList` or any `push`-able sink.
 * - **Samples**: the same scheme over a single channel, e.g. elevation profiles.
 *
 * Encode precision is a multiplier (`1e6`); decode precision is its
 * reciprocal (`1e-6`). The encoded shape does not record it.
 *
 * @example
 * ```ts
 * import { decode, encode } from "@polyline-codec/polyline"
 *
 * const shape = encode([[-122.123456, 37.654321]])
 * const points = decode(shape) // [[-122.123456, 37.654321]]
 * ```
 *
 * @module @polyline-codec/polyline
 */

export * from "./cursor"
export * from "./decode"
export * from "./decoder"
export * from "./delta"
export * from "./encode"
export * from "./errors"
export * from "./formats"
export * from "./lonlat-list"
export * from "./options"
export * from "./polyline-sample"
export * from "./samples"
export * from "./varint-sample"
