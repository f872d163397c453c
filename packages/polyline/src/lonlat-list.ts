/**
 * Growable point container backed by a Float64Array.
 *
 * @module
 */

import type { LonLat } from "@polyline-codec/shared/types"
import type { PointSink } from "./decode"

/** Initial capacity in points. */
export const DEFAULT_CAPACITY = 64

/**
 * Stores `[lon, lat]` points interleaved in one Float64Array, doubling the
 * buffer as needed (ArrayList semantics). Implements `PointSink` so decoders
 * can fill it directly.
 */
export class LonLatList implements PointSink<LonLat>, Iterable<LonLat> {
	/** Interleaved coordinates: lon0, lat0, lon1, lat1, ... */
	array: Float64Array
	/** Number of points stored (may be less than capacity) */
	private items = 0

	constructor(capacity = DEFAULT_CAPACITY) {
		this.array = new Float64Array(Math.max(capacity, 1) * 2)
	}

	get length() {
		return this.items
	}

	get capacity() {
		return this.array.length / 2
	}

	/**
	 * Ensure room for at least `capacity` points without reallocating.
	 */
	reserve(capacity: number) {
		if (capacity <= this.capacity) return
		const array = new Float64Array(capacity * 2)
		array.set(this.array.subarray(0, this.items * 2))
		this.array = array
	}

	/**
	 * Append a point, doubling the buffer when full.
	 * @returns The index of the new point.
	 */
	push(point: Readonly<LonLat>): number {
		if (this.items >= this.capacity) this.reserve(this.capacity * 2)
		this.array[this.items * 2] = point[0]
		this.array[this.items * 2 + 1] = point[1]
		return this.items++
	}

	/**
	 * Get the point at an index. Handles negative indices.
	 */
	at(index: number): LonLat {
		if (index < -this.length || index >= this.length)
			throw Error(`Index out of bounds: ${index}. Length: ${this.length}`)
		if (index < 0) return this.at(this.length + index)
		const lon = this.array[index * 2]
		const lat = this.array[index * 2 + 1]
		if (lon === undefined || lat === undefined)
			throw Error(`No point at index: ${index}`)
		return [lon, lat]
	}

	*[Symbol.iterator](): Generator<LonLat, void, undefined> {
		for (let i = 0; i < this.items; i++) yield this.at(i)
	}

	toArray(): LonLat[] {
		return Array.from(this)
	}

	/**
	 * Copy of the interleaved coordinates, trimmed to the stored points.
	 */
	compact(): Float64Array {
		return this.array.slice(0, this.items * 2)
	}
}
