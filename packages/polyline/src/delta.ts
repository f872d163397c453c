/**
 * Running state for delta coding of coordinate pairs.
 *
 * @module
 */

/**
 * Last scaled (lat, lon) pair seen by an encoder or decoder. Starts at (0, 0),
 * which makes the first delta the absolute position.
 *
 * Encoders call `delta()`; decoders add each decoded difference to `lat` and
 * `lon` directly.
 */
export class DeltaTracker {
	lat = 0
	lon = 0

	/**
	 * Return the difference from the previous pair and remember this one.
	 */
	delta(lat: number, lon: number): [dLat: number, dLon: number] {
		const result: [number, number] = [lat - this.lat, lon - this.lon]
		this.lat = lat
		this.lon = lon
		return result
	}

	reset() {
		this.lat = 0
		this.lon = 0
	}
}
