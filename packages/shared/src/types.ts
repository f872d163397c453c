/** A position as `[longitude, latitude]`, the GeoJSON order. */
export type LonLat = [lon: number, lat: number]

export interface ILonLat {
	lon: number
	lat: number
}
