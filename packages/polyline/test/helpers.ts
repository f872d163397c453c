import { ShapeCodecError, type ShapeCodecErrorKind } from "../src/errors"

/**
 * Run `fn` and return the kind of the ShapeCodecError it throws.
 * Rethrows anything else; returns undefined when nothing is thrown.
 */
export function codecErrorKind(
	fn: () => unknown,
): ShapeCodecErrorKind | undefined {
	try {
		fn()
	} catch (error) {
		if (error instanceof ShapeCodecError) return error.kind
		throw error
	}
	return undefined
}

/**
 * Deterministic pseudo-random points in [-100, 100) x [-90, 90).
 * Longitudes stay within 100 degrees of zero so deltas fit in 32 bits at 1e7.
 */
export function randomPoints(count: number, seed = 42): [number, number][] {
	let state = seed
	const random = () => {
		state = (state * 1664525 + 1013904223) % 2 ** 32
		return state / 2 ** 32
	}
	return Array.from({ length: count }, () => [
		random() * 200 - 100,
		random() * 180 - 90,
	])
}
