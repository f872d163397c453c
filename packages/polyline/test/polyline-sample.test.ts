import { describe, expect, it } from "vitest"
import { ShapeCursor } from "../src/cursor"
import {
	decodePolylineSample,
	encodePolylineSample,
} from "../src/polyline-sample"
import { codecErrorKind } from "./helpers"

function encodeValue(delta: number): string {
	const output: number[] = []
	encodePolylineSample(delta, output)
	return String.fromCharCode(...output)
}

function decodeValue(encoded: string, previous = 0): number {
	return decodePolylineSample(new ShapeCursor(encoded), previous)
}

describe("polyline sample codec", () => {
	it("encodes small deltas as a single character", () => {
		expect(encodeValue(0)).toBe("?")
		expect(encodeValue(1)).toBe("A")
		expect(encodeValue(-1)).toBe("@")
		expect(encodeValue(15)).toBe("]")
		expect(encodeValue(-16)).toBe("^")
	})

	it("continues into a second character past 5 bits", () => {
		expect(encodeValue(16)).toBe("_@")
		expect(encodeValue(1000)).toBe("o}@")
		expect(encodeValue(-1000)).toBe("n}@")
	})

	it("matches the published longitude example", () => {
		expect(encodeValue(-17998321)).toBe("`~oia@")
		expect(decodeValue("`~oia@")).toBe(-17998321)
	})

	it("encodes the int32 bounds", () => {
		expect(encodeValue(2 ** 31 - 1)).toBe("}~~~~~B")
		expect(encodeValue(-(2 ** 31))).toBe("~~~~~~B")
		expect(decodeValue("}~~~~~B")).toBe(2 ** 31 - 1)
		expect(decodeValue("~~~~~~B")).toBe(-(2 ** 31))
	})

	it("adds the decoded delta to the previous value", () => {
		expect(decodeValue("A", 41)).toBe(42)
		expect(decodeValue("n}@", 1000)).toBe(0)
	})

	it("stops after the terminating character", () => {
		const cursor = new ShapeCursor("o}@A")
		expect(decodePolylineSample(cursor, 0)).toBe(1000)
		expect(cursor.position).toBe(3)
		expect(decodePolylineSample(cursor, 1000)).toBe(1001)
		expect(cursor.isAtEnd()).toBe(true)
	})

	it("alternating signs recover exactly", () => {
		const deltas = [1, -1, 1, -1, 16, -16, 2 ** 31 - 1, -(2 ** 31)]
		const output: number[] = []
		for (const delta of deltas) encodePolylineSample(delta, output)
		const cursor = new ShapeCursor(String.fromCharCode(...output))
		const decoded = deltas.map(() => decodePolylineSample(cursor, 0))
		expect(decoded).toEqual(deltas)
	})

	it("rejects a continuation character at the end of input", () => {
		expect(() => decodeValue(String.fromCharCode(63 + 0x20))).toThrow(
			"Bad encoded shape: unexpected end of input at offset 1",
		)
		expect(codecErrorKind(() => decodeValue("_"))).toBe("malformed")
	})

	it("rejects characters outside the polyline range", () => {
		expect(() => decodeValue(" ")).toThrow(
			"Bad encoded shape: invalid character code 32 at offset 0",
		)
		expect(codecErrorKind(() => decodeValue("\u007f"))).toBe("malformed")
		expect(codecErrorKind(() => decodeValue("é"))).toBe("malformed")
	})

	it("fails fast on values wider than 32 bits", () => {
		expect(codecErrorKind(() => decodeValue("~~~~~~~?"))).toBe("overflow")
		expect(codecErrorKind(() => decodeValue("~~~~~~C"))).toBe("overflow")
		expect(codecErrorKind(() => decodeValue("A", 2 ** 31 - 1))).toBe(
			"overflow",
		)
		expect(codecErrorKind(() => encodeValue(2 ** 31))).toBe("overflow")
		expect(codecErrorKind(() => encodeValue(0.5))).toBe("overflow")
	})
})
