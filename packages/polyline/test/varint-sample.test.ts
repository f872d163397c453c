import { describe, expect, it } from "vitest"
import { ShapeCursor } from "../src/cursor"
import { decode7Sample, encode7Sample } from "../src/varint-sample"
import { codecErrorKind } from "./helpers"

function encodeValue(value: number): number[] {
	const output: number[] = []
	encode7Sample(value, output)
	return output
}

function decodeValue(bytes: number[], previous = 0): number {
	return decode7Sample(new ShapeCursor(Uint8Array.from(bytes)), previous)
}

describe("varint sample codec", () => {
	it("writes 7 bits per byte with a high continuation bit", () => {
		expect(encodeValue(0)).toEqual([0])
		expect(encodeValue(-1)).toEqual([1])
		expect(encodeValue(16)).toEqual([32])
		expect(encodeValue(1000)).toEqual([208, 15])
		expect(encodeValue(-1000)).toEqual([207, 15])
		expect(encodeValue(-17998321)).toEqual([225, 135, 149, 17])
	})

	it("round trips the int32 bounds", () => {
		expect(encodeValue(2 ** 31 - 1)).toEqual([254, 255, 255, 255, 15])
		expect(encodeValue(-(2 ** 31))).toEqual([255, 255, 255, 255, 15])
		expect(decodeValue([254, 255, 255, 255, 15])).toBe(2 ** 31 - 1)
		expect(decodeValue([255, 255, 255, 255, 15])).toBe(-(2 ** 31))
	})

	it("adds the decoded delta to the previous value", () => {
		expect(decodeValue([207, 15], 1500)).toBe(500)
	})

	it("reads latin1 strings as bytes", () => {
		const cursor = new ShapeCursor(String.fromCharCode(208, 15))
		expect(decode7Sample(cursor, 0)).toBe(1000)
		expect(cursor.isAtEnd()).toBe(true)
	})

	it("rejects truncated input and wide code units", () => {
		expect(() => decodeValue([0x80])).toThrow(
			"Bad encoded shape: unexpected end of input at offset 1",
		)
		expect(
			codecErrorKind(() =>
				decode7Sample(new ShapeCursor(String.fromCharCode(0x100)), 0),
			),
		).toBe("malformed")
	})

	it("fails fast on values wider than 32 bits", () => {
		expect(codecErrorKind(() => decodeValue([255, 255, 255, 255, 255, 0]))).toBe(
			"overflow",
		)
		expect(codecErrorKind(() => decodeValue([255, 255, 255, 255, 31]))).toBe(
			"overflow",
		)
		expect(codecErrorKind(() => encodeValue(-(2 ** 31) - 1))).toBe("overflow")
	})
})
