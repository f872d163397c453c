import { describe, expect, it } from "vitest"
import { LonLatList } from "../src/lonlat-list"

describe("LonLatList", () => {
	it("grows by doubling", () => {
		const list = new LonLatList(1)
		expect(list.push([1, 2])).toBe(0)
		expect(list.push([3, 4])).toBe(1)
		expect(list.push([5, 6])).toBe(2)
		expect(list.length).toBe(3)
		expect(list.capacity).toBe(4)
		expect(list.toArray()).toEqual([
			[1, 2],
			[3, 4],
			[5, 6],
		])
	})

	it("keeps points when reserving more room", () => {
		const list = new LonLatList(2)
		list.push([1, 2])
		list.reserve(100)
		expect(list.capacity).toBe(100)
		expect(list.at(0)).toEqual([1, 2])
		list.reserve(10)
		expect(list.capacity).toBe(100)
	})

	it("supports negative indices and bounds checks", () => {
		const list = new LonLatList()
		list.push([1, 2])
		list.push([3, 4])
		expect(list.at(-1)).toEqual([3, 4])
		expect(() => list.at(2)).toThrow("Index out of bounds: 2. Length: 2")
		expect(() => list.at(-3)).toThrow("Index out of bounds: -3. Length: 2")
	})

	it("compacts to the stored coordinates", () => {
		const list = new LonLatList()
		list.push([1, 2])
		list.push([3, 4])
		expect(Array.from(list.compact())).toEqual([1, 2, 3, 4])
		expect([...list]).toEqual([
			[1, 2],
			[3, 4],
		])
	})
})
