import { afterEach, describe, expect, it, vi } from "vitest"
import {
	logProgress,
	progress,
	progressEvent,
	progressEventMessage,
} from "../src/progress"

describe("progress", () => {
	afterEach(() => {
		vi.restoreAllMocks()
	})

	it("stamps payloads with the current time", () => {
		vi.spyOn(Date, "now").mockReturnValue(1_700_000_000_000)
		expect(progress("Encoding", 1, 4)).toEqual({
			msg: "Encoding",
			timestamp: 1_700_000_000_000,
			completed: 1,
			total: 4,
		})
	})

	it("wraps payloads in a progress event", () => {
		const event = progressEvent("Decoding")
		expect(event.type).toBe("progress")
		expect(event.detail.msg).toBe("Decoding")
	})

	it("appends counts to the message when known", () => {
		expect(progressEventMessage(progressEvent("Encoding"))).toBe("Encoding")
		expect(progressEventMessage(progressEvent("Encoding", 1000, 2500))).toBe(
			"Encoding (1000/2500)",
		)
	})

	it("logs the message to the console", () => {
		const log = vi.spyOn(console, "log").mockImplementation(() => {})
		logProgress(progressEvent("Encoded 2 line strings."))
		expect(log).toHaveBeenCalledWith("Encoded 2 line strings.")
	})
})
