import { describe, it, expect } from "vitest"

import { BoundedLog } from "../BoundedLog"
import { SerialQueue } from "../SerialQueue"
import { createEngineState } from "../EngineState"

describe("BoundedLog", () => {
	it("drops the oldest entries past capacity", () => {
		const log = new BoundedLog<number>(3)
		for (let i = 1; i <= 5; i++) log.append(i)

		expect(log.toArray()).toEqual([3, 4, 5])
		expect(log.size).toBe(3)
		expect(log.maxSize).toBe(3)
	})

	it("returns the newest entries oldest first", () => {
		const log = new BoundedLog<string>(10)
		;["a", "b", "c", "d"].forEach((s) => log.append(s))

		expect(log.recent(2)).toEqual(["c", "d"])
		expect(log.recent(0)).toEqual([])
		expect(log.recent(10)).toEqual(["a", "b", "c", "d"])
	})

	it("returns copies", () => {
		const log = new BoundedLog<number>(2)
		log.append(1)
		log.toArray().push(99)

		expect(log.toArray()).toEqual([1])
	})

	it("rejects a non-positive capacity", () => {
		expect(() => new BoundedLog(0)).toThrow("BoundedLog capacity must be a positive integer, got 0")
		expect(() => new BoundedLog(1.5)).toThrow()
	})
})

describe("SerialQueue", () => {
	it("runs tasks one at a time in submission order", async () => {
		const queue = new SerialQueue()
		const events: string[] = []

		const task = (name: string, waits: number) => async () => {
			events.push(`start ${name}`)
			for (let i = 0; i < waits; i++) await Promise.resolve()
			events.push(`end ${name}`)
			return name
		}

		const results = await Promise.all([queue.run(task("a", 5)), queue.run(task("b", 0)), queue.run(task("c", 2))])

		expect(results).toEqual(["a", "b", "c"])
		expect(events).toEqual(["start a", "end a", "start b", "end b", "start c", "end c"])
		expect(queue.size).toBe(0)
	})

	it("keeps running after a task fails", async () => {
		const queue = new SerialQueue()

		const failed = queue.run(async () => {
			throw new Error("write failed")
		})
		const next = queue.run(async () => "ok")

		await expect(failed).rejects.toThrow("write failed")
		await expect(next).resolves.toBe("ok")
	})

	it("serializes read-modify-write sections", async () => {
		const queue = new SerialQueue()
		let counter = 0

		await Promise.all(
			Array.from({ length: 10 }, () =>
				queue.run(async () => {
					const read = counter
					await Promise.resolve()
					counter = read + 1
				}),
			),
		)

		expect(counter).toBe(10)
	})
})

describe("createEngineState", () => {
	it("sizes every buffer from the config", () => {
		const state = createEngineState({ telemetry: 4, failurePatterns: 3, memory: 2, recommendations: 1 })

		expect(state.failurePatterns.maxSize).toBe(3)
		expect(state.memory.maxSize).toBe(2)
		expect(state.recommendations.maxSize).toBe(1)
		expect(state.writeQueue.size).toBe(0)
	})
})
