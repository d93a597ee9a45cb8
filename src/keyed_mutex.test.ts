import { describe, it, expect } from "vitest"
import { KeyedMutex } from "./keyed_mutex.js"

function gate() {
	let open: () => void = () => {}
	const promise = new Promise<void>(resolve => {
		open = resolve
	})
	return { promise, open: () => open() }
}

const tick = () => new Promise(resolve => setTimeout(resolve, 0))

describe("KeyedMutex", () => {
	it("runs tasks for the same key one at a time, in call order", async () => {
		const mutex = new KeyedMutex()
		const order: string[] = []
		const blocker = gate()

		const first = mutex.runExclusive("a", async () => {
			order.push("first:start")
			await blocker.promise
			order.push("first:end")
		})
		const second = mutex.runExclusive("a", async () => {
			order.push("second")
		})

		await tick()
		expect(order).toEqual(["first:start"])

		blocker.open()
		await Promise.all([first, second])
		expect(order).toEqual(["first:start", "first:end", "second"])
	})

	it("does not block other keys", async () => {
		const mutex = new KeyedMutex()
		const blocker = gate()
		const held = mutex.runExclusive("a", () => blocker.promise)

		await expect(mutex.runExclusive("b", () => "b-done")).resolves.toBe("b-done")
		expect(mutex.activeKeys).toBe(1)

		blocker.open()
		await held
		expect(mutex.activeKeys).toBe(0)
	})

	it("releases the key when a task throws", async () => {
		const mutex = new KeyedMutex()
		await expect(
			mutex.runExclusive("a", () => {
				throw new Error("boom")
			}),
		).rejects.toThrow("boom")
		await expect(mutex.runExclusive("a", () => 42)).resolves.toBe(42)
		expect(mutex.activeKeys).toBe(0)
	})
})
