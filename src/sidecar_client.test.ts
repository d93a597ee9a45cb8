import { describe, it, expect, vi, afterEach } from "vitest"
import { SidecarClient } from "./sidecar_client.js"
import { createRecordingLogger } from "./test_helpers.js"

type FetchArgs = [url: string, init?: RequestInit]

function stubFetch(respond: (...args: FetchArgs) => Promise<Response>) {
	const fetchMock = vi.fn(respond)
	vi.stubGlobal("fetch", fetchMock)
	return fetchMock
}

function json(body: unknown, status = 200): Response {
	return new Response(JSON.stringify(body), { status, headers: { "Content-Type": "application/json" } })
}

function client() {
	return new SidecarClient({ baseUrl: "http://sidecar.test", timeoutMs: 1000, temperature: 0.1, logger: createRecordingLogger() })
}

afterEach(() => {
	vi.unstubAllGlobals()
})

describe("SidecarClient.complete", () => {
	it("posts the template, args and temperature", async () => {
		const fetchMock = stubFetch(async () => json({ text: "SELECT 1" }))
		const sidecar = client()

		expect(await sidecar.complete("generate_sql_query", { userMessage: "q" })).toBe("SELECT 1")
		await sidecar.complete("optimize_sql_query", { userMessage: "q" }, { temperature: 0 })

		const [url, init] = fetchMock.mock.calls[0]
		expect(url).toBe("http://sidecar.test/complete")
		expect(init?.method).toBe("POST")
		expect(JSON.parse(String(init?.body))).toEqual({ template: "generate_sql_query", args: { userMessage: "q" }, temperature: 0.1 })
		expect(JSON.parse(String(fetchMock.mock.calls[1][1]?.body)).temperature).toBe(0)
	})

	it("marks server errors recoverable and client errors not", async () => {
		stubFetch(async () => new Response("boom", { status: 500 }))
		await expect(client().complete("generate_sql_query", {})).rejects.toMatchObject({
			type: "completion",
			message: "Sidecar returned error: 500 boom",
			recoverable: true,
		})

		stubFetch(async () => new Response("bad template", { status: 400 }))
		await expect(client().complete("generate_sql_query", {})).rejects.toMatchObject({ recoverable: false })
	})

	it("rejects a response without text", async () => {
		stubFetch(async () => json({ foo: 1 }))
		await expect(client().complete("generate_sql_query", {})).rejects.toThrow(/^Unexpected sidecar response from \/complete: /)
	})

	it("fails fast after a connection failure", async () => {
		const fetchMock = stubFetch(async () => {
			throw new TypeError("fetch failed")
		})
		const sidecar = client()

		await expect(sidecar.complete("generate_sql_query", {})).rejects.toThrow(
			"Cannot connect to sidecar at http://sidecar.test. Is it running?",
		)
		await expect(sidecar.complete("generate_sql_query", {})).rejects.toThrow(
			"Sidecar service is unavailable. Please try again later.",
		)
		expect(fetchMock).toHaveBeenCalledTimes(1)
	})

	it("reports a cancelled call", async () => {
		stubFetch(async () => json({ text: "SELECT 1" }))
		const controller = new AbortController()
		controller.abort()
		await expect(client().complete("generate_sql_query", {}, { signal: controller.signal })).rejects.toMatchObject({
			type: "cancelled",
		})
	})
})

describe("SidecarClient.embedText", () => {
	it("returns the embedding", async () => {
		const fetchMock = stubFetch(async () => json({ embedding: [0.1, 0.2], dimensions: 2 }))
		expect(await client().embedText("orders")).toEqual([0.1, 0.2])
		expect(fetchMock.mock.calls[0][0]).toBe("http://sidecar.test/embed")
	})

	it("reports failures as retrieval errors", async () => {
		stubFetch(async () => json({ embedding: [] }))
		await expect(client().embedText("orders")).rejects.toMatchObject({ type: "retrieval" })
	})
})

describe("SidecarClient.healthCheck", () => {
	it("opens the breaker when the sidecar is unhealthy", async () => {
		const fetchMock = stubFetch(async () => new Response("down", { status: 503 }))
		const sidecar = client()

		expect(await sidecar.healthCheck()).toBe(false)
		await expect(sidecar.complete("generate_sql_query", {})).rejects.toThrow("Sidecar service is unavailable")
		expect(fetchMock).toHaveBeenCalledTimes(1)
	})

	it("closes the breaker again once healthy", async () => {
		stubFetch(async () => new Response("ok", { status: 200 }))
		expect(await client().healthCheck()).toBe(true)
	})
})
