import { describe, it, expect } from "vitest"
import type { FieldDef } from "pg"
import { PgSqlExecutor, coerceNumericColumns } from "./pg_sql_executor.js"
import { createRecordingLogger } from "./test_helpers.js"

function field(name: string, dataTypeID: number): FieldDef {
	return { name, dataTypeID, tableID: 0, columnID: 0, dataTypeSize: -1, dataTypeModifier: -1, format: "text" }
}

describe("coerceNumericColumns", () => {
	it("turns bigint and numeric strings into numbers", () => {
		const rows = [{ id: "9", total: "12.50", name: "Ann" }, { id: "10", total: null, name: "Bo" }]
		const fields = [field("id", 20), field("total", 1700), field("name", 25)]
		expect(coerceNumericColumns(rows, fields)).toEqual([
			{ id: 9, total: 12.5, name: "Ann" },
			{ id: 10, total: null, name: "Bo" },
		])
	})

	it("leaves rows untouched without numeric columns", () => {
		const rows = [{ name: "Ann" }]
		expect(coerceNumericColumns(rows, [field("name", 25)])).toBe(rows)
	})
})

describe("PgSqlExecutor", () => {
	const executor = new PgSqlExecutor({ connections: {}, statementTimeoutMs: 1000, logger: createRecordingLogger() })

	it("rejects unknown connection ids before connecting", async () => {
		await expect(executor.executeQuery("nowhere", "SELECT 1")).rejects.toMatchObject({
			type: "configuration",
			message: "Unknown connection id: nowhere",
		})
	})

	it("rejects a cancelled call", async () => {
		const controller = new AbortController()
		controller.abort()
		await expect(executor.executeQuery("nowhere", "SELECT 1", { signal: controller.signal })).rejects.toMatchObject({
			type: "cancelled",
		})
	})
})
