import { describe, it, expect } from "vitest"
import { Text2SqlError } from "./config.js"
import { SchemaCatalog } from "./schema_catalog.js"
import { SchemaTrainer, buildTableEmbedding, describeTable, normalizeTable } from "./schema_trainer.js"
import { parseTableList, validateTableList } from "./schema_types.js"
import {
	FakeSchemaStore,
	FakeVectorStore,
	column,
	createRecordingLogger,
	shopSchema,
	table,
} from "./test_helpers.js"

class FlakyVectorStore extends FakeVectorStore {
	saves = 0
	failAfter = Infinity

	async save(collection: string, id: string, text: string): Promise<void> {
		this.saves++
		if (this.saves > this.failAfter) throw new Error("embedding service down")
		return super.save(collection, id, text)
	}
}

function setup() {
	const store = new FakeSchemaStore()
	const vectors = new FakeVectorStore()
	const catalog = new SchemaCatalog(store)
	const trainer = new SchemaTrainer(catalog, vectors, createRecordingLogger())
	return { store, vectors, catalog, trainer }
}

describe("describeTable", () => {
	it("lists enabled columns and FK relationships", () => {
		const orders = normalizeTable(shopSchema()[1])
		expect(describeTable(orders)).toBe(
			[
				"Table: orders",
				"Description: Orders",
				"Columns:",
				"  - id (integer, primary key, nullable)",
				"  - customer_id (integer, nullable)",
				"  - total_amount (numeric, nullable)",
				"Foreign keys:",
				"  - orders.customer_id references customers.id",
			].join("\n"),
		)
	})

	it("omits disabled columns and marks missing details", () => {
		const t = table("notes", [
			column("body", { dataType: "", isNullable: false, description: "Free text" }),
			column("secret", { isEnabled: false }),
		])
		expect(describeTable(t)).toBe(
			["Table: notes", "Description: No description", "Columns:", "  - body (unknown, not null): Free text"].join("\n"),
		)
	})
})

describe("normalizeTable", () => {
	it("keeps an explicit relationship sentence", () => {
		const t = table("orders", ["id", "customer_id"], [["customer_id", "customers", "id"]])
		t.foreignKeys[0].relationship = "each order belongs to a customer"
		expect(normalizeTable(t).foreignKeys[0].relationship).toBe("each order belongs to a customer")
	})
})

describe("buildTableEmbedding", () => {
	it("produces a table-level record", () => {
		const embedding = buildTableEmbedding("shop", table("customers", ["id"]))
		expect(embedding).toMatchObject({ connectionId: "shop", tableName: "customers", columnName: null, embeddingType: "table" })
	})
})

describe("SchemaTrainer", () => {
	it("embeds each table with enabled columns and stores the full list", async () => {
		const { store, vectors, trainer } = setup()
		const schema = [...shopSchema(), table("archive", [column("payload", { isEnabled: false })])]

		const result = await trainer.trainSchema("shop", schema)

		expect(result).toEqual({
			trained: ["customers", "orders", "products", "order_items", "audit_log"],
			skipped: ["archive"],
		})
		expect(vectors.ids("shop")).toEqual(["shop_customers", "shop_orders", "shop_products", "shop_order_items", "shop_audit_log"])
		const stored = parseTableList(store.blobs.get("shop") ?? "")
		expect(stored.map(t => t.tableName)).toContain("archive")
		expect(stored[1].foreignKeys[0].relationship).toBe("orders.customer_id references customers.id")
	})

	it("clears stale embeddings on a full retrain", async () => {
		const { vectors, trainer } = setup()
		await trainer.trainSchema("shop", shopSchema())
		await trainer.trainSchema("shop", [table("customers", ["id"])])
		expect(vectors.ids("shop")).toEqual(["shop_customers"])
	})

	it("stores the new table list before embedding, so a failed embed leaves them in step", async () => {
		const vectors = new FlakyVectorStore()
		const catalog = new SchemaCatalog(new FakeSchemaStore())
		const logger = createRecordingLogger()
		const trainer = new SchemaTrainer(catalog, vectors, logger)
		await trainer.trainSchema("shop", shopSchema())

		vectors.failAfter = vectors.saves + 1
		await expect(trainer.trainSchema("shop", [table("customers", ["id"]), table("suppliers", ["id"])])).rejects.toThrow(
			"embedding service down",
		)

		expect((await catalog.requireTables("shop")).map(t => t.tableName)).toEqual(["customers", "suppliers"])
		expect(vectors.ids("shop")).toEqual(["shop_customers"])
		expect(logger.entries.find(e => e.level === "error")?.meta).toEqual({
			connectionId: "shop",
			embedded: 1,
			error: "embedding service down",
		})
	})

	it("replaces one table in place when retraining it", async () => {
		const { vectors, catalog, trainer } = setup()
		await trainer.trainSchema("shop", shopSchema())

		const embedded = await trainer.retrainTable("shop", table("Products", ["id", column("sku", { dataType: "text" })]))

		expect(embedded).toBe(true)
		const tables = await catalog.requireTables("shop")
		expect(tables.map(t => t.tableName)).toEqual(["customers", "orders", "Products", "order_items", "audit_log"])
		expect(vectors.items.get("shop")?.get("shop_products")).toContain("sku")
	})

	it("drops the embedding when a retrained table has no enabled columns", async () => {
		const { vectors, trainer } = setup()
		await trainer.trainSchema("shop", shopSchema())

		const embedded = await trainer.retrainTable("shop", table("audit_log", [column("id", { isEnabled: false })]))

		expect(embedded).toBe(false)
		expect(vectors.ids("shop")).not.toContain("shop_audit_log")
	})

	it("appends a new table on retrain", async () => {
		const { catalog, trainer } = setup()
		await trainer.trainSchema("shop", shopSchema())
		await trainer.retrainTable("shop", table("suppliers", ["id"]))
		const tables = await catalog.requireTables("shop")
		expect(tables.at(-1)?.tableName).toBe("suppliers")
	})

	it("removes a table and reports unknown ones", async () => {
		const { vectors, catalog, trainer } = setup()
		await trainer.trainSchema("shop", shopSchema())

		expect(await trainer.removeTable("shop", "PRODUCTS")).toBe(true)
		expect(await trainer.removeTable("shop", "suppliers")).toBe(false)
		expect(vectors.ids("shop")).not.toContain("shop_products")
		expect((await catalog.requireTables("shop")).map(t => t.tableName)).toEqual(["customers", "orders", "order_items", "audit_log"])
	})
})

describe("SchemaCatalog", () => {
	it("returns null for unknown or blank connections", async () => {
		const store = new FakeSchemaStore()
		store.blobs.set("blank", "   ")
		const catalog = new SchemaCatalog(store)
		expect(await catalog.getTables("missing")).toBeNull()
		expect(await catalog.getTables("blank")).toBeNull()
	})

	it("caches parsed tables until invalidated", async () => {
		const store = new FakeSchemaStore()
		store.blobs.set("shop", JSON.stringify([{ tableName: "customers" }]))
		const catalog = new SchemaCatalog(store)

		await catalog.getTables("shop")
		await catalog.getTables("shop")
		expect(store.reads).toBe(1)

		catalog.invalidate("shop")
		await catalog.getTables("shop")
		expect(store.reads).toBe(2)
	})

	it("reads through every time when caching is off", async () => {
		const store = new FakeSchemaStore()
		const catalog = new SchemaCatalog(store, { cacheEnabled: false })
		await catalog.saveTables("shop", [table("customers", ["id"])])
		await catalog.getTables("shop")
		await catalog.getTables("shop")
		expect(store.reads).toBe(2)
	})

	it("applies column defaults when parsing a stored list", async () => {
		const store = new FakeSchemaStore()
		store.blobs.set("shop", JSON.stringify([{ tableName: "customers", columns: [{ columnName: "id" }] }]))
		const tables = await new SchemaCatalog(store).requireTables("shop")
		expect(tables[0]).toEqual({
			tableName: "customers",
			description: "",
			columns: [{ columnName: "id", dataType: "", isNullable: true, isPrimaryKey: false, description: "", isEnabled: true }],
			foreignKeys: [],
		})
	})

	it("rejects a corrupt stored list with a schema error", async () => {
		const store = new FakeSchemaStore()
		store.blobs.set("shop", "{not json")
		await expect(new SchemaCatalog(store).getTables("shop")).rejects.toMatchObject({ type: "schema" })
	})
})

describe("validateTableList", () => {
	it("names the first offending path", () => {
		expect(() => validateTableList([{ tableName: "t", columns: [{ columnName: "" }] }])).toThrow(Text2SqlError)
		expect(() => validateTableList([{ tableName: "t", columns: [{ columnName: "" }] }])).toThrow(/at 0\.columns\.0\.columnName/)
	})
})
