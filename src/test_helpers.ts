/**
 * In-process fakes for every collaborator, plus small table builders.
 * Used by the *.test.ts files only.
 */

import type { Logger, LogMeta, PromptTemplateName } from "./config.js"
import type {
	CallOptions,
	ChatHistoryStore,
	ChatMessage,
	CompletionOptions,
	ExecutionResult,
	SchemaStore,
	SqlExecutor,
	TemplateArgs,
	TextCompleter,
	VectorSearchHit,
	VectorStore,
} from "./collaborators.js"
import { ConversationContextManager } from "./conversation_context.js"
import { FeedbackOptimizer } from "./feedback_optimizer.js"
import { getDefaultLexicon } from "./lexicon.js"
import { ResultValidator } from "./result_validator.js"
import { SchemaCatalog } from "./schema_catalog.js"
import { SchemaLinker } from "./schema_linker.js"
import { SchemaTrainer } from "./schema_trainer.js"
import type { ColumnInfo, ForeignKeyInfo, TableInfo } from "./schema_types.js"
import { Text2SqlPipeline } from "./text2sql_pipeline.js"

// ── Logging ──────────────────────────────────────────────────────────

export interface LogEntry {
	level: "debug" | "info" | "warn" | "error"
	message: string
	meta?: LogMeta
}

export function createRecordingLogger(): Logger & { entries: LogEntry[] } {
	const entries: LogEntry[] = []
	const record = (level: LogEntry["level"]) => (message: string, meta?: LogMeta) => {
		entries.push({ level, message, meta })
	}
	return {
		entries,
		debug: record("debug"),
		info: record("info"),
		warn: record("warn"),
		error: record("error"),
	}
}

// ── Tables ───────────────────────────────────────────────────────────

export function column(columnName: string, overrides: Partial<ColumnInfo> = {}): ColumnInfo {
	return {
		columnName,
		dataType: "integer",
		isNullable: true,
		isPrimaryKey: false,
		description: "",
		isEnabled: true,
		...overrides,
	}
}

/** fks: [column, referencedTable, referencedColumn] */
export function table(
	tableName: string,
	columns: Array<string | ColumnInfo>,
	fks: Array<[string, string, string]> = [],
	description = "",
): TableInfo {
	const foreignKeys: ForeignKeyInfo[] = fks.map(([columnName, referencedTableName, referencedColumnName]) => ({
		foreignKeyName: `fk_${tableName}_${columnName}`,
		columnName,
		referencedTableName,
		referencedColumnName,
		relationship: "",
	}))
	return {
		tableName,
		description,
		columns: columns.map(c => (typeof c === "string" ? column(c, { isPrimaryKey: c === "id" }) : c)),
		foreignKeys,
	}
}

/** customers, orders, products, order_items, audit_log */
export function shopSchema(): TableInfo[] {
	return [
		table("customers", ["id", column("name", { dataType: "text" })], [], "Customer accounts"),
		table("orders", ["id", "customer_id", column("total_amount", { dataType: "numeric" })], [["customer_id", "customers", "id"]], "Orders"),
		table("products", ["id", column("title", { dataType: "text" }), column("price", { dataType: "numeric" })], [], "Catalog"),
		table("order_items", ["order_id", "product_id", "qty"], [["order_id", "orders", "id"], ["product_id", "products", "id"]]),
		table("audit_log", ["id", column("created_at", { dataType: "timestamp" })]),
	]
}

// ── Vector Store ─────────────────────────────────────────────────────

export interface SearchCall {
	collection: string
	query: string
	limit: number
	minRelevance: number
}

export class FakeVectorStore implements VectorStore {
	items = new Map<string, Map<string, string>>()
	searches: SearchCall[] = []
	/** Relevance of a stored text for any query. */
	relevance: (text: string) => number = () => 0
	searchError: Error | null = null

	async save(collection: string, id: string, text: string): Promise<void> {
		const bucket = this.items.get(collection) ?? new Map<string, string>()
		bucket.set(id, text)
		this.items.set(collection, bucket)
	}

	async *search(collection: string, query: string, limit: number, minRelevance: number): AsyncIterable<VectorSearchHit> {
		this.searches.push({ collection, query, limit, minRelevance })
		if (this.searchError) throw this.searchError
		const hits = [...(this.items.get(collection)?.values() ?? [])]
			.map(text => ({ text, relevance: this.relevance(text) }))
			.filter(hit => hit.relevance >= minRelevance)
			.sort((a, b) => b.relevance - a.relevance)
			.slice(0, limit)
		for (const hit of hits) yield hit
	}

	async remove(collection: string, id: string): Promise<void> {
		this.items.get(collection)?.delete(id)
	}

	async clear(collection: string): Promise<void> {
		this.items.delete(collection)
	}

	ids(collection: string): string[] {
		return [...(this.items.get(collection)?.keys() ?? [])]
	}
}

/** Relevance function scoring stored embeddings by table name. */
export function relevanceByTable(scores: Record<string, number>): (text: string) => number {
	return text => {
		const match = /"tableName":"([^"]+)"/.exec(text)
		return match ? scores[match[1]] ?? 0 : 0
	}
}

// ── Stores ───────────────────────────────────────────────────────────

export class FakeSchemaStore implements SchemaStore {
	blobs = new Map<string, string>()
	reads = 0

	async getByConnectionId(connectionId: string): Promise<string | null> {
		this.reads++
		return this.blobs.get(connectionId) ?? null
	}

	async upsert(connectionId: string, serialized: string): Promise<void> {
		this.blobs.set(connectionId, serialized)
	}
}

export class FakeChatHistoryStore implements ChatHistoryStore {
	messages: ChatMessage[] = []
	private seq = 0

	async getRecentByConnectionId(connectionId: string, limit: number): Promise<ChatMessage[]> {
		return this.messages.filter(m => m.connectionId === connectionId).slice(-limit)
	}

	async append(message: Omit<ChatMessage, "id" | "createdAt">): Promise<ChatMessage> {
		this.seq++
		const stored: ChatMessage = { ...message, id: `msg-${this.seq}`, createdAt: new Date(Date.UTC(2024, 0, 1, 0, 0, this.seq)) }
		this.messages.push(stored)
		return stored
	}
}

// ── Executor / Completer ─────────────────────────────────────────────

type Scripted<TArgs extends unknown[], TResult> = (...args: TArgs) => TResult | Promise<TResult>

export class FakeExecutor implements SqlExecutor {
	calls: Array<{ connectionId: string; sql: string; signal?: AbortSignal }> = []

	constructor(private respond: Scripted<[string], ExecutionResult>) {}

	async executeQuery(connectionId: string, sql: string, options: CallOptions = {}): Promise<ExecutionResult> {
		this.calls.push({ connectionId, sql, signal: options.signal })
		return this.respond(sql)
	}
}

export class FakeCompleter implements TextCompleter {
	calls: Array<{ template: PromptTemplateName; args: TemplateArgs; options: CompletionOptions }> = []
	private queue: string[]

	/** Replies are handed out in order; the last one repeats. */
	constructor(...replies: string[]) {
		this.queue = replies
	}

	async complete(template: PromptTemplateName, args: TemplateArgs, options: CompletionOptions = {}): Promise<string> {
		this.calls.push({ template, args, options })
		if (this.queue.length === 0) throw new Error("FakeCompleter has no replies")
		return this.queue.length > 1 ? this.queue.shift() ?? "" : this.queue[0]
	}
}

// ── Pipeline ─────────────────────────────────────────────────────────

export interface TestPipelineOptions {
	executor: FakeExecutor
	completer: FakeCompleter
	scores?: Record<string, number>
	history?: ChatHistoryStore
}

/** Full pipeline over fakes, with shopSchema() trained as "shop". */
export async function buildTestPipeline(options: TestPipelineOptions) {
	const logger = createRecordingLogger()
	const lexicon = getDefaultLexicon()
	const vectors = new FakeVectorStore()
	const catalog = new SchemaCatalog(new FakeSchemaStore())
	const trainer = new SchemaTrainer(catalog, vectors, logger)
	await trainer.trainSchema("shop", shopSchema())
	vectors.relevance = relevanceByTable(options.scores ?? {})

	const linker = new SchemaLinker(catalog, vectors, logger)
	const optimizer = new FeedbackOptimizer(options.executor, options.completer, new ResultValidator(lexicon), logger)
	const conversation = new ConversationContextManager({ lexicon, logger, history: options.history })
	const pipeline = new Text2SqlPipeline({
		linker,
		optimizer,
		conversation,
		completer: options.completer,
		logger,
		history: options.history,
	})
	return { pipeline, trainer, conversation, catalog, vectors, logger }
}
