/**
 * Wires the concrete collaborators (Postgres, pgvector, HTTP sidecar) into
 * the engine services from a loaded config.
 */

import { Pool } from "pg"
import type { Logger } from "./config.js"
import type { Text2SqlConfig } from "./config/loadConfig.js"
import { ConversationContextManager } from "./conversation_context.js"
import { FeedbackOptimizer } from "./feedback_optimizer.js"
import { loadLexicon } from "./lexicon.js"
import { PgChatHistoryStore, PgSchemaStore } from "./pg_repositories.js"
import { PgSqlExecutor } from "./pg_sql_executor.js"
import { PgVectorStore } from "./pg_vector_store.js"
import { ResultValidator } from "./result_validator.js"
import { SchemaCatalog } from "./schema_catalog.js"
import { SchemaLinker } from "./schema_linker.js"
import { SchemaTrainer } from "./schema_trainer.js"
import { SidecarClient } from "./sidecar_client.js"
import { Text2SqlPipeline } from "./text2sql_pipeline.js"

export interface Text2SqlEngine {
	pipeline: Text2SqlPipeline
	trainer: SchemaTrainer
	conversation: ConversationContextManager
	catalog: SchemaCatalog
	executor: PgSqlExecutor
	history: PgChatHistoryStore
	sidecar: SidecarClient
	close(): Promise<void>
}

export function createEngine(config: Text2SqlConfig, logger: Logger): Text2SqlEngine {
	const storePool = new Pool({
		host: config.database.host,
		port: config.database.port,
		database: config.database.name,
		user: config.database.user,
		password: config.database.password,
		max: 10,
	})
	storePool.on("error", err => logger.error("Store pool idle client error", { error: err.message }))

	const sidecar = new SidecarClient({
		baseUrl: config.sidecar.url,
		timeoutMs: config.sidecar.timeout_ms,
		temperature: config.sidecar.temperature,
		logger,
	})
	const executor = new PgSqlExecutor({
		connections: config.connections,
		statementTimeoutMs: config.optimizer.statement_timeout_ms,
		logger,
	})
	const vectors = new PgVectorStore(storePool, sidecar, logger)
	const history = new PgChatHistoryStore(storePool)
	const lexicon = loadLexicon(config.conversation.lexicon_path)

	const sl = config.schema_linking
	const catalog = new SchemaCatalog(new PgSchemaStore(storePool), { cacheEnabled: sl.cache_schemas, logger })
	const trainer = new SchemaTrainer(catalog, vectors, logger)
	const linker = new SchemaLinker(catalog, vectors, logger, {
		relevanceThreshold: sl.relevance_threshold,
		thresholdFloor: sl.threshold_floor,
		thresholdStep: sl.threshold_step,
		minTablesRequired: sl.min_tables_required,
		maxTables: sl.max_tables,
		maxRelatedTables: sl.max_related_tables,
	})

	const validator = new ResultValidator(lexicon, {
		limitedMaxRows: config.optimizer.limited_max_rows,
		generalMaxRows: config.optimizer.general_max_rows,
	})
	const optimizer = new FeedbackOptimizer(executor, sidecar, validator, logger, {
		maxIterations: config.optimizer.max_iterations,
		iterationTimeoutMs: config.optimizer.iteration_timeout_ms,
		temperature: config.sidecar.temperature,
	})
	const conversation = new ConversationContextManager({
		lexicon,
		logger,
		maxTurns: config.conversation.max_turns,
		entityLookbackTurns: config.conversation.entity_lookback_turns,
		history,
		warmStartFromHistory: config.conversation.warm_start_from_history,
	})

	const pipeline = new Text2SqlPipeline({
		linker,
		optimizer,
		conversation,
		completer: sidecar,
		history,
		logger,
		temperature: config.sidecar.temperature,
		maxIterations: config.optimizer.max_iterations,
	})

	return {
		pipeline,
		trainer,
		conversation,
		catalog,
		executor,
		history,
		sidecar,
		async close() {
			await executor.close()
			await storePool.end()
		},
	}
}
