/**
 * Postgres SQL executor
 *
 * One pool per configured connection id (`connections` in config.yaml).
 * Database errors come back as data (`{ rows: [], error }`) so the optimizer
 * can classify and repair them; anything else (unknown connection id,
 * unreachable server, cancellation) throws.
 */

import { DatabaseError, Pool, type FieldDef, type PoolClient } from "pg"
import { Text2SqlError, describeError, type Logger } from "./config.js"
import type { CallOptions, ExecutionResult, Row, SqlExecutor } from "./collaborators.js"

export interface ConnectionSettings {
	connection_string: string
	statement_timeout_ms?: number
}

export interface PgSqlExecutorOptions {
	connections: Record<string, ConnectionSettings>
	statementTimeoutMs: number
	logger: Logger
}

// int8 and numeric arrive as strings; the validator needs numbers
const NUMERIC_TYPE_OIDS = new Set([20, 1700])

export function coerceNumericColumns(rows: Row[], fields: FieldDef[]): Row[] {
	const numericNames = fields.filter(f => NUMERIC_TYPE_OIDS.has(f.dataTypeID)).map(f => f.name)
	if (numericNames.length === 0) return rows
	return rows.map(row => {
		const copy: Row = { ...row }
		for (const name of numericNames) {
			const value = copy[name]
			if (typeof value === "string") {
				const n = Number(value)
				if (Number.isFinite(n)) copy[name] = n
			}
		}
		return copy
	})
}

export class PgSqlExecutor implements SqlExecutor {
	private pools = new Map<string, Pool>()

	constructor(private options: PgSqlExecutorOptions) {}

	async executeQuery(connectionId: string, sql: string, options: CallOptions = {}): Promise<ExecutionResult> {
		if (options.signal?.aborted) throw new Text2SqlError("cancelled", "Query cancelled before execution")

		const settings = this.options.connections[connectionId]
		if (!settings) {
			throw new Text2SqlError("configuration", `Unknown connection id: ${connectionId}`, false, { connectionId })
		}

		let client: PoolClient
		try {
			client = await this.poolFor(connectionId, settings).connect()
		} catch (error) {
			throw new Text2SqlError("execution", `Cannot connect to database for ${connectionId}: ${describeError(error)}`, true, {
				connectionId,
			})
		}

		try {
			const timeout = settings.statement_timeout_ms ?? this.options.statementTimeoutMs
			await client.query(`SET statement_timeout = ${timeout}`)

			const started = Date.now()
			const result = await client.query<Row>(sql)
			this.options.logger.debug("Query executed", {
				connectionId,
				rows: result.rows.length,
				execution_time_ms: Date.now() - started,
			})
			return { rows: coerceNumericColumns(result.rows, result.fields), error: null }
		} catch (error) {
			if (error instanceof DatabaseError) {
				this.options.logger.debug("Query failed", { connectionId, code: error.code, error: error.message })
				return { rows: [], error: error.message }
			}
			throw new Text2SqlError("execution", `Query execution failed: ${describeError(error)}`, false, { connectionId })
		} finally {
			client.release()
		}
	}

	async close(): Promise<void> {
		const pools = [...this.pools.values()]
		this.pools.clear()
		await Promise.all(pools.map(p => p.end()))
	}

	private poolFor(connectionId: string, settings: ConnectionSettings): Pool {
		let pool = this.pools.get(connectionId)
		if (!pool) {
			pool = new Pool({ connectionString: settings.connection_string, max: 5 })
			pool.on("error", err => this.options.logger.error("Idle client error", { connectionId, error: err.message }))
			this.pools.set(connectionId, pool)
		}
		return pool
	}
}
