/**
 * Unified config loader for text2sql-engine.
 *
 * Precedence: ENV > config/config.local.yaml > config/config.yaml
 *
 * Every key is optional. Whatever the YAML files and the environment leave
 * out is filled from the defaults declared in `configSchema`.
 */

import * as fs from "fs"
import * as path from "path"
import { fileURLToPath } from "url"
import * as yaml from "js-yaml"
import { z } from "zod"
import { Text2SqlError } from "../config.js"

// ── Schema ───────────────────────────────────────────────────────────

/** Largest delay setTimeout honours; longer values fire immediately. */
const MAX_TIMER_MS = 2_147_483_647

const timeoutMs = () => z.number().int().positive().max(MAX_TIMER_MS)

const connectionSchema = z.object({
	connection_string: z.string().min(1),
	statement_timeout_ms: timeoutMs().optional(),
})

export const configSchema = z.object({
	database: z.object({
		host: z.string().default("localhost"),
		port: z.number().int().positive().default(5432),
		name: z.string().default("text2sql"),
		user: z.string().default("postgres"),
		password: z.string().default(""),
	}).default({}),
	connections: z.record(connectionSchema).default({}),
	sidecar: z.object({
		url: z.string().default("http://localhost:8001"),
		timeout_ms: timeoutMs().default(30000),
		temperature: z.number().min(0).max(2).default(0.1),
	}).default({}),
	schema_linking: z.object({
		relevance_threshold: z.number().min(0).max(1).default(0.7),
		threshold_floor: z.number().min(0).max(1).default(0.4),
		threshold_step: z.number().positive().max(1).default(0.1),
		min_tables_required: z.number().int().min(1).default(1),
		max_tables: z.number().int().min(1).default(5),
		max_related_tables: z.number().int().min(0).default(10),
		cache_schemas: z.boolean().default(true),
	}).default({}),
	optimizer: z.object({
		max_iterations: z.number().int().min(1).default(3),
		iteration_timeout_ms: timeoutMs().default(60000),
		statement_timeout_ms: timeoutMs().default(30000),
		limited_max_rows: z.number().int().positive().default(100),
		general_max_rows: z.number().int().positive().default(10000),
	}).default({}),
	conversation: z.object({
		max_turns: z.number().int().min(1).default(10),
		entity_lookback_turns: z.number().int().min(1).default(3),
		warm_start_from_history: z.boolean().default(true),
		lexicon_path: z.string().optional(),
	}).default({}),
	logging: z.object({
		level: z.enum(["debug", "info", "warn", "error"]).default("info"),
	}).default({}),
})

export type Text2SqlConfig = z.infer<typeof configSchema>

// ── File Lookup ──────────────────────────────────────────────────────

function isRecord(value: unknown): value is Record<string, unknown> {
	return value !== null && typeof value === "object" && !Array.isArray(value)
}

function walkUpFor(startDir: string, fileName: string): string | null {
	let dir = startDir
	for (let i = 0; i < 10; i++) {
		const candidate = path.join(dir, "config", fileName)
		if (fs.existsSync(candidate)) return candidate
		const parent = path.dirname(dir)
		if (parent === dir) break
		dir = parent
	}
	return null
}

/**
 * Find `config/<fileName>`, walking up from cwd first and then from this
 * module's directory, so bundled data files are found even when the process
 * runs elsewhere. config.yaml itself is only looked up from cwd.
 */
export function findConfigFile(fileName: string): string | null {
	const fromCwd = walkUpFor(process.cwd(), fileName)
	if (fromCwd) return fromCwd
	const moduleDir = path.dirname(fileURLToPath(import.meta.url))
	return walkUpFor(moduleDir, fileName)
}

function loadYaml(filePath: string): Record<string, unknown> {
	if (!fs.existsSync(filePath)) return {}
	const raw = fs.readFileSync(filePath, "utf-8")
	const parsed: unknown = yaml.load(raw)
	return isRecord(parsed) ? parsed : {}
}

/** Deep merge b into a (b wins on conflicts). */
function deepMerge(a: Record<string, unknown>, b: Record<string, unknown>): Record<string, unknown> {
	const result: Record<string, unknown> = { ...a }
	for (const key of Object.keys(b)) {
		const left = a[key]
		const right = b[key]
		if (isRecord(left) && isRecord(right)) {
			result[key] = deepMerge(left, right)
		} else {
			result[key] = right
		}
	}
	return result
}

// ── Env Overlay ──────────────────────────────────────────────────────

function env(name: string): string | undefined {
	return process.env[name]
}
function envBoolDefaultOn(name: string): boolean | undefined {
	const v = env(name)
	if (v === undefined) return undefined
	return v !== "false" && v !== "0"
}
function envInt(name: string): number | undefined {
	const v = env(name)
	if (v === undefined) return undefined
	const n = parseInt(v, 10)
	return isNaN(n) ? undefined : n
}
function envFloat(name: string): number | undefined {
	const v = env(name)
	if (v === undefined) return undefined
	const n = parseFloat(v)
	return isNaN(n) ? undefined : n
}

function section(cfg: Record<string, unknown>, key: string): Record<string, unknown> {
	const existing = cfg[key]
	if (isRecord(existing)) return existing
	const created: Record<string, unknown> = {}
	cfg[key] = created
	return created
}

function assign(target: Record<string, unknown>, key: string, value: unknown): void {
	if (value !== undefined) target[key] = value
}

/** Apply env-var overrides on top of merged YAML. */
function applyEnvOverrides(cfg: Record<string, unknown>): void {
	const db = section(cfg, "database")
	assign(db, "host", env("DB_HOST"))
	assign(db, "port", envInt("DB_PORT"))
	assign(db, "name", env("DB_NAME"))
	assign(db, "user", env("DB_USER"))
	assign(db, "password", env("DB_PASSWORD"))

	const s = section(cfg, "sidecar")
	assign(s, "url", env("SIDECAR_URL"))
	assign(s, "timeout_ms", envInt("SIDECAR_TIMEOUT_MS"))
	assign(s, "temperature", envFloat("TEMPERATURE"))

	const sl = section(cfg, "schema_linking")
	assign(sl, "relevance_threshold", envFloat("SCHEMA_RELEVANCE_THRESHOLD"))
	assign(sl, "max_tables", envInt("SCHEMA_MAX_TABLES"))
	assign(sl, "max_related_tables", envInt("SCHEMA_MAX_RELATED_TABLES"))
	assign(sl, "cache_schemas", envBoolDefaultOn("SCHEMA_CACHE_ENABLED"))

	const o = section(cfg, "optimizer")
	assign(o, "max_iterations", envInt("OPTIMIZER_MAX_ITERATIONS"))
	assign(o, "iteration_timeout_ms", envInt("OPTIMIZER_ITERATION_TIMEOUT_MS"))
	assign(o, "statement_timeout_ms", envInt("STATEMENT_TIMEOUT_MS"))

	const c = section(cfg, "conversation")
	assign(c, "max_turns", envInt("CONVERSATION_MAX_TURNS"))
	assign(c, "lexicon_path", env("LEXICON_PATH"))

	const l = section(cfg, "logging")
	assign(l, "level", env("LOG_LEVEL"))
}

// ── Singleton ────────────────────────────────────────────────────────

let _config: Text2SqlConfig | null = null

export function loadConfig(): Text2SqlConfig {
	if (_config) return _config

	let merged: Record<string, unknown> = {}
	const basePath = walkUpFor(process.cwd(), "config.yaml")
	if (basePath) {
		const base = loadYaml(basePath)
		const local = loadYaml(path.join(path.dirname(basePath), "config.local.yaml"))
		merged = deepMerge(base, local)
	}

	applyEnvOverrides(merged)

	const parsed = configSchema.safeParse(merged)
	if (!parsed.success) {
		throw new Text2SqlError(
			"configuration",
			`Invalid configuration: ${parsed.error.issues.map(i => `${i.path.join(".")}: ${i.message}`).join("; ")}`,
			false,
			{ source: basePath },
		)
	}
	_config = parsed.data
	return _config
}

export function getConfig(): Text2SqlConfig {
	return _config ?? loadConfig()
}

/** Reset singleton (for tests). */
export function resetConfig(): void {
	_config = null
}

/**
 * Overlay `overrides` (e.g. a JSON CLI argument) on a loaded config and
 * validate the result.
 */
export function mergeConfig(config: Text2SqlConfig, overrides: unknown): Text2SqlConfig {
	if (!isRecord(overrides)) {
		throw new Text2SqlError("configuration", "Config overrides must be a JSON object")
	}
	const parsed = configSchema.safeParse(deepMerge({ ...config }, overrides))
	if (!parsed.success) {
		throw new Text2SqlError(
			"configuration",
			`Invalid configuration override: ${parsed.error.issues.map(i => `${i.path.join(".")}: ${i.message}`).join("; ")}`,
		)
	}
	return parsed.data
}
