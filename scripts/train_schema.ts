#!/usr/bin/env npx tsx
/**
 * Train Schema Script
 *
 * Stores a connection's table list and rebuilds its table embeddings.
 *
 * Usage:
 *   npx tsx scripts/train_schema.ts --connection-id=shop --tables=schemas/shop.json
 *   npx tsx scripts/train_schema.ts --connection-id=shop --tables=schemas/shop.json --dry-run
 *
 * Options:
 *   --connection-id  Connection id to train (required)
 *   --tables         JSON file with [{ tableName, description, columns, foreignKeys }] (required)
 *   --dry-run        Print the retrieval text per table, write nothing
 *
 * Database, sidecar and logging settings come from config/config.yaml and
 * the usual environment overrides.
 */

import fs from "fs"
import path from "path"
import { describeError } from "../src/config.js"
import { loadConfig } from "../src/config/loadConfig.js"
import { createEngine } from "../src/engine.js"
import { createLogger } from "../src/logger.js"
import { enabledColumns, parseTableList } from "../src/schema_types.js"
import { describeTable, normalizeTable } from "../src/schema_trainer.js"
import { parseTrainArgs, type TrainArgs } from "./train_args.js"

// ============================================================================
// Arguments
// ============================================================================

function parseArgs(): TrainArgs {
	const args = parseTrainArgs(process.argv.slice(2))
	if (!args) {
		console.error("Usage: npx tsx scripts/train_schema.ts --connection-id=<id> --tables=<file.json> [--dry-run]")
		process.exit(1)
	}
	return args
}

// ============================================================================
// Main
// ============================================================================

async function main() {
	const args = parseArgs()
	const config = loadConfig()
	const logger = createLogger(config.logging.level)

	const tablesPath = path.resolve(args.tablesFile)
	const tables = parseTableList(fs.readFileSync(tablesPath, "utf-8"))
	console.log(`Loaded ${tables.length} tables from ${tablesPath}`)

	if (args.dryRun) {
		for (const table of tables.map(normalizeTable)) {
			const marker = enabledColumns(table).length === 0 ? " (skipped: no enabled columns)" : ""
			console.log(`\n=== ${table.tableName}${marker} ===\n${describeTable(table)}`)
		}
		return
	}

	const engine = createEngine(config, logger)
	try {
		const result = await engine.trainer.trainSchema(args.connectionId, tables)
		console.log(`\nTrained ${result.trained.length} tables for ${args.connectionId}`)
		if (result.skipped.length > 0) {
			console.log(`Skipped (no enabled columns): ${result.skipped.join(", ")}`)
		}
	} finally {
		await engine.close()
	}
}

main().catch(error => {
	console.error(`Training failed: ${describeError(error)}`)
	process.exit(1)
})
