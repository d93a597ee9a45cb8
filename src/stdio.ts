#!/usr/bin/env node
/**
 * Stdio entry point for the text2sql-engine MCP server
 *
 * Config priority (highest first):
 *   1. CLI argument: a JSON object overlaid on the loaded config
 *   2. Environment variables
 *   3. config/config.local.yaml
 *   4. config/config.yaml
 *
 * Usage:
 *   node dist/stdio.js
 *   node dist/stdio.js '{"sidecar":{"url":"http://localhost:8001"}}'
 */

import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js"
import { describeError } from "./config.js"
import { loadConfig, mergeConfig, type Text2SqlConfig } from "./config/loadConfig.js"
import { createEngine } from "./engine.js"
import createServer, { SERVER_NAME } from "./index.js"
import { createLogger } from "./logger.js"

// stdout is reserved for MCP protocol
const bootLogger = createLogger("info")

function resolveConfig(): Text2SqlConfig {
	const config = loadConfig()
	const configArg = process.argv[2]
	if (!configArg) return config

	const parsed: unknown = JSON.parse(configArg)
	bootLogger.info("Config overrides loaded from CLI argument")
	return mergeConfig(config, parsed)
}

async function main() {
	const config = resolveConfig()
	const logger = createLogger(config.logging.level)

	logger.info(`Starting ${SERVER_NAME} with stdio transport`)
	logger.info(`Store database: ${config.database.user}@${config.database.host}:${config.database.port}/${config.database.name}`)
	logger.info(`Connections: ${Object.keys(config.connections).join(", ") || "(none)"}`)

	const engine = createEngine(config, logger)
	if (!(await engine.sidecar.healthCheck())) {
		logger.warn(`Sidecar at ${config.sidecar.url} is not healthy; queries will fail until it is reachable`)
	}

	const server = createServer({
		pipeline: engine.pipeline,
		trainer: engine.trainer,
		conversation: engine.conversation,
		catalog: engine.catalog,
		executor: engine.executor,
		history: engine.history,
		logger,
	})

	const transport = new StdioServerTransport()
	await server.connect(transport)
	logger.info(`${SERVER_NAME} running via stdio`)

	const shutdown = async () => {
		logger.info("Shutting down...")
		await server.close()
		await engine.close()
		process.exit(0)
	}
	process.on("SIGINT", () => void shutdown())
	process.on("SIGTERM", () => void shutdown())
}

main().catch(error => {
	bootLogger.error("Fatal error", { error: describeError(error) })
	process.exit(1)
})
