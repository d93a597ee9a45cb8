/**
 * Stderr logger
 *
 * stdout is reserved for the MCP protocol, so every level writes to stderr.
 */

import type { Logger, LogMeta } from "./config.js"

export type LogLevel = "debug" | "info" | "warn" | "error"

const LEVEL_ORDER: Record<LogLevel, number> = {
	debug: 10,
	info: 20,
	warn: 30,
	error: 40,
}

function format(tag: string, message: string, meta?: LogMeta): string {
	if (!meta || Object.keys(meta).length === 0) return `[${tag}] ${message}`
	return `[${tag}] ${message} ${JSON.stringify(meta)}`
}

export function createLogger(level: LogLevel = "info"): Logger {
	const threshold = LEVEL_ORDER[level]
	const emit = (lvl: LogLevel, tag: string) => (message: string, meta?: LogMeta) => {
		if (LEVEL_ORDER[lvl] < threshold) return
		console.error(format(tag, message, meta))
	}
	return {
		debug: emit("debug", "DEBUG"),
		info: emit("info", "INFO"),
		warn: emit("warn", "WARN"),
		error: emit("error", "ERROR"),
	}
}
