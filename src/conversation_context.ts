/**
 * Conversation Context Manager
 *
 * Per-connection multi-turn state: bounded turn history, referenced
 * entities and active filters (`last_where`, `time_range`). Rewrites
 * follow-up questions so they stand on their own before schema linking.
 *
 * Every operation for a connection id is serialized through a keyed mutex;
 * different connections never wait on each other. Contexts live until
 * `clearContext` is called.
 */

import type { Logger } from "./config.js"
import type { ChatHistoryStore, Row } from "./collaborators.js"
import {
	KeywordFollowupClassifier,
	PatternEntityExtractor,
	type EntityExtractor,
	type FollowupClassifier,
	type FollowupQueryType,
} from "./conversation_strategies.js"
import { KeyedMutex } from "./keyed_mutex.js"
import {
	containsAny,
	matchTimeRange,
	renderTemplate,
	replaceKeywords,
	type Lexicon,
} from "./lexicon.js"

// ============================================================================
// Types
// ============================================================================

export interface ConversationTurn {
	readonly userMessage: string
	readonly assistantMessage: string
	readonly generatedSql: string
	readonly resultSummary: string
	readonly extractedEntities: readonly string[]
	readonly timestamp: Date
}

export type ActiveFilterKey = "last_where" | "time_range"

export interface ConversationSnapshot {
	connectionId: string
	history: readonly ConversationTurn[]
	referencedEntities: string[]
	activeFilters: Partial<Record<ActiveFilterKey, string>>
}

interface ConversationState {
	connectionId: string
	history: ConversationTurn[]
	referencedEntities: Set<string>
	activeFilters: Map<ActiveFilterKey, string>
}

export interface ConversationContextOptions {
	lexicon: Lexicon
	logger: Logger
	maxTurns?: number
	entityLookbackTurns?: number
	history?: ChatHistoryStore
	warmStartFromHistory?: boolean
	classifier?: FollowupClassifier
	entityExtractor?: EntityExtractor
}

// ============================================================================
// Helpers
// ============================================================================

const WHERE_PATTERN = /\bWHERE\s+([\s\S]+?)(?:\s+GROUP\s+BY\b|\s+ORDER\s+BY\b|\s+HAVING\b|;|$)/i
const TOKEN_SEPARATORS = /[\s,，。.!?！？;；:：]+/

export function summarizeResult(rows: Row[]): string {
	if (rows.length === 0) return "no results"
	return `${rows.length} records, ${Object.keys(rows[0]).length} fields`
}

export function extractWhereClause(sql: string): string | null {
	const match = WHERE_PATTERN.exec(sql)
	if (!match) return null
	const clause = match[1].trim()
	return clause === "" ? null : clause
}

// ============================================================================
// Manager
// ============================================================================

export class ConversationContextManager {
	private contexts = new Map<string, ConversationState>()
	private mutex = new KeyedMutex()
	private lexicon: Lexicon
	private logger: Logger
	private maxTurns: number
	private entityLookbackTurns: number
	private history?: ChatHistoryStore
	private warmStart: boolean
	private classifier: FollowupClassifier
	private entityExtractor: EntityExtractor

	constructor(options: ConversationContextOptions) {
		this.lexicon = options.lexicon
		this.logger = options.logger
		this.maxTurns = options.maxTurns ?? 10
		this.entityLookbackTurns = options.entityLookbackTurns ?? 3
		this.history = options.history
		this.warmStart = options.warmStartFromHistory ?? true
		this.classifier = options.classifier ?? new KeywordFollowupClassifier(options.lexicon)
		this.entityExtractor = options.entityExtractor ?? new PatternEntityExtractor()
	}

	async updateContext(
		connectionId: string,
		userMessage: string,
		assistantMessage: string,
		sql: string,
		rows: Row[],
	): Promise<void> {
		await this.mutex.runExclusive(connectionId, () => {
			const state = this.contexts.get(connectionId) ?? this.createState(connectionId)
			this.appendTurn(state, {
				userMessage,
				assistantMessage,
				generatedSql: sql,
				resultSummary: summarizeResult(rows),
				extractedEntities: this.entityExtractor.extract(userMessage),
				timestamp: new Date(),
			})
			this.logger.info("Conversation context updated", { connectionId, turns: state.history.length })
		})
	}

	async resolveCoreferences(connectionId: string, message: string): Promise<string> {
		return this.mutex.runExclusive(connectionId, () => {
			const state = this.contexts.get(connectionId)
			return state ? this.resolve(state, message) : message
		})
	}

	async analyzeFollowupQuery(connectionId: string, message: string): Promise<FollowupQueryType> {
		return this.mutex.runExclusive(connectionId, () =>
			this.contexts.has(connectionId) ? this.classifier.classify(message) : "new_query",
		)
	}

	async processIncrementalQuery(connectionId: string, message: string, queryType: FollowupQueryType): Promise<string> {
		return this.mutex.runExclusive(connectionId, () => {
			const state = this.contexts.get(connectionId)
			const lastTurn = state?.history.at(-1)
			if (!state || !lastTurn) return message

			const templates = this.lexicon.templates
			const vars = { message, previous: lastTurn.userMessage }
			switch (queryType) {
				case "filter_refinement":
				case "aggregation_change":
				case "column_expansion":
				case "sorting_change":
				case "comparison":
					return renderTemplate(templates[queryType], vars)
				case "pronoun_reference":
					return this.resolve(state, message)
				case "new_query":
					return message
				default: {
					const unreachable: never = queryType
					return unreachable
				}
			}
		})
	}

	/**
	 * Snapshot of the connection's context. With a chat history store
	 * configured, an absent context is first rebuilt from persisted messages.
	 */
	async getContext(connectionId: string): Promise<ConversationSnapshot | null> {
		return this.mutex.runExclusive(connectionId, async () => {
			let state = this.contexts.get(connectionId)
			if (!state && this.history && this.warmStart) {
				state = await this.loadFromHistory(connectionId, this.history)
			}
			return state ? snapshot(state) : null
		})
	}

	async clearContext(connectionId: string): Promise<boolean> {
		return this.mutex.runExclusive(connectionId, () => {
			const removed = this.contexts.delete(connectionId)
			if (removed) this.logger.info("Conversation context cleared", { connectionId })
			return removed
		})
	}

	// ── Internals (caller holds the connection's lock) ────────────────────

	private createState(connectionId: string): ConversationState {
		const state: ConversationState = {
			connectionId,
			history: [],
			referencedEntities: new Set(),
			activeFilters: new Map(),
		}
		this.contexts.set(connectionId, state)
		return state
	}

	private appendTurn(state: ConversationState, turn: ConversationTurn): void {
		state.history.push(Object.freeze({ ...turn, extractedEntities: Object.freeze([...turn.extractedEntities]) }))
		for (const entity of turn.extractedEntities) state.referencedEntities.add(entity)

		const where = extractWhereClause(turn.generatedSql)
		if (where) state.activeFilters.set("last_where", where)
		const timeRange = matchTimeRange(this.lexicon, turn.userMessage)
		if (timeRange) state.activeFilters.set("time_range", timeRange)

		if (state.history.length > this.maxTurns) {
			state.history.splice(0, state.history.length - this.maxTurns)
		}
	}

	private resolve(state: ConversationState, message: string): string {
		const lex = this.lexicon
		const lastTurn = state.history.at(-1)
		const timeRange = state.activeFilters.get("time_range")
		let resolved = message

		// pronouns
		const entity = this.findRecentEntity(state)
		if (entity && containsAny(resolved, lex.pronouns)) {
			resolved = replaceKeywords(resolved, lex.pronouns, entity)
		}

		// continuation: carry over table and time range
		if (lastTurn && containsAny(resolved, lex.continuation_markers)) {
			if (!containsAny(resolved, lex.table_reference_words) && containsAny(lastTurn.userMessage, lex.table_reference_words)) {
				const table = this.extractTableReference(lastTurn.userMessage)
				if (table) resolved = renderTemplate(lex.templates.implicit_table, { table, message: resolved })
			}
			if (timeRange) {
				resolved = renderTemplate(lex.templates.implicit_time_range, { time_range: timeRange, message: resolved })
			}
		}

		// relative time
		if (timeRange && containsAny(resolved, lex.relative_time_references)) {
			resolved = replaceKeywords(resolved, lex.relative_time_references, timeRange)
		}

		// previous result set
		if (lastTurn && containsAny(resolved, lex.result_set_references)) {
			resolved = renderTemplate(lex.templates.result_set_reference, { message: resolved })
		}

		if (resolved !== message) {
			this.logger.debug("Resolved follow-up", { connectionId: state.connectionId, before: message, after: resolved })
		}
		return resolved
	}

	private findRecentEntity(state: ConversationState): string | undefined {
		const recent = state.history.slice(-this.entityLookbackTurns).reverse()
		return recent.find(turn => turn.extractedEntities.length > 0)?.extractedEntities[0]
	}

	private extractTableReference(message: string): string | undefined {
		return message
			.split(TOKEN_SEPARATORS)
			.find(token => token !== "" && containsAny(token, this.lexicon.table_reference_words))
	}

	private async loadFromHistory(connectionId: string, store: ChatHistoryStore): Promise<ConversationState | undefined> {
		const messages = await store.getRecentByConnectionId(connectionId, this.maxTurns * 2)
		if (messages.length === 0) return undefined

		const state = this.createState(connectionId)
		for (let i = 0; i < messages.length; i++) {
			const message = messages[i]
			if (message.role !== "user") continue
			const reply = messages[i + 1]?.role === "assistant" ? messages[i + 1] : undefined
			this.appendTurn(state, {
				userMessage: message.message,
				assistantMessage: reply?.message ?? "",
				generatedSql: reply?.sqlQuery ?? message.sqlQuery ?? "",
				resultSummary: "",
				extractedEntities: this.entityExtractor.extract(message.message),
				timestamp: message.createdAt,
			})
		}
		this.logger.info("Conversation context restored from history", { connectionId, turns: state.history.length })
		return state
	}
}

function snapshot(state: ConversationState): ConversationSnapshot {
	return {
		connectionId: state.connectionId,
		history: [...state.history],
		referencedEntities: [...state.referencedEntities],
		activeFilters: Object.fromEntries(state.activeFilters),
	}
}
