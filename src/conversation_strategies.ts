/**
 * Pluggable heuristics behind ConversationContextManager: follow-up
 * classification and entity extraction. The default implementations are
 * keyword and pattern based and read their vocabulary from the lexicon.
 */

import { containsAny, type Lexicon } from "./lexicon.js"

export type FollowupQueryType =
	| "new_query"
	| "filter_refinement"
	| "aggregation_change"
	| "column_expansion"
	| "sorting_change"
	| "pronoun_reference"
	| "comparison"

export interface FollowupClassifier {
	/** Called only when the connection already has conversation context. */
	classify(message: string): FollowupQueryType
}

export interface EntityExtractor {
	extract(message: string): string[]
}

/**
 * First matching keyword group wins, in a fixed priority order.
 */
export class KeywordFollowupClassifier implements FollowupClassifier {
	constructor(private lexicon: Lexicon) {}

	classify(message: string): FollowupQueryType {
		const groups = this.lexicon.followup
		if (containsAny(message, groups.filter_refinement)) return "filter_refinement"
		if (containsAny(message, groups.aggregation_change)) return "aggregation_change"
		if (containsAny(message, groups.column_expansion)) return "column_expansion"
		if (containsAny(message, groups.sorting_change)) return "sorting_change"
		if (containsAny(message, this.lexicon.pronouns)) return "pronoun_reference"
		if (containsAny(message, groups.comparison)) return "comparison"
		return "new_query"
	}
}

// numbers, 'single', "double", Capitalized
const ENTITY_PATTERNS: RegExp[] = [/\b\d+\b/g, /'([^']*)'/g, /"([^"]*)"/g, /\b[A-Z][a-z]+\b/g]

/**
 * Regex entity extraction. Returns entities in pattern order, first
 * occurrence kept, blanks dropped.
 */
export class PatternEntityExtractor implements EntityExtractor {
	extract(message: string): string[] {
		const entities: string[] = []
		for (const pattern of ENTITY_PATTERNS) {
			for (const match of message.matchAll(pattern)) {
				const value = match[1] ?? match[0]
				if (value.trim() === "" || entities.includes(value)) continue
				entities.push(value)
			}
		}
		return entities
	}
}
