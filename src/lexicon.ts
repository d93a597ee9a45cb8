/**
 * Conversation lexicon
 *
 * Keyword tables, rewrite templates and the relative-time pattern used by
 * conversation_context.ts and result_validator.ts. Loaded from
 * config/lexicon.json (or conversation.lexicon_path) and validated with zod,
 * so deployments can swap vocabulary without code changes.
 *
 * Matching rule: ASCII keywords match whole words, case-insensitively.
 * Everything else (CJK) matches as a plain substring, since those scripts
 * have no word separators.
 */

import * as fs from "fs"
import { z } from "zod"
import { Text2SqlError } from "./config.js"
import { findConfigFile } from "./config/loadConfig.js"

// ============================================================================
// Schema
// ============================================================================

const keywordList = z.array(z.string().min(1))

export const lexiconSchema = z.object({
	pronouns: keywordList,
	continuation_markers: keywordList,
	relative_time_references: keywordList,
	result_set_references: keywordList,
	table_reference_words: keywordList,
	time_range_pattern: z.string().min(1),
	followup: z.object({
		filter_refinement: keywordList,
		aggregation_change: keywordList,
		column_expansion: keywordList,
		sorting_change: keywordList,
		comparison: keywordList,
	}),
	result_cues: z.object({
		limited: keywordList,
		all: keywordList,
		descending: keywordList,
		ascending: keywordList,
		recent: keywordList,
		non_null: keywordList,
	}),
	templates: z.object({
		filter_refinement: z.string(),
		aggregation_change: z.string(),
		column_expansion: z.string(),
		sorting_change: z.string(),
		comparison: z.string(),
		implicit_table: z.string(),
		implicit_time_range: z.string(),
		result_set_reference: z.string(),
	}),
})

export type Lexicon = z.infer<typeof lexiconSchema>

// ============================================================================
// Loading
// ============================================================================

export function parseLexicon(raw: unknown, source: string): Lexicon {
	const parsed = lexiconSchema.safeParse(raw)
	if (!parsed.success) {
		throw new Text2SqlError(
			"configuration",
			`Invalid lexicon ${source}: ${parsed.error.issues.map(i => `${i.path.join(".")}: ${i.message}`).join("; ")}`,
		)
	}
	try {
		new RegExp(parsed.data.time_range_pattern, "i")
	} catch (error) {
		throw new Text2SqlError("configuration", `Invalid time_range_pattern in ${source}: ${String(error)}`)
	}
	return parsed.data
}

export function loadLexicon(filePath?: string): Lexicon {
	const resolved = filePath ?? findConfigFile("lexicon.json")
	if (!resolved || !fs.existsSync(resolved)) {
		throw new Text2SqlError("configuration", `Lexicon file not found: ${resolved ?? "config/lexicon.json"}`)
	}
	let raw: unknown
	try {
		raw = JSON.parse(fs.readFileSync(resolved, "utf-8"))
	} catch (error) {
		throw new Text2SqlError("configuration", `Lexicon ${resolved} is not valid JSON: ${String(error)}`)
	}
	return parseLexicon(raw, resolved)
}

let _defaultLexicon: Lexicon | null = null

export function getDefaultLexicon(): Lexicon {
	if (!_defaultLexicon) _defaultLexicon = loadLexicon()
	return _defaultLexicon
}

// ============================================================================
// Keyword Matching
// ============================================================================

function escapeRegExp(text: string): string {
	return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&")
}

function isAscii(keyword: string): boolean {
	return /^[\x20-\x7e]+$/.test(keyword)
}

function keywordRegExp(keyword: string, flags: string): RegExp {
	return new RegExp(`\\b${escapeRegExp(keyword)}\\b`, `i${flags}`)
}

export function containsKeyword(text: string, keyword: string): boolean {
	if (isAscii(keyword)) return keywordRegExp(keyword, "").test(text)
	return text.includes(keyword)
}

export function containsAny(text: string, keywords: readonly string[]): boolean {
	return keywords.some(k => containsKeyword(text, k))
}

/**
 * Replace every occurrence of any keyword in a single pass, longest keyword
 * first, so a replacement is never rescanned.
 */
export function replaceKeywords(text: string, keywords: readonly string[], replacement: string): string {
	if (keywords.length === 0) return text
	const alternatives = [...keywords]
		.sort((a, b) => b.length - a.length)
		.map(k => (isAscii(k) ? `\\b${escapeRegExp(k)}\\b` : escapeRegExp(k)))
	return text.replace(new RegExp(alternatives.join("|"), "gi"), () => replacement)
}

/**
 * Fill `{name}` placeholders. Unknown placeholders are left as-is.
 */
export function renderTemplate(template: string, vars: Record<string, string>): string {
	return template.replace(/\{(\w+)\}/g, (whole, name: string) => vars[name] ?? whole)
}

export function matchTimeRange(lexicon: Lexicon, text: string): string | null {
	const match = new RegExp(lexicon.time_range_pattern, "i").exec(text)
	return match ? match[0] : null
}
