/**
 * Result Validator
 *
 * Plausibility checks on a successful result set, driven by cue words in
 * the question (see `result_cues` in config/lexicon.json):
 * - size: "top" style cues cap the row count, "all" cues need a row
 * - type consistency across rows
 * - ordering implied by "highest" / "lowest" / "recent"
 * - no nulls when the question asks for non-null data
 */

import type { Row } from "./collaborators.js"
import { containsAny, type Lexicon } from "./lexicon.js"

export interface ValidationResult {
	isValid: boolean
	issues: string[]
}

export interface ResultValidatorOptions {
	limitedMaxRows: number
	generalMaxRows: number
}

type ValueClass = "numeric" | "string" | "boolean" | "date" | "bytes" | "object"

function classify(value: unknown): ValueClass {
	if (typeof value === "number" || typeof value === "bigint") return "numeric"
	if (typeof value === "string") return "string"
	if (typeof value === "boolean") return "boolean"
	if (value instanceof Date) return "date"
	if (Buffer.isBuffer(value)) return "bytes"
	return "object"
}

function isPresent(value: unknown): boolean {
	return value !== null && value !== undefined
}

function isNumeric(value: unknown): value is number | bigint {
	return typeof value === "number" || typeof value === "bigint"
}

/** True when every adjacent pair satisfies `ok(prev, next)`. */
function isMonotonic(values: number[], ok: (prev: number, next: number) => boolean): boolean {
	for (let i = 0; i < values.length - 1; i++) {
		if (!ok(values[i], values[i + 1])) return false
	}
	return true
}

export class ResultValidator {
	constructor(
		private lexicon: Lexicon,
		private options: ResultValidatorOptions = { limitedMaxRows: 100, generalMaxRows: 10000 },
	) {}

	validate(rows: Row[], question: string): ValidationResult {
		const issues: string[] = []

		if (!this.checkSize(rows, question)) {
			issues.push(`Result size (${rows.length}) may not match the question`)
		}
		if (rows.length > 1 && !this.checkTypeConsistency(rows)) {
			issues.push("Column value types are inconsistent across rows")
		}
		if (!this.checkOrdering(rows, question)) {
			issues.push("Result ordering does not match the question's business logic")
		}
		if (!this.checkNulls(rows, question)) {
			issues.push("Result contains null values although the question asks for non-null data")
		}

		return { isValid: issues.length === 0, issues }
	}

	checkSize(rows: Row[], question: string): boolean {
		const cues = this.lexicon.result_cues
		if (containsAny(question, cues.limited)) return rows.length <= this.options.limitedMaxRows
		if (containsAny(question, cues.all)) return rows.length >= 1
		return rows.length > 0 && rows.length <= this.options.generalMaxRows
	}

	checkTypeConsistency(rows: Row[]): boolean {
		const [first, ...rest] = rows
		for (const row of rest) {
			for (const key of Object.keys(first)) {
				const expected = first[key]
				const actual = row[key]
				if (!isPresent(expected) || !isPresent(actual)) continue
				if (classify(expected) !== classify(actual)) return false
			}
		}
		return true
	}

	checkOrdering(rows: Row[], question: string): boolean {
		if (rows.length <= 1) return true
		const cues = this.lexicon.result_cues

		if (containsAny(question, cues.descending)) {
			return this.numericColumns(rows).every(values => isMonotonic(values, (a, b) => a >= b))
		}
		if (containsAny(question, cues.ascending)) {
			return this.numericColumns(rows).every(values => isMonotonic(values, (a, b) => a <= b))
		}
		if (containsAny(question, cues.recent)) {
			return this.dateColumns(rows).every(values => isMonotonic(values, (a, b) => a >= b))
		}
		return true
	}

	checkNulls(rows: Row[], question: string): boolean {
		if (!containsAny(question, this.lexicon.result_cues.non_null)) return true
		return rows.every(row => Object.values(row).every(isPresent))
	}

	/** Values of each column that holds a number in the first row. */
	private numericColumns(rows: Row[]): number[][] {
		return Object.keys(rows[0])
			.filter(key => isNumeric(rows[0][key]))
			.map(key =>
				rows
					.map(row => row[key])
					.filter(isNumeric)
					.map(value => Number(value)),
			)
	}

	private dateColumns(rows: Row[]): number[][] {
		return Object.keys(rows[0])
			.filter(key => rows[0][key] instanceof Date)
			.map(key =>
				rows
					.map(row => row[key])
					.filter((value): value is Date => value instanceof Date)
					.map(value => value.getTime()),
			)
	}
}
