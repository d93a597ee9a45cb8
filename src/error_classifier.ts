/**
 * Execution error classification
 *
 * Maps a raw database error message to a closed set of kinds, each paired
 * with one remediation hint. Rules are case-insensitive substring checks;
 * the first matching rule wins.
 */

export type ErrorKind =
	| "column_not_found"
	| "table_not_found"
	| "syntax_error"
	| "type_mismatch"
	| "aggregation_error"
	| "join_error"
	| "unknown"
	| "system_error"

export interface ErrorAnalysis {
	kind: ErrorKind
	message: string
	suggestedFix: string
}

export const ERROR_KIND_LABELS: Record<ErrorKind, string> = {
	column_not_found: "Column not found",
	table_not_found: "Table not found",
	syntax_error: "Syntax error",
	type_mismatch: "Type mismatch",
	aggregation_error: "Aggregation error",
	join_error: "Join error",
	unknown: "Unknown error",
	system_error: "System error",
}

export const ERROR_KIND_HINTS: Record<ErrorKind, string> = {
	column_not_found: "Check the column name spelling and confirm the column exists in the referenced table",
	table_not_found: "Check the table name spelling and confirm the table exists in the database",
	syntax_error: "Check the SQL syntax, especially keyword usage and punctuation",
	type_mismatch: "Check data type conversions so compared values have matching types",
	aggregation_error: "Make sure every non-aggregated column is listed in GROUP BY",
	join_error: "Check the JOIN conditions and confirm the join columns exist and have matching types",
	unknown: "Review the SQL statement's syntax and logic carefully",
	system_error: "Check the service configuration and collaborator availability",
}

const MISSING = ["not found", "doesn't exist", "does not exist"]

function hasAny(text: string, needles: string[]): boolean {
	return needles.some(n => text.includes(n))
}

export function classifyErrorKind(rawMessage: string): ErrorKind {
	const error = rawMessage.toLowerCase()

	if (
		(error.includes("column") && hasAny(error, MISSING)) ||
		hasAny(error, ["no such column", "unknown column", "invalid column name"])
	) {
		return "column_not_found"
	}
	if (
		((error.includes("table") || error.includes("relation")) && hasAny(error, MISSING)) ||
		hasAny(error, ["no such table", "invalid object name"])
	) {
		return "table_not_found"
	}
	if (error.includes("syntax") || error.includes("near")) return "syntax_error"
	if ((error.includes("type") && error.includes("mismatch")) || error.includes("operator does not exist")) {
		return "type_mismatch"
	}
	if (error.includes("aggregate") || error.includes("group by")) return "aggregation_error"
	if (error.includes("join") || error.includes("foreign key")) return "join_error"
	return "unknown"
}

export function classifyError(rawMessage: string): ErrorAnalysis {
	const kind = classifyErrorKind(rawMessage)
	return { kind, message: rawMessage, suggestedFix: ERROR_KIND_HINTS[kind] }
}

export function systemErrorAnalysis(message: string): ErrorAnalysis {
	return { kind: "system_error", message, suggestedFix: ERROR_KIND_HINTS.system_error }
}

/** Text handed to the repair template as `errorMessage`. */
export function formatRepairMessage(analysis: ErrorAnalysis): string {
	return `${ERROR_KIND_LABELS[analysis.kind]}: ${analysis.message}\nSuggestion: ${analysis.suggestedFix}`
}
