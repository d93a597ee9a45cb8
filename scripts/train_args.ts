/**
 * Argument parsing for scripts/train_schema.ts
 */

export interface TrainArgs {
	connectionId: string
	tablesFile: string
	dryRun: boolean
}

/** Value of a `--name=value` flag; everything after the first `=`. */
function flagValue(arg: string): string {
	return arg.slice(arg.indexOf("=") + 1)
}

/** Null when a required flag is missing. */
export function parseTrainArgs(argv: string[]): TrainArgs | null {
	const args: TrainArgs = { connectionId: "", tablesFile: "", dryRun: false }

	for (const arg of argv) {
		if (arg.startsWith("--connection-id=")) {
			args.connectionId = flagValue(arg)
		} else if (arg.startsWith("--tables=")) {
			args.tablesFile = flagValue(arg)
		} else if (arg === "--dry-run") {
			args.dryRun = true
		}
	}

	return args.connectionId && args.tablesFile ? args : null
}
