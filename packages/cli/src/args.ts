/** Parsed command-line arguments. */
export interface ParsedArgs {
	/** Named flags (e.g. --config becomes { config: "target.json" }) */
	flags: Record<string, string>;
	/** Arguments that are neither flags nor flag values */
	positional: string[];
}

function takesValue(next: string | undefined): next is string {
	return next !== undefined && !next.startsWith("-");
}

/**
 * Parse process.argv into flags and positional args.
 *
 * Supports:
 * - `--flag value` style options
 * - `--flag=value` style options
 * - `-c value` short options
 * - bare flags, recorded as `"true"`
 */
export function parseArgs(argv: string[]): ParsedArgs {
	// Skip node binary and script path
	const args = argv.slice(2);

	const flags: Record<string, string> = {};
	const positional: string[] = [];

	for (let i = 0; i < args.length; i++) {
		const arg = args[i];
		if (arg === undefined) break;
		const next = args[i + 1];

		if (arg.startsWith("--")) {
			const equalIdx = arg.indexOf("=");
			if (equalIdx !== -1) {
				flags[arg.slice(2, equalIdx)] = arg.slice(equalIdx + 1);
			} else if (takesValue(next)) {
				flags[arg.slice(2)] = next;
				i++;
			} else {
				flags[arg.slice(2)] = "true";
			}
		} else if (arg.startsWith("-") && arg.length === 2) {
			if (takesValue(next)) {
				flags[arg.slice(1)] = next;
				i++;
			} else {
				flags[arg.slice(1)] = "true";
			}
		} else {
			positional.push(arg);
		}
	}

	return { flags, positional };
}

/** Read a flag that may also be given by its short name. */
export function flagValue(flags: Record<string, string>, name: string, short?: string): string | undefined {
	const value = flags[name] ?? (short === undefined ? undefined : flags[short]);
	return value === "true" ? undefined : value;
}

/** Whether a bare flag (or its short name) was given. */
export function hasFlag(flags: Record<string, string>, name: string, short?: string): boolean {
	return flags[name] === "true" || (short !== undefined && flags[short] === "true");
}
