import path from "node:path";

import type { Args } from "./types.js";

export const USAGE = "Usage: psd2panel --input <file.psd|file.psb> [--out <dir>] [--force] [--strict]";

export function defaultOutputDir(input: string): string {
	const stem = path.basename(input, path.extname(input));
	return path.join(path.dirname(input), `${stem}_layers`);
}

export function parseArgs(argv: string[]): Args {
	const raw: Record<string, string> = {};
	const flags = new Set<string>();
	const booleanFlags = new Set(["force", "strict"]);
	const valueFlags = new Set(["input", "out"]);
	for (let i = 0; i < argv.length; i += 1) {
		const arg = argv[i];
		if (!arg || !arg.startsWith("--")) {
			throw new Error(`Unexpected argument "${arg ?? ""}". ${USAGE}`);
		}
		const key = arg.slice(2);
		if (booleanFlags.has(key)) {
			flags.add(key);
			continue;
		}
		if (!valueFlags.has(key)) throw new Error(`Unknown option --${key}. ${USAGE}`);
		const value = argv[i + 1];
		if (!value || value.startsWith("--")) {
			throw new Error(`Missing value for --${key}`);
		}
		raw[key] = value;
		i += 1;
	}

	if (!raw.input) throw new Error(`--input is required. ${USAGE}`);

	const input = path.resolve(raw.input);
	return {
		input,
		out: raw.out ? path.resolve(raw.out) : defaultOutputDir(input),
		force: flags.has("force"),
		strict: flags.has("strict"),
	};
}
