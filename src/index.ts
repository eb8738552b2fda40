#!/usr/bin/env node
import { promises as fsp } from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";

import { parseArgs } from "./cli.js";
import { LOG_PREFIX } from "./constants.js";
import { formatDiagnostic, summarizeDiagnostics } from "./diagnostics.js";
import { processDocument } from "./document-processor.js";
import { readPsdFile } from "./psd-reader.js";
import { exists, hashFileName, hashFiles, listFilesRecursive } from "./utils.js";

const toolRoot = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "..");

async function collectToolFiles(): Promise<string[]> {
	const [sources, data] = await Promise.all([
		listFilesRecursive(path.join(toolRoot, "src")),
		listFilesRecursive(path.join(toolRoot, "data")),
	]);
	const dist = sources.length > 0 ? [] : await listFilesRecursive(path.join(toolRoot, "dist"));
	return [...sources, ...dist, ...data];
}

async function main(): Promise<void> {
	const args = parseArgs(process.argv.slice(2));
	if (!(await exists(args.input))) throw new Error(`Input file not found: ${args.input}`);

	const name = path.basename(args.input);
	const hash = await hashFiles([args.input, ...(await collectToolFiles())]);
	const hashFile = path.join(args.out, hashFileName(args.input));
	if (!args.force) {
		const storedHash = (await exists(hashFile)) ? (await fsp.readFile(hashFile, "utf8")).trim() : null;
		if (storedHash === hash) {
			console.log(`${LOG_PREFIX} ${name}: up-to-date.`);
			return;
		}
	}

	console.log(`${LOG_PREFIX} ${name}: reading layers.`);
	const document = await readPsdFile(args.input);
	const result = await processDocument({ document, sourceFile: args.input, outDir: args.out });

	if (result.diagnostics.length > 0) {
		console.warn(`${LOG_PREFIX} ${name}: ${summarizeDiagnostics(result.diagnostics)}.`);
		for (const diagnostic of result.diagnostics) {
			console.warn(`${LOG_PREFIX}   ${formatDiagnostic(diagnostic)}`);
		}
	}
	if (args.strict && result.diagnostics.length > 0) {
		throw new Error(`${LOG_PREFIX} strict mode failed with ${result.diagnostics.length} issue(s).`);
	}

	await fsp.writeFile(hashFile, `${hash}\n`, "utf8");
	console.log(`${LOG_PREFIX} ${name}: wrote ${path.relative(process.cwd(), args.out) || "."}.`);
}

main().catch(error => {
	console.error(error);
	process.exit(1);
});
