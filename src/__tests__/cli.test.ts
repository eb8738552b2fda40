import assert from "node:assert/strict";
import path from "node:path";
import test from "node:test";

import { defaultOutputDir, parseArgs } from "../cli.js";

test("cli: output defaults to a folder beside the input", () => {
	const args = parseArgs(["--input", "art/panel.psd"]);
	assert.deepEqual(args, {
		input: path.resolve("art/panel.psd"),
		out: path.resolve("art/panel_layers"),
		force: false,
		strict: false,
	});
	assert.equal(defaultOutputDir(path.join("/tmp", "art", "dash.psb")), path.join("/tmp", "art", "dash_layers"));
});

test("cli: explicit output and boolean flags", () => {
	const args = parseArgs(["--strict", "--input", "panel.psb", "--out", "build/out", "--force"]);
	assert.equal(args.out, path.resolve("build/out"));
	assert.equal(args.force, true);
	assert.equal(args.strict, true);
});

test("cli: bad arguments are errors", () => {
	assert.throws(() => parseArgs([]), /--input is required/);
	assert.throws(() => parseArgs(["--input"]), /Missing value for --input/);
	assert.throws(() => parseArgs(["--input", "a.psd", "--out", "--force"]), /Missing value for --out/);
	assert.throws(() => parseArgs(["--input", "a.psd", "--verbose"]), /Unknown option --verbose/);
	assert.throws(() => parseArgs(["a.psd"]), /Unexpected argument "a.psd"/);
});
