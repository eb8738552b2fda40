import assert from "node:assert/strict";
import test from "node:test";

import { formatDiagnostic, structural, summarizeDiagnostics } from "../diagnostics.js";
import type { Diagnostic } from "../types.js";

test("diagnostics: formatted with their path", () => {
	assert.equal(formatDiagnostic(structural("not-a-group", ["Panel", "Speed"], "oops.")), "Panel / Speed: oops.");
	assert.equal(formatDiagnostic(structural("max-depth", [], "deep.")), "<document>: deep.");
});

test("diagnostics: structural copies the path", () => {
	const path = ["a"];
	const diagnostic = structural("not-a-digit", path, "x");
	path.push("b");
	assert.deepEqual(diagnostic.path, ["a"]);
	assert.equal(diagnostic.kind, "structural");
});

test("diagnostics: summary counts by kind", () => {
	const collision: Diagnostic = { kind: "filename-collision", code: "filename-collision", path: ["a"], message: "m" };
	assert.equal(summarizeDiagnostics([]), "no issues");
	assert.equal(summarizeDiagnostics([collision]), "1 filename collision(s)");
	assert.equal(
		summarizeDiagnostics([structural("not-a-group", [], "a"), structural("max-depth", [], "b"), collision]),
		"2 structural error(s), 1 filename collision(s)",
	);
});
