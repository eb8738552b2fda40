import assert from "node:assert/strict";
import test from "node:test";

import { MAX_TREE_DEPTH } from "../constants.js";
import { buildLayerTree, descendantLayers, filenameFor } from "../layer-tree.js";
import type { SourceNode } from "../types.js";
import { group, layer } from "./fixtures.js";

test("layer tree: filenames join sanitized path segments", () => {
	const { roots, diagnostics } = buildLayerTree([
		group("Smo", [group("Mo", [layer("Layer 1")])]),
		group("Folder", [layer("Special@Char#")]),
	]);
	assert.deepEqual(diagnostics, []);

	const nested = roots[0]?.children[0]?.children[0];
	assert.equal(nested?.filename, "Smo--Mo--Layer_1.png");
	assert.deepEqual(nested?.folderPath, ["Smo", "Mo"]);
	assert.deepEqual(nested?.path, ["Smo", "Mo", "Layer_1"]);

	assert.equal(roots[1]?.children[0]?.filename, "Folder--Special_Char_.png");
	assert.equal(filenameFor(["a", "b"]), "a--b.png");
});

test("layer tree: folder paths use display names without tags", () => {
	const { roots } = buildLayerTree([group("Regular Folder", [group("[T]Nested Toggle", [layer("Glow")])])]);
	const glow = roots[0]?.children[0]?.children[0];
	assert.deepEqual(glow?.folderPath, ["Regular Folder", "Nested Toggle"]);
	assert.equal(glow?.filename, "Regular_Folder--Nested_Toggle--Glow.png");
});

test("layer tree: suppressed subtrees vanish", () => {
	const { roots, diagnostics } = buildLayerTree([
		group("#Guides", [layer("Grid"), group("[T]Inner", [layer("x")])]),
		group("Panel", [layer("#note"), layer("Face")]),
	]);
	assert.deepEqual(diagnostics, []);
	assert.equal(roots.length, 1);
	assert.deepEqual(
		roots[0]?.children.map(child => child.rawName),
		["Face"],
	);
});

test("layer tree: empty names fall back to their sibling index", () => {
	const { roots } = buildLayerTree([
		group("", [layer("a"), layer("")]),
		group("[N]", [group("[D:7]", [])]),
	]);
	assert.deepEqual(roots[0]?.path, ["group_0"]);
	assert.equal(roots[0]?.children[1]?.filename, "group_0--layer_1.png");
	assert.deepEqual(roots[1]?.children[0]?.path, ["group_1", "digit_0"]);
});

test("layer tree: the first node keeps a colliding filename", () => {
	const { roots, diagnostics } = buildLayerTree([layer("Tank A"), layer("Tank_A"), layer("Tank@A")]);
	assert.equal(roots[0]?.filename, "Tank_A.png");
	assert.equal(roots[1]?.filename, null);
	assert.equal(roots[2]?.filename, null);
	assert.deepEqual(
		diagnostics.map(d => [d.kind, d.code, d.path]),
		[
			["filename-collision", "filename-collision", ["Tank_A"]],
			["filename-collision", "filename-collision", ["Tank_A"]],
		],
	);
	assert.equal(diagnostics[0]?.message, '"Tank_A.png" is already produced by Tank_A; this layer is not exported.');
});

test("layer tree: empty layers get no filename and no diagnostic", () => {
	const { roots, diagnostics } = buildLayerTree([
		layer("Blank", null),
		layer("Zero", { x: 3, y: 3, width: 0, height: 5 }),
	]);
	assert.equal(roots[0]?.filename, null);
	assert.equal(roots[1]?.filename, null);
	assert.equal(roots[1]?.bounds, null);
	assert.deepEqual(diagnostics, []);
});

test("layer tree: group bounds are the union of their descendants", () => {
	const { roots } = buildLayerTree([
		group("Outer", [
			layer("a", { x: 2, y: 3, width: 4, height: 4 }),
			group("Inner", [layer("b", { x: 10, y: 10, width: 2, height: 2 }), layer("c", null)]),
			group("Empty", []),
		]),
	]);
	assert.deepEqual(roots[0]?.bounds, { x: 2, y: 3, width: 10, height: 9 });
	assert.deepEqual(roots[0]?.children[1]?.bounds, { x: 10, y: 10, width: 2, height: 2 });
	assert.equal(roots[0]?.children[2]?.bounds, null);
});

test("layer tree: hidden flags survive and pass down from groups", () => {
	const { roots } = buildLayerTree([
		layer("Off", undefined, true),
		group("Set", [layer("On"), group("Inner", [layer("Deep")])], true),
		group("Shown", [layer("Leaf")]),
	]);
	assert.equal(roots[0]?.hidden, true);
	assert.equal(roots[1]?.hidden, true);
	assert.equal(roots[1]?.children[0]?.hidden, true);
	assert.equal(roots[1]?.children[1]?.hidden, true);
	assert.equal(roots[1]?.children[1]?.children[0]?.hidden, true);
	assert.equal(roots[2]?.hidden, false);
	assert.equal(roots[2]?.children[0]?.hidden, false);
});

test("layer tree: nesting past the limit is cut with one diagnostic", () => {
	let node: SourceNode = layer("leaf");
	for (let level = 0; level < MAX_TREE_DEPTH + 5; level += 1) {
		node = group(`g${level}`, [node]);
	}
	const { roots, diagnostics } = buildLayerTree([node]);
	assert.equal(roots.length, 1);
	assert.equal(diagnostics.length, 1);
	assert.equal(diagnostics[0]?.code, "max-depth");
	assert.equal(diagnostics[0]?.path.length, MAX_TREE_DEPTH + 1);

	let depth = 0;
	let current = roots[0];
	while (current) {
		depth += 1;
		current = current.children[0];
	}
	assert.equal(depth, MAX_TREE_DEPTH);
});

test("layer tree: descendantLayers lists leaves in document order", () => {
	const { roots } = buildLayerTree([group("g", [layer("a"), group("h", [layer("b"), layer("c")]), layer("d")])]);
	const [root] = roots;
	assert.ok(root);
	assert.deepEqual(
		descendantLayers(root).map(node => node.rawName),
		["a", "b", "c", "d"],
	);
});
