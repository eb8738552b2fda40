import assert from "node:assert/strict";
import test from "node:test";

import { WidgetValueError } from "../errors.js";
import { resolveRange, visibleMembers } from "../range.js";
import type { RangeWidget } from "../types.js";

const bar: RangeWidget = {
	kind: "range",
	name: "Bar",
	members: Array.from({ length: 10 }, (_, index) => `Bar--m${index + 1}.png`),
	totalCount: 10,
};

const isOutOfRange = (error: unknown) => error instanceof WidgetValueError && error.code === "out-of-range";

test("range: 9..10 shows only the last two members", () => {
	assert.deepEqual(visibleMembers(bar, 9, 10), ["Bar--m9.png", "Bar--m10.png"]);
	assert.deepEqual(resolveRange(bar, 9, 10), [false, false, false, false, false, false, false, false, true, true]);
});

test("range: 0..0 hides everything and 1..N shows everything", () => {
	assert.deepEqual(visibleMembers(bar, 0, 0), []);
	assert.deepEqual(visibleMembers(bar, 1, 10), bar.members);
});

test("range: a zero start counts from the first member", () => {
	assert.deepEqual(visibleMembers(bar, 0, 3), ["Bar--m1.png", "Bar--m2.png", "Bar--m3.png"]);
	assert.deepEqual(visibleMembers(bar, 4, 4), ["Bar--m4.png"]);
	assert.deepEqual(visibleMembers(bar, 5, 0), []);
});

test("range: values outside 0..N or reversed bounds are rejected", () => {
	assert.throws(() => resolveRange(bar, 0, 11), isOutOfRange);
	assert.throws(() => resolveRange(bar, -1, 3), isOutOfRange);
	assert.throws(() => resolveRange(bar, 1.5, 3), isOutOfRange);
	assert.throws(() => resolveRange(bar, 3, 2), /Bar: start 3 is after end 2\./);
});

test("range: an empty range only accepts 0..0", () => {
	const empty: RangeWidget = { kind: "range", name: "None", members: [], totalCount: 0 };
	assert.deepEqual(resolveRange(empty, 0, 0), []);
	assert.throws(() => resolveRange(empty, 1, 1), isOutOfRange);
});
