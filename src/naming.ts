import type { ParsedName, WidgetTag } from "./types.js";

const SUPPRESS_PREFIX = "#";
const DIGIT_PATTERN = /^\[D:(7|16)(p?)\]/;

// Checked after the suppression, toggle and digit prefixes; the first match wins.
const SIMPLE_TAGS: ReadonlyArray<{ prefix: string; tag: WidgetTag }> = [
	{ prefix: "[N]", tag: { kind: "number" } },
	{ prefix: "[S]", tag: { kind: "string" } },
	{ prefix: "[R]", tag: { kind: "range" } },
];

export function parseLayerName(rawName: string): ParsedName {
	if (rawName.startsWith(SUPPRESS_PREFIX)) {
		return { tag: { kind: "suppressed" }, displayName: rawName.slice(SUPPRESS_PREFIX.length) };
	}

	if (rawName.startsWith("[T]")) {
		return { tag: { kind: "toggle" }, displayName: rawName.slice(3) };
	}

	const digit = rawName.match(DIGIT_PATTERN);
	if (digit) {
		return {
			tag: { kind: "digit", alphabet: digit[1] === "16" ? "sixteen" : "seven", hasPoint: digit[2] === "p" },
			displayName: rawName.slice(digit[0].length),
		};
	}

	for (const { prefix, tag } of SIMPLE_TAGS) {
		if (rawName.startsWith(prefix)) {
			return { tag, displayName: rawName.slice(prefix.length) };
		}
	}

	return { tag: { kind: "none" }, displayName: rawName };
}

export function describeTag(tag: WidgetTag): string {
	switch (tag.kind) {
		case "none":
			return "plain";
		case "suppressed":
			return "#";
		case "toggle":
			return "[T]";
		case "digit":
			return `[D:${tag.alphabet === "seven" ? 7 : 16}${tag.hasPoint ? "p" : ""}]`;
		case "number":
			return "[N]";
		case "string":
			return "[S]";
		case "range":
			return "[R]";
	}
}
