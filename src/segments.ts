import fs from "node:fs";

import { WidgetValueError } from "./errors.js";
import type { SegmentAlphabet } from "./types.js";

export const POINT_SEGMENT = "dp";

export type SegmentTable = {
	segments: readonly string[];
	glyphs: ReadonlyMap<string, readonly string[]>;
};

export type SegmentTablesSnapshot = Record<
	SegmentAlphabet,
	{ segments: string[]; point: string; glyphs: Record<string, string[]> }
>;

const GLYPHS_URL = new URL("../data/segment-glyphs.json", import.meta.url);
export const ALPHABETS: readonly SegmentAlphabet[] = ["seven", "sixteen"];
const EXPECTED_SIZE: Record<SegmentAlphabet, number> = { seven: 7, sixteen: 16 };

let cachedTables: Record<SegmentAlphabet, SegmentTable> | null = null;

function isStringArray(value: unknown): value is string[] {
	return Array.isArray(value) && value.every(item => typeof item === "string");
}

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function parseSegmentTable(alphabet: SegmentAlphabet, raw: unknown): SegmentTable {
	if (!isRecord(raw) || !isStringArray(raw.segments) || !isRecord(raw.glyphs)) {
		throw new Error(`Segment table "${alphabet}" must have "segments" and "glyphs".`);
	}
	const segments = raw.segments;
	if (segments.length !== EXPECTED_SIZE[alphabet] || new Set(segments).size !== segments.length) {
		throw new Error(`Segment table "${alphabet}" must list ${EXPECTED_SIZE[alphabet]} distinct segments.`);
	}

	const rank = new Map(segments.map((segment, index) => [segment, index] as const));
	const glyphs = new Map<string, readonly string[]>();
	for (const [character, lit] of Object.entries(raw.glyphs)) {
		if ([...character].length !== 1) {
			throw new Error(`Segment table "${alphabet}" has a multi-character glyph key "${character}".`);
		}
		if (!isStringArray(lit)) {
			throw new Error(`Glyph "${character}" in "${alphabet}" must be a list of segment names.`);
		}
		const unknown = lit.find(segment => !rank.has(segment));
		if (unknown !== undefined) {
			throw new Error(`Glyph "${character}" in "${alphabet}" uses unknown segment "${unknown}".`);
		}
		if (lit.length === 0 && character !== " ") {
			throw new Error(`Glyph "${character}" in "${alphabet}" lights no segments.`);
		}
		const ordered = [...new Set(lit)].sort((a, b) => (rank.get(a) ?? 0) - (rank.get(b) ?? 0));
		glyphs.set(character, Object.freeze(ordered));
	}

	return { segments: Object.freeze([...segments]), glyphs };
}

function loadTables(): Record<SegmentAlphabet, SegmentTable> {
	if (cachedTables) return cachedTables;
	const raw: unknown = JSON.parse(fs.readFileSync(GLYPHS_URL, "utf8"));
	if (!isRecord(raw)) throw new Error("Segment glyph data must be an object.");
	cachedTables = {
		seven: parseSegmentTable("seven", raw.seven),
		sixteen: parseSegmentTable("sixteen", raw.sixteen),
	};
	return cachedTables;
}

export function segmentOrder(alphabet: SegmentAlphabet): readonly string[] {
	return loadTables()[alphabet].segments;
}

export function supportedCharacters(alphabet: SegmentAlphabet): string[] {
	return [...loadTables()[alphabet].glyphs.keys()];
}

export function isSupportedCharacter(alphabet: SegmentAlphabet, character: string): boolean {
	return loadTables()[alphabet].glyphs.has(character);
}

/**
 * Segments lit for a character, in the alphabet's positional order.
 * The decimal point is never part of a glyph.
 */
export function segmentsFor(alphabet: SegmentAlphabet, character: string): readonly string[] {
	const lit = loadTables()[alphabet].glyphs.get(character);
	if (!lit) {
		throw new WidgetValueError({
			code: "unsupported-character",
			widget: `${EXPECTED_SIZE[alphabet]}-segment alphabet`,
			character,
			message: `character ${JSON.stringify(character)} has no ${EXPECTED_SIZE[alphabet]}-segment glyph.`,
		});
	}
	return lit;
}

export function segmentTables(): SegmentTablesSnapshot {
	const tables = loadTables();
	const snapshot = (alphabet: SegmentAlphabet) => {
		const glyphs: Record<string, string[]> = {};
		for (const [character, lit] of tables[alphabet].glyphs) {
			glyphs[character] = [...lit];
		}
		return { segments: [...tables[alphabet].segments], point: POINT_SEGMENT, glyphs };
	};
	return { seven: snapshot("seven"), sixteen: snapshot("sixteen") };
}

export function alphabetSize(alphabet: SegmentAlphabet): number {
	return EXPECTED_SIZE[alphabet];
}
