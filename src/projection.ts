import path from "node:path";

import yaml from "js-yaml";

import { IMAGE_EXTENSION } from "./constants.js";
import { type SegmentTablesSnapshot, segmentTables } from "./segments.js";
import type { DigitWidget, LayerNode, LayerRecord, Widget } from "./types.js";

export type DigitEntry = {
	kind: "digit7" | "digit16";
	name: string;
	has_point: boolean;
	segments: string[];
	point: string | null;
};

export type WidgetEntry =
	| { kind: "toggle"; name: string; members: string[] }
	| DigitEntry
	| {
			kind: "number";
			name: string;
			has_point: boolean;
			decimal_digit_index: number | null;
			digits: DigitEntry[];
	  }
	| { kind: "string"; name: string; has_point: boolean; digits: DigitEntry[] }
	| { kind: "range"; name: string; members: string[]; total_count: number };

export type Manifest = {
	source_file: string;
	document_width: number;
	document_height: number;
	layers: LayerRecord[];
	widgets: WidgetEntry[];
	segment_tables: SegmentTablesSnapshot;
};

/** Exported leaf layers in document order (topmost first). */
export function flattenLayers(roots: LayerNode[]): LayerRecord[] {
	const records: LayerRecord[] = [];
	const stack: LayerNode[] = [...roots].reverse();
	while (stack.length > 0) {
		const node = stack.pop();
		if (!node) continue;
		if (node.isGroup) {
			for (let i = node.children.length - 1; i >= 0; i -= 1) {
				const child = node.children[i];
				if (child) stack.push(child);
			}
			continue;
		}
		if (!node.filename || !node.bounds) continue;
		records.push({
			filename: node.filename,
			display_name: node.displayName,
			original_name: node.rawName,
			original_folder_path: [...node.folderPath],
			x: node.bounds.x,
			y: node.bounds.y,
			width: node.bounds.width,
			height: node.bounds.height,
			visible: !node.hidden,
		});
	}
	return records;
}

function describeDigit(digit: DigitWidget): DigitEntry {
	return {
		kind: digit.alphabet === "seven" ? "digit7" : "digit16",
		name: digit.name,
		has_point: digit.hasPoint,
		segments: [...digit.segments],
		point: digit.point,
	};
}

export function describeWidget(widget: Widget): WidgetEntry {
	switch (widget.kind) {
		case "toggle":
			return { kind: "toggle", name: widget.name, members: [...widget.members] };
		case "digit":
			return describeDigit(widget);
		case "number":
			return {
				kind: "number",
				name: widget.name,
				has_point: widget.decimalDigitIndex !== null,
				decimal_digit_index: widget.decimalDigitIndex,
				digits: widget.digits.map(describeDigit),
			};
		case "string":
			return {
				kind: "string",
				name: widget.name,
				has_point: widget.digits.some(digit => digit.hasPoint),
				digits: widget.digits.map(describeDigit),
			};
		case "range":
			return { kind: "range", name: widget.name, members: [...widget.members], total_count: widget.totalCount };
	}
}

export function buildManifest(params: {
	sourceFile: string;
	width: number;
	height: number;
	roots: LayerNode[];
	widgets: Widget[];
}): Manifest {
	return {
		source_file: params.sourceFile,
		document_width: params.width,
		document_height: params.height,
		layers: flattenLayers(params.roots),
		widgets: params.widgets.map(describeWidget),
		segment_tables: segmentTables(),
	};
}

export function renderManifestYaml(manifest: Manifest): string {
	return yaml.dump(manifest, { noRefs: true, lineWidth: -1, sortKeys: false });
}

/** Image filenames a written manifest lists; anything unreadable or outside the output folder is left out. */
export function manifestImages(text: string): string[] {
	const loaded: unknown = yaml.load(text);
	if (!loaded || typeof loaded !== "object" || !("layers" in loaded) || !Array.isArray(loaded.layers)) return [];
	const layers: unknown[] = loaded.layers;
	return layers.flatMap(layer => {
		if (!layer || typeof layer !== "object" || !("filename" in layer)) return [];
		const { filename } = layer;
		if (typeof filename !== "string" || !filename.endsWith(IMAGE_EXTENSION)) return [];
		return path.basename(filename) === filename && filename !== IMAGE_EXTENSION ? [filename] : [];
	});
}
