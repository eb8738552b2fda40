import { FILENAME_SEPARATOR } from "./constants.js";
import { structural } from "./diagnostics.js";
import { descendantLayers } from "./layer-tree.js";
import { describeTag } from "./naming.js";
import { alphabetSize } from "./segments.js";
import type {
	Diagnostic,
	DigitWidget,
	LayerNode,
	NumberWidget,
	RangeWidget,
	StringWidget,
	ToggleWidget,
	Widget,
} from "./types.js";

export type Classification = {
	widgets: Widget[];
	diagnostics: Diagnostic[];
};

export function widgetName(node: LayerNode): string {
	return node.displayName || (node.path[node.path.length - 1] ?? "");
}

function quoteNames(nodes: LayerNode[]): string {
	return nodes.map(node => `"${node.rawName}"`).join(", ");
}

function buildToggle(node: LayerNode): ToggleWidget {
	const members = descendantLayers(node).flatMap(layer => (layer.filename ? [layer.filename] : []));
	return { kind: "toggle", name: widgetName(node), members };
}

export function buildDigit(node: LayerNode, diagnostics: Diagnostic[]): DigitWidget | null {
	if (node.tag.kind !== "digit") return null;
	const { alphabet, hasPoint } = node.tag;
	const label = describeTag(node.tag);
	if (!node.isGroup) {
		diagnostics.push(structural("not-a-group", node.path, `${label} must be a group of segment layers.`));
		return null;
	}

	const size = alphabetSize(alphabet);
	const expected = hasPoint ? size + 1 : size;
	if (node.children.length !== expected) {
		const layout = hasPoint ? `${size} segments + decimal point` : `${size} segments`;
		diagnostics.push(
			structural(
				"digit-child-count",
				node.path,
				`${label} needs exactly ${expected} children (${layout}), found ${node.children.length}.`,
			),
		);
		return null;
	}

	const groups = node.children.filter(child => child.isGroup);
	if (groups.length > 0) {
		diagnostics.push(
			structural("segment-not-layer", node.path, `${label} segments must be layers, not groups: ${quoteNames(groups)}.`),
		);
		return null;
	}

	const blank = node.children.filter(child => !child.filename);
	if (blank.length > 0) {
		diagnostics.push(
			structural(
				"segment-without-image",
				node.path,
				`${label} segments without an exported image (empty or colliding): ${quoteNames(blank)}.`,
			),
		);
		return null;
	}

	const files = node.children.flatMap(child => (child.filename ? [child.filename] : []));
	return {
		kind: "digit",
		name: widgetName(node),
		alphabet,
		hasPoint,
		segments: files.slice(0, size),
		point: hasPoint ? (files[size] ?? null) : null,
	};
}

function buildDigitSequence(node: LayerNode, diagnostics: Diagnostic[]): DigitWidget[] | null {
	const label = describeTag(node.tag);
	if (!node.isGroup) {
		diagnostics.push(structural("not-a-group", node.path, `${label} must be a group of [D:..] digit groups.`));
		return null;
	}
	if (node.children.length === 0) {
		diagnostics.push(structural("not-a-digit", node.path, `${label} contains no [D:..] digit groups.`));
		return null;
	}

	const strays = node.children.filter(child => child.tag.kind !== "digit");
	if (strays.length > 0) {
		diagnostics.push(
			structural("not-a-digit", node.path, `${label} children must all be [D:..] digits: ${quoteNames(strays)}.`),
		);
		return null;
	}

	const digits: DigitWidget[] = [];
	let malformed = false;
	for (const [index, child] of node.children.entries()) {
		const digit = buildDigit(child, diagnostics);
		if (!digit) {
			diagnostics.push(
				structural("malformed-digit", node.path, `digit ${index + 1} ("${child.rawName}") is malformed.`),
			);
			malformed = true;
			continue;
		}
		digits.push(digit);
	}
	return malformed ? null : digits;
}

function buildNumber(node: LayerNode, diagnostics: Diagnostic[]): NumberWidget | null {
	const digits = buildDigitSequence(node, diagnostics);
	if (!digits) return null;
	const pointed = digits.filter(digit => digit.hasPoint);
	if (pointed.length > 1) {
		diagnostics.push(
			structural(
				"multiple-decimal-points",
				node.path,
				`[N] allows at most one digit with a decimal point, found ${pointed.length}.`,
			),
		);
		return null;
	}
	const pointIndex = digits.findIndex(digit => digit.hasPoint);
	return { kind: "number", name: widgetName(node), digits, decimalDigitIndex: pointIndex >= 0 ? pointIndex : null };
}

function buildString(node: LayerNode, diagnostics: Diagnostic[]): StringWidget | null {
	const digits = buildDigitSequence(node, diagnostics);
	if (!digits) return null;
	const narrow = node.children.filter((_, index) => digits[index]?.alphabet === "seven");
	if (narrow.length > 0) {
		diagnostics.push(
			structural(
				"string-needs-sixteen-segment",
				node.path,
				`[S] digits must be 16-segment; 7-segment digits found: ${quoteNames(narrow)}.`,
			),
		);
		return null;
	}
	return { kind: "string", name: widgetName(node), digits };
}

function buildRange(node: LayerNode, diagnostics: Diagnostic[]): RangeWidget | null {
	if (!node.isGroup) {
		diagnostics.push(structural("not-a-group", node.path, "[R] must be a group of member layers."));
		return null;
	}
	const groups = node.children.filter(child => child.isGroup);
	if (groups.length > 0) {
		diagnostics.push(
			structural("range-member-group", node.path, `[R] members must be layers, not groups: ${quoteNames(groups)}.`),
		);
		return null;
	}
	const members = node.children.flatMap(child => (child.filename ? [child.filename] : []));
	return { kind: "range", name: widgetName(node), members, totalCount: members.length };
}

/**
 * Assigns widgets to tagged nodes, top-down. Structural problems are collected
 * per node and never stop the walk. Unnamed widgets and repeated names are
 * named by their path so that every widget is kept.
 */
export function classifyTree(roots: LayerNode[]): Classification {
	const widgets: Widget[] = [];
	const diagnostics: Diagnostic[] = [];
	const names = new Set<string>();
	const stack: LayerNode[] = [...roots].reverse();

	const emit = (node: LayerNode, widget: Widget | null) => {
		if (!widget) return;
		const base = node.displayName && !names.has(widget.name) ? widget.name : node.path.join(FILENAME_SEPARATOR);
		let name = base;
		// Sanitized paths can still meet ("A b" and "A_b").
		for (let n = 2; names.has(name); n += 1) name = `${base}~${n}`;
		names.add(name);
		widgets.push({ ...widget, name });
	};

	const descend = (node: LayerNode) => {
		for (let i = node.children.length - 1; i >= 0; i -= 1) {
			const child = node.children[i];
			if (child) stack.push(child);
		}
	};

	while (stack.length > 0) {
		const node = stack.pop();
		if (!node) continue;
		switch (node.tag.kind) {
			case "none":
				descend(node);
				break;
			case "suppressed":
				break;
			case "toggle":
				emit(node, buildToggle(node));
				descend(node);
				break;
			case "digit":
				emit(node, buildDigit(node, diagnostics));
				break;
			case "number":
				emit(node, buildNumber(node, diagnostics));
				break;
			case "string":
				emit(node, buildString(node, diagnostics));
				break;
			case "range":
				emit(node, buildRange(node, diagnostics));
				break;
		}
	}

	return { widgets, diagnostics };
}
