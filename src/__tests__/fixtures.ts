import type { DigitWidget, Rect, SegmentAlphabet, SourceNode } from "../types.js";

export const SEVEN = ["A", "F", "B", "G", "E", "C", "D"];
export const SIXTEEN = ["a1", "a2", "f", "h", "i", "j", "b", "g1", "g2", "e", "k", "l", "m", "c", "d1", "d2"];

export function layer(
	rawName: string,
	bounds: Rect | null = { x: 0, y: 0, width: 4, height: 4 },
	hidden = false,
): SourceNode {
	return { rawName, isGroup: false, bounds, hidden, children: [] };
}

export function group(rawName: string, children: SourceNode[], hidden = false): SourceNode {
	return { rawName, isGroup: true, bounds: null, hidden, children };
}

/** A well-formed digit group whose children are named after their segments. */
export function digitGroup(rawName: string, alphabet: SegmentAlphabet, hasPoint: boolean): SourceNode {
	const names = alphabet === "seven" ? SEVEN : SIXTEEN;
	const children = names.map((name, index) => layer(name, { x: index, y: 0, width: 1, height: 1 }));
	if (hasPoint) children.push(layer("DP", { x: 20, y: 0, width: 1, height: 1 }));
	return group(rawName, children);
}

export function digitWidget(name: string, alphabet: SegmentAlphabet, hasPoint: boolean): DigitWidget {
	const names = alphabet === "seven" ? SEVEN : SIXTEEN;
	return {
		kind: "digit",
		name,
		alphabet,
		hasPoint,
		segments: names.map(segment => `${name}--${segment}.png`),
		point: hasPoint ? `${name}--DP.png` : null,
	};
}
