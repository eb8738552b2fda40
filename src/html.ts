import type { LayerRecord } from "./types.js";
import { escapeHtml } from "./utils.js";

/**
 * Static composition of the exported layers. Records come in document order,
 * so the first one gets the highest z-index.
 */
export function buildPreviewHtml(params: {
	title: string;
	width: number;
	height: number;
	layers: LayerRecord[];
}): string {
	const { title, width, height, layers } = params;
	const lines: string[] = [];
	const indent = (level: number) => " ".repeat(level * 2);

	lines.push("<!DOCTYPE html>");
	lines.push('<html lang="en">');
	lines.push(`${indent(1)}<head>`);
	lines.push(`${indent(2)}<meta charset="utf-8" />`);
	lines.push(`${indent(2)}<meta name="viewport" content="width=device-width, initial-scale=1" />`);
	lines.push(`${indent(2)}<title>${escapeHtml(title)} Preview</title>`);
	lines.push(`${indent(2)}<style>`);
	lines.push(`${indent(3)}html, body {`);
	lines.push(`${indent(4)}margin: 0;`);
	lines.push(`${indent(4)}padding: 0;`);
	lines.push(`${indent(4)}background: #0b0f17;`);
	lines.push(`${indent(3)}}`);
	lines.push(`${indent(3)}#root {`);
	lines.push(`${indent(4)}position: relative;`);
	lines.push(`${indent(4)}width: ${width}px;`);
	lines.push(`${indent(4)}height: ${height}px;`);
	lines.push(`${indent(4)}overflow: hidden;`);
	lines.push(`${indent(3)}}`);
	lines.push(`${indent(3)}.layer {`);
	lines.push(`${indent(4)}position: absolute;`);
	lines.push(`${indent(4)}user-select: none;`);
	lines.push(`${indent(4)}pointer-events: none;`);
	lines.push(`${indent(3)}}`);
	lines.push(`${indent(3)}.layer.hidden { display: none; }`);
	lines.push(`${indent(2)}</style>`);
	lines.push(`${indent(1)}</head>`);
	lines.push(`${indent(1)}<body>`);
	lines.push(`${indent(2)}<div id="root">`);

	for (const [index, layer] of layers.entries()) {
		const classes = layer.visible ? "layer" : "layer hidden";
		const style =
			`left:${layer.x}px; top:${layer.y}px; width:${layer.width}px; height:${layer.height}px; ` +
			`z-index:${layers.length - index};`;
		const src = escapeHtml(encodeURI(layer.filename));
		const alt = escapeHtml(layer.display_name);
		lines.push(`${indent(3)}<img class="${classes}" style="${style}" src="${src}" alt="${alt}" />`);
	}

	lines.push(`${indent(2)}</div>`);
	lines.push(`${indent(1)}</body>`);
	lines.push("</html>");
	lines.push("");
	return lines.join("\n");
}
