import { FILENAME_SEPARATOR, IMAGE_EXTENSION, MAX_TREE_DEPTH } from "./constants.js";
import { structural } from "./diagnostics.js";
import { parseLayerName } from "./naming.js";
import type { Diagnostic, LayerNode, SourceNode, WidgetTag } from "./types.js";
import { isEmptyRect, sanitizePathSegment, unionRects } from "./utils.js";

export type LayerTree = {
	roots: LayerNode[];
	diagnostics: Diagnostic[];
};

type WorkItem = {
	source: SourceNode;
	index: number;
	depth: number;
	siblings: LayerNode[];
	folderPath: string[];
	parentPath: string[];
	parentHidden: boolean;
};

function fallbackName(tag: WidgetTag, isGroup: boolean, index: number): string {
	if (tag.kind === "digit") return `digit_${index}`;
	return `${isGroup ? "group" : "layer"}_${index}`;
}

export function filenameFor(path: string[]): string {
	return `${path.join(FILENAME_SEPARATOR)}${IMAGE_EXTENSION}`;
}

/**
 * Parses names, prunes "#" subtrees, derives paths and filenames and unions
 * group bounds. Children keep document order.
 */
export function buildLayerTree(sources: SourceNode[]): LayerTree {
	const roots: LayerNode[] = [];
	const diagnostics: Diagnostic[] = [];
	const created: LayerNode[] = [];
	const filenameOwners = new Map<string, string[]>();
	const stack: WorkItem[] = [];

	const pushChildren = (
		children: SourceNode[],
		siblings: LayerNode[],
		depth: number,
		folderPath: string[],
		parentPath: string[],
		parentHidden: boolean,
	) => {
		for (let index = children.length - 1; index >= 0; index -= 1) {
			const source = children[index];
			if (!source) continue;
			stack.push({ source, index, depth, siblings, folderPath, parentPath, parentHidden });
		}
	};

	pushChildren(sources, roots, 1, [], [], false);

	while (stack.length > 0) {
		const item = stack.pop();
		if (!item) continue;
		const { source, index, depth, siblings, folderPath, parentPath, parentHidden } = item;
		const { tag, displayName } = parseLayerName(source.rawName);
		if (tag.kind === "suppressed") continue;

		const pathName = sanitizePathSegment(displayName) || fallbackName(tag, source.isGroup, index);
		const path = [...parentPath, pathName];
		if (depth > MAX_TREE_DEPTH) {
			diagnostics.push(
				structural("max-depth", path, `nesting deeper than ${MAX_TREE_DEPTH} levels; subtree skipped.`),
			);
			continue;
		}

		const node: LayerNode = {
			rawName: source.rawName,
			displayName,
			tag,
			isGroup: source.isGroup,
			bounds: source.isGroup || isEmptyRect(source.bounds) ? null : source.bounds,
			// A hidden group hides everything below it.
			hidden: parentHidden || source.hidden,
			folderPath,
			path,
			filename: null,
			children: [],
		};
		if (source.pixels) node.pixels = source.pixels;

		if (!node.isGroup && node.bounds) {
			const filename = filenameFor(path);
			const owner = filenameOwners.get(filename);
			if (owner) {
				diagnostics.push({
					kind: "filename-collision",
					code: "filename-collision",
					path,
					message: `"${filename}" is already produced by ${owner.join(" / ")}; this layer is not exported.`,
				});
			} else {
				filenameOwners.set(filename, path);
				node.filename = filename;
			}
		}

		siblings.push(node);
		created.push(node);
		if (node.isGroup) {
			pushChildren(source.children, node.children, depth + 1, [...folderPath, displayName], path, node.hidden);
		}
	}

	// Children are created after their parents, so walking backwards sees every child first.
	for (let i = created.length - 1; i >= 0; i -= 1) {
		const node = created[i];
		if (!node || !node.isGroup) continue;
		node.bounds = node.children.reduce<LayerNode["bounds"]>((acc, child) => unionRects(acc, child.bounds), null);
	}

	return { roots, diagnostics };
}

/** Leaf layers under a node in document order, the node itself when it is a layer. */
export function descendantLayers(node: LayerNode): LayerNode[] {
	const layers: LayerNode[] = [];
	const stack: LayerNode[] = [node];
	while (stack.length > 0) {
		const current = stack.pop();
		if (!current) continue;
		if (!current.isGroup) {
			layers.push(current);
			continue;
		}
		for (let i = current.children.length - 1; i >= 0; i -= 1) {
			const child = current.children[i];
			if (child) stack.push(child);
		}
	}
	return layers;
}
