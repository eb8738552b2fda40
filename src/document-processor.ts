import { promises as fsp } from "node:fs";
import path from "node:path";

import { classifyTree } from "./classifier.js";
import { LOG_PREFIX, MANIFEST_EXTENSION, PREVIEW_FILE } from "./constants.js";
import { buildPreviewHtml } from "./html.js";
import { buildLayerTree, descendantLayers } from "./layer-tree.js";
import { encodePng } from "./png.js";
import { buildManifest, manifestImages, renderManifestYaml } from "./projection.js";
import type { SourceDocument } from "./psd-reader.js";
import type { Diagnostic, LayerNode, Widget } from "./types.js";
import { exists, sanitizePathSegment, writeFileSafe } from "./utils.js";

export type ProcessResult = {
	manifestPath: string;
	previewPath: string;
	imageFiles: string[];
	widgets: Widget[];
	diagnostics: Diagnostic[];
};

function exportedLayers(roots: LayerNode[]): LayerNode[] {
	return roots.flatMap(descendantLayers).filter(layer => layer.filename !== null && layer.pixels !== undefined);
}

async function previousImages(manifestPath: string): Promise<string[]> {
	if (!(await exists(manifestPath))) return [];
	return manifestImages(await fsp.readFile(manifestPath, "utf8"));
}

/** Removes images the previous manifest listed that this run no longer writes. Other files stay. */
async function pruneStaleImages(outDir: string, previous: string[], keep: Set<string>): Promise<number> {
	const candidates = previous.filter(name => !keep.has(name)).map(name => path.join(outDir, name));
	const present = await Promise.all(candidates.map(exists));
	const stale = candidates.filter((_, index) => present[index] === true);
	await Promise.all(stale.map(filePath => fsp.rm(filePath, { force: true })));
	return stale.length;
}

/** Builds the tree and widgets for one document and writes images, manifest and preview into `outDir`. */
export async function processDocument(params: {
	document: SourceDocument;
	sourceFile: string;
	outDir: string;
}): Promise<ProcessResult> {
	const { document, sourceFile, outDir } = params;
	const stem = path.basename(sourceFile, path.extname(sourceFile));
	const tree = buildLayerTree(document.children);
	const classification = classifyTree(tree.roots);
	const diagnostics = [...tree.diagnostics, ...classification.diagnostics];

	const manifest = buildManifest({
		sourceFile: path.basename(sourceFile),
		width: document.width,
		height: document.height,
		roots: tree.roots,
		widgets: classification.widgets,
	});

	const manifestPath = path.join(outDir, `${sanitizePathSegment(stem) || "document"}${MANIFEST_EXTENSION}`);
	const previous = await previousImages(manifestPath);

	await fsp.mkdir(outDir, { recursive: true });
	const layers = exportedLayers(tree.roots);
	const imageFiles = await Promise.all(
		layers.map(async layer => {
			const { filename, pixels } = layer;
			if (!filename || !pixels) throw new Error(`Layer ${layer.path.join(" / ")} has no image to export.`);
			await writeFileSafe(path.join(outDir, filename), encodePng(pixels));
			return filename;
		}),
	);
	const pruned = await pruneStaleImages(outDir, previous, new Set(imageFiles));
	if (pruned > 0) console.log(`${LOG_PREFIX} ${stem}: removed ${pruned} stale image(s).`);

	await writeFileSafe(manifestPath, renderManifestYaml(manifest));

	const previewPath = path.join(outDir, PREVIEW_FILE);
	await writeFileSafe(
		previewPath,
		buildPreviewHtml({ title: stem, width: document.width, height: document.height, layers: manifest.layers }),
	);

	console.log(
		`${LOG_PREFIX} ${stem}: exported ${imageFiles.length} layer(s), ${classification.widgets.length} widget(s).`,
	);
	return { manifestPath, previewPath, imageFiles, widgets: classification.widgets, diagnostics };
}
