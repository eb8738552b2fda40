import { promises as fsp } from "node:fs";

import { type Layer, readPsd } from "ag-psd";

import type { Rect, RgbaImage, SourceNode } from "./types.js";

export type SourceDocument = {
	width: number;
	height: number;
	children: SourceNode[];
};

export type TrimmedImage = { rect: Rect; image: RgbaImage };

/** Crops an RGBA image to its non-transparent pixels; null when nothing is visible. */
export function trimTransparent(image: RgbaImage): TrimmedImage | null {
	const { width, height, data } = image;
	let minX = width;
	let minY = height;
	let maxX = -1;
	let maxY = -1;

	for (let y = 0; y < height; y += 1) {
		for (let x = 0; x < width; x += 1) {
			const alpha = data[(y * width + x) * 4 + 3] ?? 0;
			if (alpha === 0) continue;
			if (x < minX) minX = x;
			if (x > maxX) maxX = x;
			if (y < minY) minY = y;
			if (y > maxY) maxY = y;
		}
	}

	if (maxX < 0) return null;

	const croppedWidth = maxX - minX + 1;
	const croppedHeight = maxY - minY + 1;
	const rect = { x: minX, y: minY, width: croppedWidth, height: croppedHeight };
	if (croppedWidth === width && croppedHeight === height) {
		return { rect, image };
	}

	const cropped = Buffer.alloc(croppedWidth * croppedHeight * 4);
	for (let row = 0; row < croppedHeight; row += 1) {
		const start = ((minY + row) * width + minX) * 4;
		data.copy(cropped, row * croppedWidth * 4, start, start + croppedWidth * 4);
	}
	return { rect, image: { width: croppedWidth, height: croppedHeight, data: cropped } };
}

function layerPixels(layer: Layer): RgbaImage | null {
	const pixels = layer.imageData;
	if (!pixels || pixels.width === 0 || pixels.height === 0) return null;
	const { data } = pixels;
	if (!(data instanceof Uint8Array || data instanceof Uint8ClampedArray)) {
		throw new Error(`Layer "${layer.name ?? ""}" is not 8 bits per channel; convert the document to 8-bit RGB.`);
	}
	return {
		width: pixels.width,
		height: pixels.height,
		data: Buffer.from(data.buffer, data.byteOffset, data.byteLength),
	};
}

function convertLayer(layer: Layer): SourceNode {
	const rawName = layer.name ?? "";
	const hidden = layer.hidden === true;
	if (layer.children) {
		return { rawName, isGroup: true, bounds: null, hidden, children: [] };
	}

	const pixels = layerPixels(layer);
	const trimmed = pixels ? trimTransparent(pixels) : null;
	if (!trimmed) {
		return { rawName, isGroup: false, bounds: null, hidden, children: [] };
	}
	const left = layer.left ?? 0;
	const top = layer.top ?? 0;
	return {
		rawName,
		isGroup: false,
		bounds: { ...trimmed.rect, x: left + trimmed.rect.x, y: top + trimmed.rect.y },
		hidden,
		children: [],
		pixels: trimmed.image,
	};
}

/** ag-psd lists children bottom to top; source nodes use layers-panel order. Groups fill from a work stack. */
export function fromPsdLayers(layers: Layer[]): SourceNode[] {
	const roots: SourceNode[] = [];
	const stack: Array<{ layers: Layer[]; target: SourceNode[] }> = [{ layers, target: roots }];
	while (stack.length > 0) {
		const job = stack.pop();
		if (!job) continue;
		for (let i = job.layers.length - 1; i >= 0; i -= 1) {
			const layer = job.layers[i];
			if (!layer) continue;
			const node = convertLayer(layer);
			job.target.push(node);
			if (layer.children) stack.push({ layers: layer.children, target: node.children });
		}
	}
	return roots;
}

export async function readPsdFile(filePath: string): Promise<SourceDocument> {
	const buffer = await fsp.readFile(filePath);
	const psd = readPsd(buffer, { useImageData: true, skipThumbnail: true, skipCompositeImageData: true });
	return { width: psd.width, height: psd.height, children: fromPsdLayers(psd.children ?? []) };
}
