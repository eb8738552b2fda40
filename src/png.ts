import { PNG } from "pngjs";

import type { RgbaImage } from "./types.js";

export function encodePng(image: RgbaImage): Buffer {
	const png = new PNG({ width: image.width, height: image.height });
	image.data.copy(png.data);
	return PNG.sync.write(png);
}

export function decodePng(buffer: Buffer): RgbaImage {
	const png = PNG.sync.read(buffer);
	return { width: png.width, height: png.height, data: png.data };
}
