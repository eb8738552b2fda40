import { createHash } from "node:crypto";
import { promises as fsp } from "node:fs";
import path from "node:path";

import { HASH_FILE_PREFIX } from "./constants.js";
import type { Rect } from "./types.js";

export async function exists(filePath: string): Promise<boolean> {
	try {
		await fsp.access(filePath);
		return true;
	} catch {
		return false;
	}
}

export async function hashFiles(filePaths: string[]): Promise<string> {
	const hash = createHash("sha256");
	for (const filePath of filePaths) {
		hash.update(path.basename(filePath));
		hash.update("\u0000");
		hash.update(await fsp.readFile(filePath));
		hash.update("\u0000");
	}
	return hash.digest("hex");
}

export function hashFileName(inputPath: string): string {
	const stem = path.basename(inputPath, path.extname(inputPath));
	return `${HASH_FILE_PREFIX}${sanitizePathSegment(stem) || "document"}`;
}

/** Letters, digits, space, "-" and "_" survive; spaces then become "_". May return "". */
export function sanitizePathSegment(value: string): string {
	return value
		.replace(/[^\p{L}\p{N} _-]/gu, "_")
		.trim()
		.replace(/ /g, "_");
}

export function escapeHtml(value: string): string {
	return value
		.replace(/&/g, "&amp;")
		.replace(/</g, "&lt;")
		.replace(/>/g, "&gt;")
		.replace(/"/g, "&quot;")
		.replace(/'/g, "&#39;");
}

export function isEmptyRect(rect: Rect | null): boolean {
	return !rect || rect.width <= 0 || rect.height <= 0;
}

export function unionRects(a: Rect | null, b: Rect | null): Rect | null {
	if (!a || isEmptyRect(a)) return b && !isEmptyRect(b) ? b : null;
	if (!b || isEmptyRect(b)) return a;
	const x = Math.min(a.x, b.x);
	const y = Math.min(a.y, b.y);
	const right = Math.max(a.x + a.width, b.x + b.width);
	const bottom = Math.max(a.y + a.height, b.y + b.height);
	return { x, y, width: right - x, height: bottom - y };
}

export async function listFilesRecursive(dir: string): Promise<string[]> {
	const results: string[] = [];
	const stack: string[] = [dir];
	while (stack.length > 0) {
		const current = stack.pop();
		if (!current) continue;
		if (!(await exists(current))) continue;
		const entries = await fsp.readdir(current, { withFileTypes: true });
		for (const entry of entries) {
			const full = path.join(current, entry.name);
			if (entry.isDirectory()) {
				stack.push(full);
			} else if (entry.isFile()) {
				results.push(full);
			}
		}
	}
	return results.sort((a, b) => a.localeCompare(b));
}

export async function writeFileSafe(filePath: string, data: Buffer | string): Promise<void> {
	const dir = path.dirname(filePath);
	await fsp.mkdir(dir, { recursive: true });
	try {
		await fsp.writeFile(filePath, data);
	} catch (error) {
		if (error && typeof error === "object" && "code" in error && error.code === "ENOENT") {
			await fsp.mkdir(dir, { recursive: true });
			await fsp.writeFile(filePath, data);
			return;
		}
		throw error;
	}
}
