import type { Diagnostic, DiagnosticCode } from "./types.js";

export function structural(code: DiagnosticCode, path: string[], message: string): Diagnostic {
	return { kind: "structural", code, path: [...path], message };
}

export function formatDiagnostic(diagnostic: Diagnostic): string {
	const location = diagnostic.path.length > 0 ? diagnostic.path.join(" / ") : "<document>";
	return `${location}: ${diagnostic.message}`;
}

export function summarizeDiagnostics(diagnostics: Diagnostic[]): string {
	const structuralCount = diagnostics.filter(d => d.kind === "structural").length;
	const collisionCount = diagnostics.length - structuralCount;
	const parts: string[] = [];
	if (structuralCount > 0) parts.push(`${structuralCount} structural error(s)`);
	if (collisionCount > 0) parts.push(`${collisionCount} filename collision(s)`);
	return parts.length > 0 ? parts.join(", ") : "no issues";
}
