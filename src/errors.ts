export type WidgetValueErrorCode =
	| "overflow"
	| "unsupported-character"
	| "misaligned-point"
	| "out-of-range"
	| "invalid-value";

/** Thrown when a requested value cannot be shown on a widget's fixed slots. */
export class WidgetValueError extends Error {
	readonly code: WidgetValueErrorCode;
	readonly widget: string;
	readonly slot?: number;
	readonly character?: string;

	constructor(params: {
		code: WidgetValueErrorCode;
		widget: string;
		message: string;
		slot?: number;
		character?: string;
	}) {
		const location = params.slot !== undefined ? ` (slot ${params.slot + 1})` : "";
		super(`${params.widget}${location}: ${params.message}`);
		this.name = "WidgetValueError";
		this.code = params.code;
		this.widget = params.widget;
		if (params.slot !== undefined) this.slot = params.slot;
		if (params.character !== undefined) this.character = params.character;
	}
}
