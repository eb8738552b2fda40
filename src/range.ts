import { WidgetValueError } from "./errors.js";
import type { RangeWidget } from "./types.js";

/**
 * Visibility per member, document order: position p (1-based) is shown when
 * start <= p <= end. 0..0 hides everything; nothing is clamped.
 */
export function resolveRange(widget: RangeWidget, start: number, end: number): boolean[] {
	for (const [label, value] of [
		["start", start],
		["end", end],
	] as const) {
		if (!Number.isInteger(value) || value < 0 || value > widget.totalCount) {
			throw new WidgetValueError({
				code: "out-of-range",
				widget: widget.name,
				message: `${label} must be an integer between 0 and ${widget.totalCount}, got ${value}.`,
			});
		}
	}
	if (start !== 0 && end !== 0 && start > end) {
		throw new WidgetValueError({
			code: "out-of-range",
			widget: widget.name,
			message: `start ${start} is after end ${end}.`,
		});
	}

	return widget.members.map((_, index) => {
		const position = index + 1;
		return start <= position && position <= end;
	});
}

export function visibleMembers(widget: RangeWidget, start: number, end: number): string[] {
	const visibility = resolveRange(widget, start, end);
	return widget.members.filter((_, index) => visibility[index] === true);
}
