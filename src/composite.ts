import { WidgetValueError } from "./errors.js";
import { isSupportedCharacter, segmentOrder, segmentsFor } from "./segments.js";
import type { DigitFrame, DigitWidget, NumberFormat, NumberWidget, StringWidget } from "./types.js";

const BLANK = " ";

export type DecimalParts = { integer: string; fraction: string };

function trimLeadingZeros(digits: string): string {
	return digits.replace(/^0+(?=\d)/, "");
}

function incrementDigits(digits: string): string {
	const out = digits.split("");
	for (let i = out.length - 1; i >= 0; i -= 1) {
		if (out[i] === "9") {
			out[i] = "0";
			continue;
		}
		out[i] = String(Number(out[i]) + 1);
		return out.join("");
	}
	return `1${out.join("")}`;
}

/** Exact decimal digits of the shortest round-trip representation of a non-negative number. */
export function decimalDigits(value: number): DecimalParts {
	const [mantissa = "0", exponentText] = String(value).split("e");
	const [integerText = "0", fractionText = ""] = mantissa.split(".");
	const exponent = exponentText ? Number(exponentText) : 0;

	let digits = integerText + fractionText;
	let point = integerText.length + exponent;
	if (point <= 0) {
		digits = "0".repeat(1 - point) + digits;
		point = 1;
	}
	if (point > digits.length) digits += "0".repeat(point - digits.length);

	return {
		integer: trimLeadingZeros(digits.slice(0, point)),
		fraction: digits.slice(point).replace(/0+$/, ""),
	};
}

/** Rounds half away from zero to exactly `places` fraction digits. */
export function formatDecimal(value: number, places: number): DecimalParts {
	const { integer, fraction } = decimalDigits(Math.abs(value));
	if (fraction.length <= places) {
		return { integer, fraction: fraction.padEnd(places, "0") };
	}

	const kept = integer + fraction.slice(0, places);
	const next = Number(fraction.charAt(places));
	const rounded = next >= 5 ? incrementDigits(kept) : kept;
	const integerLength = rounded.length - places;
	return {
		integer: trimLeadingZeros(rounded.slice(0, integerLength)),
		fraction: rounded.slice(integerLength),
	};
}

function fractionPlaces(widget: NumberWidget, value: number, format: NumberFormat): number {
	const { decimalPlaces } = format;
	if (decimalPlaces !== undefined) {
		if (!Number.isInteger(decimalPlaces) || decimalPlaces < 0) {
			throw new WidgetValueError({
				code: "invalid-value",
				widget: widget.name,
				message: `decimal places must be a non-negative integer, got ${decimalPlaces}.`,
			});
		}
		return decimalPlaces;
	}
	if (Number.isInteger(value) || widget.decimalDigitIndex === null) return 0;
	return widget.digits.length - widget.decimalDigitIndex - 1;
}

/**
 * Lays a number out over the widget's digits, left to right. The point can only
 * light on the digit that declares one, and nothing is clipped.
 */
export function resolveNumber(widget: NumberWidget, value: number, format: NumberFormat): DigitFrame[] {
	if (!Number.isFinite(value)) {
		throw new WidgetValueError({ code: "invalid-value", widget: widget.name, message: `${value} is not a finite number.` });
	}
	if (value < 0) {
		throw new WidgetValueError({
			code: "invalid-value",
			widget: widget.name,
			message: `negative values cannot be shown; number widgets have no sign digit (got ${value}).`,
		});
	}

	const slots = widget.digits.length;
	const places = fractionPlaces(widget, value, format);
	const { integer, fraction } = formatDecimal(value, places);

	if (fraction.length > 0) {
		const pointSlot = slots - fraction.length - 1;
		if (widget.decimalDigitIndex === null) {
			throw new WidgetValueError({
				code: "misaligned-point",
				widget: widget.name,
				message: `no digit has a decimal point to show ${fraction.length} fraction digit(s).`,
			});
		}
		if (widget.decimalDigitIndex !== pointSlot) {
			throw new WidgetValueError({
				code: "misaligned-point",
				widget: widget.name,
				slot: widget.decimalDigitIndex,
				message: `${fraction.length} fraction digit(s) need the point ${
					pointSlot >= 0 ? `on slot ${pointSlot + 1}` : `before the first slot`
				}, but it is fixed on slot ${widget.decimalDigitIndex + 1}.`,
			});
		}
	}

	const integerSlots = slots - fraction.length;
	if (integer.length > integerSlots) {
		throw new WidgetValueError({
			code: "overflow",
			widget: widget.name,
			message: `${integer}${fraction ? `.${fraction}` : ""} needs ${integer.length + fraction.length} digits, only ${slots} available.`,
		});
	}

	const padded = integer.padStart(integerSlots, format.leadingZeros ? "0" : BLANK);
	const characters = [...padded, ...fraction];
	return characters.map((character, slot) => ({
		character,
		point: fraction.length > 0 && slot === widget.decimalDigitIndex,
	}));
}

/**
 * Fills one 16-segment slot per character. A "." lights the point of the
 * previous slot instead of taking its own.
 */
export function resolveString(widget: StringWidget, text: string): DigitFrame[] {
	const frames: DigitFrame[] = [];
	for (const character of text) {
		if (character === ".") {
			const slot = frames.length - 1;
			const previous = frames[slot];
			if (!previous || !widget.digits[slot]?.hasPoint || previous.point) {
				throw new WidgetValueError({
					code: "misaligned-point",
					widget: widget.name,
					character,
					...(slot >= 0 ? { slot } : {}),
					message: previous
						? `"." has no free decimal point on the digit before it.`
						: `"." cannot start the text; there is no digit before it.`,
				});
			}
			previous.point = true;
			continue;
		}

		const slot = frames.length;
		const digit = widget.digits[slot];
		if (!digit) {
			throw new WidgetValueError({
				code: "overflow",
				widget: widget.name,
				slot,
				character,
				message: `${JSON.stringify(text)} needs more than ${widget.digits.length} digits.`,
			});
		}
		if (!isSupportedCharacter(digit.alphabet, character)) {
			throw new WidgetValueError({
				code: "unsupported-character",
				widget: widget.name,
				slot,
				character,
				message: `character ${JSON.stringify(character)} has no 16-segment glyph.`,
			});
		}
		frames.push({ character, point: false });
	}

	while (frames.length < widget.digits.length) {
		frames.push({ character: BLANK, point: false });
	}
	return frames;
}

export function resolveDigit(widget: DigitWidget, character: string, point = false): DigitFrame {
	if (!isSupportedCharacter(widget.alphabet, character)) {
		throw new WidgetValueError({
			code: "unsupported-character",
			widget: widget.name,
			character,
			message: `character ${JSON.stringify(character)} has no ${widget.segments.length}-segment glyph.`,
		});
	}
	if (point && !widget.hasPoint) {
		throw new WidgetValueError({
			code: "misaligned-point",
			widget: widget.name,
			message: "this digit has no decimal point.",
		});
	}
	return { character, point };
}

/** Segment and point images lit by the frames, slot by slot. */
export function litLayers(digits: DigitWidget[], frames: DigitFrame[]): string[] {
	if (frames.length !== digits.length) {
		throw new Error(`Expected ${digits.length} frames, got ${frames.length}.`);
	}
	const lit: string[] = [];
	for (const [slot, digit] of digits.entries()) {
		const frame = frames[slot];
		if (!frame) continue;
		const order = segmentOrder(digit.alphabet);
		for (const segment of segmentsFor(digit.alphabet, frame.character)) {
			const file = digit.segments[order.indexOf(segment)];
			if (file) lit.push(file);
		}
		if (frame.point && digit.point) lit.push(digit.point);
	}
	return lit;
}
