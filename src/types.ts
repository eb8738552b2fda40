export type Rect = { x: number; y: number; width: number; height: number };

export type RgbaImage = { width: number; height: number; data: Buffer };

export type SegmentAlphabet = "seven" | "sixteen";

export type WidgetTag =
	| { kind: "none" }
	| { kind: "suppressed" }
	| { kind: "toggle" }
	| { kind: "digit"; alphabet: SegmentAlphabet; hasPoint: boolean }
	| { kind: "number" }
	| { kind: "string" }
	| { kind: "range" };

export type ParsedName = { tag: WidgetTag; displayName: string };

/** One node as handed over by the document reader, children in layers-panel order. */
export type SourceNode = {
	rawName: string;
	isGroup: boolean;
	bounds: Rect | null;
	hidden: boolean;
	children: SourceNode[];
	pixels?: RgbaImage;
};

export type LayerNode = {
	rawName: string;
	displayName: string;
	tag: WidgetTag;
	isGroup: boolean;
	bounds: Rect | null;
	hidden: boolean;
	folderPath: string[];
	path: string[];
	filename: string | null;
	children: LayerNode[];
	pixels?: RgbaImage;
};

export type ToggleWidget = { kind: "toggle"; name: string; members: string[] };

export type DigitWidget = {
	kind: "digit";
	name: string;
	alphabet: SegmentAlphabet;
	hasPoint: boolean;
	segments: string[];
	point: string | null;
};

export type NumberWidget = {
	kind: "number";
	name: string;
	digits: DigitWidget[];
	decimalDigitIndex: number | null;
};

export type StringWidget = { kind: "string"; name: string; digits: DigitWidget[] };

export type RangeWidget = { kind: "range"; name: string; members: string[]; totalCount: number };

export type Widget = ToggleWidget | DigitWidget | NumberWidget | StringWidget | RangeWidget;

export type DiagnosticKind = "structural" | "filename-collision";

export type DiagnosticCode =
	| "max-depth"
	| "not-a-group"
	| "digit-child-count"
	| "segment-not-layer"
	| "segment-without-image"
	| "not-a-digit"
	| "multiple-decimal-points"
	| "string-needs-sixteen-segment"
	| "malformed-digit"
	| "range-member-group"
	| "filename-collision";

export type Diagnostic = {
	kind: DiagnosticKind;
	code: DiagnosticCode;
	path: string[];
	message: string;
};

export type DigitFrame = { character: string; point: boolean };

export type NumberFormat = { leadingZeros: boolean; decimalPlaces?: number };

export type LayerRecord = {
	filename: string;
	display_name: string;
	original_name: string;
	original_folder_path: string[];
	x: number;
	y: number;
	width: number;
	height: number;
	visible: boolean;
};

export type Args = {
	input: string;
	out: string;
	force: boolean;
	strict: boolean;
};
