export const LOG_PREFIX = "[psd2panel]";

export const FILENAME_SEPARATOR = "--";
export const IMAGE_EXTENSION = ".png";

// Nesting beyond this is dropped with a diagnostic instead of being walked.
export const MAX_TREE_DEPTH = 64;

export const MANIFEST_EXTENSION = ".yml";
export const PREVIEW_FILE = "index.html";
export const HASH_FILE_PREFIX = ".hash-";
