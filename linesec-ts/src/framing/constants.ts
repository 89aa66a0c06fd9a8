// Separator between ciphertext and signature in an encrypted frame.
export const FRAME_SEPARATOR = "|";
// Line terminator written after every frame.
export const LINE_TERMINATOR = "\n";
// Default upper bound for one line, terminator excluded.
export const DEFAULT_MAX_LINE_BYTES = 1 << 20;
