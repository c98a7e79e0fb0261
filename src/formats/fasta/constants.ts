/**
 * Constants for FASTA code stream parsing and writing
 */

/** Prefix of a description (header) line */
export const PREFIX_DESCRIPTION = ">";

/** Prefix of a comment line */
export const PREFIX_COMMENT = ";";

/** Line terminator written unless the writer is configured otherwise */
export const DEFAULT_LINE_ENDING = "\n";

/** Codes per output line */
export const DEFAULT_LINE_WIDTH = 80;

/** Characters returned by a raw head read unless a limit is given */
export const DEFAULT_RAW_HEAD_LENGTH = 80_000_000;

/** Whitespace inside a code line never becomes a code */
export const WHITESPACE = /\s/;
