export const DECODE_ERROR_KINDS = [
	"UnexpectedCharacter",
	"ExpectedQuote",
	"UnterminatedString",
	"InvalidEscape",
	"InvalidUnicodeEscape",
	"InvalidNumberFormat",
	"LeadingZeroViolation",
	"MissingColon",
	"TrailingComma",
	"UnexpectedCloseOrComma",
	"NoMatchingGrammar",
	"IncompleteInput",
	"MaxDepthExceeded",
] as const;

export type DecodeErrorKind = (typeof DECODE_ERROR_KINDS)[number];

/**
 * The one error thrown for malformed input. The first rejection aborts the whole decode, so there is never more than one per call.
 */
export class JSONDecodeError extends Error {
	override name = "JSONDecodeError";
	readonly kind: DecodeErrorKind;

	/** UTF-16 offset into the input. At end of input this is the input length. */
	readonly position: number;

	/** The offending code point, or undefined when input ended early */
	readonly character: string | undefined;

	constructor({
		kind,
		message,
		position,
		character,
	}: {
		kind: DecodeErrorKind;
		message: string;
		position: number;
		character?: string;
	}) {
		super(`${message} at position ${position}`);
		this.kind = kind;
		this.position = position;
		this.character = character;
	}
}
