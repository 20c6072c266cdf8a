import { Machine } from "./Machine.ts";
import {
	ESCAPES,
	isControlCharacter,
	isHexDigit,
	quote,
} from "./characters.ts";
import {
	DEFAULT_DECODE_OPTIONS,
	type ResolvedDecodeOptions,
} from "./decodeOptions.ts";
import { done, PENDING, rejected, type Outcome } from "./types.ts";

type StringState =
	| "EXPECT_OPEN_QUOTE"
	| "BODY"
	| "ESCAPE"
	| "UNICODE_ESCAPE";

export class StringMachine extends Machine<string> {
	state: StringState = "EXPECT_OPEN_QUOTE";
	string = "";
	unicode = "";
	rejectControlCharacters: boolean;

	constructor(options: ResolvedDecodeOptions = DEFAULT_DECODE_OPTIONS) {
		super();
		this.rejectControlCharacters = options.rejectControlCharacters;
	}

	protected override step(char: string): Outcome<string> {
		switch (this.state) {
			case "EXPECT_OPEN_QUOTE":
				if (char !== '"') {
					return rejected(
						"ExpectedQuote",
						`Expected a string but got ${quote(char)}`,
					);
				}
				this.state = "BODY";
				return PENDING;

			case "BODY":
				if (char === '"') {
					return done(this.string);
				}
				if (char === "\\") {
					this.state = "ESCAPE";
					return PENDING;
				}
				if (this.rejectControlCharacters && isControlCharacter(char)) {
					return rejected(
						"UnexpectedCharacter",
						`Unescaped control character ${quote(char)} in string`,
					);
				}
				this.string += char;
				return PENDING;

			case "ESCAPE": {
				if (char === "u") {
					this.unicode = "";
					this.state = "UNICODE_ESCAPE";
					return PENDING;
				}
				const escaped = ESCAPES[char];
				if (escaped === undefined) {
					return rejected(
						"InvalidEscape",
						`Invalid escape sequence ${quote(`\\${char}`)} in string`,
					);
				}
				this.string += escaped;
				this.state = "BODY";
				return PENDING;
			}

			case "UNICODE_ESCAPE":
				if (!isHexDigit(char)) {
					return rejected(
						"InvalidUnicodeEscape",
						`Unexpected ${quote(char)} in \\u escape`,
					);
				}
				this.unicode += char;
				if (this.unicode.length === 4) {
					// One code unit per escape. A high/low surrogate pair written as two escapes ends up adjacent in the string, which is the astral character.
					this.string += String.fromCharCode(Number.parseInt(this.unicode, 16));
					this.state = "BODY";
				}
				return PENDING;
		}
	}

	protected override end() {
		return rejected("UnterminatedString", "Unterminated string");
	}
}
