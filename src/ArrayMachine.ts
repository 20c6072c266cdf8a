import { Machine } from "./Machine.ts";
import { ValueMachine } from "./ValueMachine.ts";
import { isWhitespace, quote } from "./characters.ts";
import {
	DEFAULT_DECODE_OPTIONS,
	type ResolvedDecodeOptions,
} from "./decodeOptions.ts";
import {
	done,
	PENDING,
	rejected,
	type JSONValue,
	type Outcome,
} from "./types.ts";

type ArrayState =
	| "EXPECT_OPEN_BRACKET"
	| "EXPECT_ELEMENT_OR_CLOSE"
	| "EXPECT_COMMA_OR_CLOSE"
	| "EXPECT_ELEMENT"; // After a comma, so ] is a trailing comma

export class ArrayMachine extends Machine<JSONValue[]> {
	state: ArrayState = "EXPECT_OPEN_BRACKET";
	value: JSONValue[] = [];

	// Set while an element is being decoded
	element: ValueMachine | undefined;
	options: ResolvedDecodeOptions;
	depth: number;

	constructor(options = DEFAULT_DECODE_OPTIONS, depth = 0) {
		super();
		this.options = options;
		this.depth = depth;
	}

	protected override step(char: string): Outcome<JSONValue[]> {
		if (this.element) {
			return this.continueElement(this.element, char);
		}

		switch (this.state) {
			case "EXPECT_OPEN_BRACKET":
				if (char !== "[") {
					return rejected(
						"UnexpectedCharacter",
						`Expected "[" but got ${quote(char)}`,
					);
				}
				this.state = "EXPECT_ELEMENT_OR_CLOSE";
				return PENDING;

			case "EXPECT_ELEMENT_OR_CLOSE":
				if (isWhitespace(char)) {
					return PENDING;
				}
				if (char === "]") {
					return this.close();
				}
				if (char === ",") {
					return rejected(
						"UnexpectedCloseOrComma",
						`Unexpected "," before the first array element`,
					);
				}
				return this.startElement(char);

			case "EXPECT_ELEMENT":
				if (isWhitespace(char)) {
					return PENDING;
				}
				if (char === "]") {
					return rejected("TrailingComma", `Unexpected "]" after ","`);
				}
				if (char === ",") {
					return rejected("UnexpectedCloseOrComma", `Unexpected "," after ","`);
				}
				return this.startElement(char);

			case "EXPECT_COMMA_OR_CLOSE":
				return this.afterElement(char);
		}
	}

	startElement(char: string) {
		const element = new ValueMachine(this.options, this.depth + 1);
		this.element = element;
		return this.handleElementOutcome(element.feed(char));
	}

	continueElement(element: ValueMachine, char: string): Outcome<JSONValue[]> {
		// A partial number ends at the first delimiter, which then belongs to the array
		const last = element.outcome;
		if (
			last.type === "partial" &&
			(char === "," || char === "]" || isWhitespace(char))
		) {
			this.push(last.value);
			return this.afterElement(char);
		}

		return this.handleElementOutcome(element.feed(char));
	}

	handleElementOutcome(outcome: Outcome<JSONValue>): Outcome<JSONValue[]> {
		if (outcome.type === "rejected") {
			return outcome;
		}
		if (outcome.type === "done") {
			this.push(outcome.value);
		}
		return PENDING;
	}

	afterElement(char: string): Outcome<JSONValue[]> {
		if (isWhitespace(char)) {
			return PENDING;
		}
		if (char === ",") {
			this.state = "EXPECT_ELEMENT";
			return PENDING;
		}
		if (char === "]") {
			return this.close();
		}
		return rejected(
			"UnexpectedCharacter",
			`Unexpected ${quote(char)} in array, expected "," or "]"`,
		);
	}

	push(value: JSONValue) {
		this.value.push(value);
		this.element = undefined;
		this.state = "EXPECT_COMMA_OR_CLOSE";
	}

	close() {
		return done(this.value);
	}

	protected override end() {
		return rejected("IncompleteInput", "Unexpected end of input in array");
	}
}
