import { Machine } from "./Machine.ts";
import { StringMachine } from "./StringMachine.ts";
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
	type JSONObject,
	type JSONValue,
	type Outcome,
} from "./types.ts";

type ObjectState =
	| "EXPECT_OPEN_BRACE"
	| "EXPECT_KEY_OR_CLOSE"
	| "EXPECT_COLON"
	| "EXPECT_VALUE"
	| "EXPECT_COMMA_OR_CLOSE"
	| "EXPECT_KEY"; // After a comma, so } is a trailing comma

export class ObjectMachine extends Machine<JSONObject> {
	state: ObjectState = "EXPECT_OPEN_BRACE";
	value: JSONObject = {};
	key = "";

	// At most one of these is set, while a key or a value is being decoded
	keyMachine: StringMachine | undefined;
	valueMachine: ValueMachine | undefined;
	options: ResolvedDecodeOptions;
	depth: number;

	constructor(options = DEFAULT_DECODE_OPTIONS, depth = 0) {
		super();
		this.options = options;
		this.depth = depth;
	}

	protected override step(char: string): Outcome<JSONObject> {
		if (this.keyMachine) {
			return this.continueKey(this.keyMachine, char);
		}
		if (this.valueMachine) {
			return this.continueValue(this.valueMachine, char);
		}

		switch (this.state) {
			case "EXPECT_OPEN_BRACE":
				if (char !== "{") {
					return rejected(
						"UnexpectedCharacter",
						`Expected "{" but got ${quote(char)}`,
					);
				}
				this.state = "EXPECT_KEY_OR_CLOSE";
				return PENDING;

			case "EXPECT_KEY_OR_CLOSE":
				if (isWhitespace(char)) {
					return PENDING;
				}
				if (char === "}") {
					return this.close();
				}
				if (char === ",") {
					return rejected(
						"UnexpectedCloseOrComma",
						`Unexpected "," before the first object member`,
					);
				}
				return this.startKey(char);

			case "EXPECT_KEY":
				if (isWhitespace(char)) {
					return PENDING;
				}
				if (char === "}") {
					return rejected("TrailingComma", `Unexpected "}" after ","`);
				}
				if (char === ",") {
					return rejected("UnexpectedCloseOrComma", `Unexpected "," after ","`);
				}
				return this.startKey(char);

			case "EXPECT_COLON":
				if (isWhitespace(char)) {
					return PENDING;
				}
				if (char !== ":") {
					return rejected(
						"MissingColon",
						`Expected ":" after key ${quote(this.key)} but got ${quote(char)}`,
					);
				}
				this.state = "EXPECT_VALUE";
				return PENDING;

			case "EXPECT_VALUE":
				if (isWhitespace(char)) {
					return PENDING;
				}
				if (char === "," || char === "}") {
					return rejected(
						"UnexpectedCloseOrComma",
						`Unexpected ${quote(char)}, expected a value for key ${quote(this.key)}`,
					);
				}
				return this.startValue(char);

			case "EXPECT_COMMA_OR_CLOSE":
				return this.afterValue(char);
		}
	}

	startKey(char: string) {
		const keyMachine = new StringMachine(this.options);
		this.keyMachine = keyMachine;
		return this.continueKey(keyMachine, char);
	}

	continueKey(keyMachine: StringMachine, char: string): Outcome<JSONObject> {
		const outcome = keyMachine.feed(char);
		if (outcome.type === "rejected") {
			return outcome;
		}
		if (outcome.type === "done") {
			this.key = outcome.value;
			this.keyMachine = undefined;
			this.state = "EXPECT_COLON";
		}
		return PENDING;
	}

	startValue(char: string) {
		const valueMachine = new ValueMachine(this.options, this.depth + 1);
		this.valueMachine = valueMachine;
		return this.handleValueOutcome(valueMachine.feed(char));
	}

	continueValue(valueMachine: ValueMachine, char: string): Outcome<JSONObject> {
		// Same delimiter check as arrays: a partial number is finished by whatever can't continue it
		const last = valueMachine.outcome;
		if (
			last.type === "partial" &&
			(char === "," || char === "}" || isWhitespace(char))
		) {
			this.set(last.value);
			return this.afterValue(char);
		}

		return this.handleValueOutcome(valueMachine.feed(char));
	}

	handleValueOutcome(outcome: Outcome<JSONValue>): Outcome<JSONObject> {
		if (outcome.type === "rejected") {
			return outcome;
		}
		if (outcome.type === "done") {
			this.set(outcome.value);
		}
		return PENDING;
	}

	afterValue(char: string): Outcome<JSONObject> {
		if (isWhitespace(char)) {
			return PENDING;
		}
		if (char === ",") {
			this.state = "EXPECT_KEY";
			return PENDING;
		}
		if (char === "}") {
			return this.close();
		}
		return rejected(
			"UnexpectedCharacter",
			`Unexpected ${quote(char)} in object, expected "," or "}"`,
		);
	}

	set(value: JSONValue) {
		// "__proto__" is an own key, as with JSON.parse. A duplicate key keeps its first position and takes the last value.
		Object.defineProperty(this.value, this.key, {
			value,
			writable: true,
			enumerable: true,
			configurable: true,
		});
		this.valueMachine = undefined;
		this.state = "EXPECT_COMMA_OR_CLOSE";
	}

	close() {
		return done(this.value);
	}

	protected override end() {
		return rejected("IncompleteInput", "Unexpected end of input in object");
	}
}
