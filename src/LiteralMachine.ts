import { Machine } from "./Machine.ts";
import { quote } from "./characters.ts";
import { done, PENDING, rejected, type Outcome } from "./types.ts";

export class LiteralMachine<T extends null | boolean> extends Machine<T> {
	literal: string;
	value: T;
	cursor = 0;

	constructor(literal: string, value: T) {
		super();
		this.literal = literal;
		this.value = value;
	}

	protected override step(char: string): Outcome<T> {
		if (char !== this.literal[this.cursor]) {
			return rejected(
				"UnexpectedCharacter",
				`Unexpected ${quote(char)} in literal ${this.literal}`,
			);
		}

		this.cursor += 1;
		if (this.cursor === this.literal.length) {
			return done(this.value);
		}
		return PENDING;
	}

	protected override end() {
		return rejected(
			"IncompleteInput",
			`Unexpected end of input in literal ${this.literal}`,
		);
	}
}
