import { Machine } from "./Machine.ts";
import { isDigit, quote } from "./characters.ts";
import { done, partial, PENDING, rejected, type Outcome } from "./types.ts";

type NumberState =
	| "START"
	| "SIGN" // After a leading minus
	| "ZERO" // Integer part is exactly 0, so no more integer digits are allowed
	| "INTEGER"
	| "DOT"
	| "FRACTION"
	| "EXPONENT"
	| "EXPONENT_SIGN"
	| "EXPONENT_DIGITS";

const ACCEPTING_STATES = new Set<NumberState>([
	"ZERO",
	"INTEGER",
	"FRACTION",
	"EXPONENT_DIGITS",
]);

/**
 * Numbers have no closing character, so this never reports done from feed. Each digit yields a partial value, and the parent decides when a delimiter ends the number.
 */
export class NumberMachine extends Machine<number> {
	state: NumberState = "START";
	text = "";

	protected override step(char: string): Outcome<number> {
		const nextState = this.transition(char);
		if (nextState === undefined) {
			if (this.state === "ZERO" && isDigit(char)) {
				return rejected(
					"LeadingZeroViolation",
					`Unexpected ${quote(char)} after leading 0 in number`,
				);
			}
			return rejected(
				"InvalidNumberFormat",
				`Unexpected ${quote(char)} in number in state ${this.state}`,
			);
		}

		this.state = nextState;
		this.text += char;

		if (ACCEPTING_STATES.has(nextState)) {
			return partial(this.value());
		}
		return PENDING;
	}

	transition(char: string): NumberState | undefined {
		switch (this.state) {
			case "START":
				if (char === "-") {
					return "SIGN";
				}
			// falls through
			case "SIGN":
				if (char === "0") {
					return "ZERO";
				}
				if (isDigit(char)) {
					return "INTEGER";
				}
				return undefined;

			case "ZERO":
			case "INTEGER":
				if (this.state === "INTEGER" && isDigit(char)) {
					return "INTEGER";
				}
				if (char === ".") {
					return "DOT";
				}
				if (char === "e" || char === "E") {
					return "EXPONENT";
				}
				return undefined;

			case "DOT":
				return isDigit(char) ? "FRACTION" : undefined;

			case "FRACTION":
				if (isDigit(char)) {
					return "FRACTION";
				}
				if (char === "e" || char === "E") {
					return "EXPONENT";
				}
				return undefined;

			case "EXPONENT":
				if (char === "+" || char === "-") {
					return "EXPONENT_SIGN";
				}
				return isDigit(char) ? "EXPONENT_DIGITS" : undefined;

			case "EXPONENT_SIGN":
			case "EXPONENT_DIGITS":
				return isDigit(char) ? "EXPONENT_DIGITS" : undefined;
		}
	}

	value() {
		return Number(this.text);
	}

	protected override end() {
		if (ACCEPTING_STATES.has(this.state)) {
			return done(this.value());
		}
		return rejected(
			"InvalidNumberFormat",
			`Unexpected end of number in state ${this.state}`,
		);
	}
}
