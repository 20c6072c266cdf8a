import {
	isTerminal,
	PENDING,
	rejected,
	type JSONValue,
	type Outcome,
	type TerminalOutcome,
} from "./types.ts";
import { quote } from "./characters.ts";

/**
 * Incremental recognizer for one grammar rule. It is fed one code point at a time and reports an Outcome after each.
 *
 * Once `outcome` is done or rejected, the machine must not be fed again.
 */
export abstract class Machine<T extends JSONValue = JSONValue> {
	outcome: Outcome<T> = PENDING;

	feed(char: string): Outcome<T> {
		if (isTerminal(this.outcome)) {
			throw new Error(
				`Cannot feed ${quote(char)} to ${this.constructor.name} after it is ${this.outcome.type}`,
			);
		}
		this.outcome = this.step(char);
		return this.outcome;
	}

	// Called when input runs out. Machines that can legitimately end without a closing character (numbers) override end().
	finish(): TerminalOutcome<T> {
		if (isTerminal(this.outcome)) {
			return this.outcome;
		}
		const outcome = this.end();
		this.outcome = outcome;
		return outcome;
	}

	protected abstract step(char: string): Outcome<T>;

	protected end(): TerminalOutcome<T> {
		return rejected("IncompleteInput", "Unexpected end of input");
	}
}
