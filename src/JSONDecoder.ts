import { JSONDecodeError } from "./JSONDecodeError.ts";
import { ValueMachine } from "./ValueMachine.ts";
import {
	isHighSurrogate,
	isWhitespace,
	quote,
	RECORD_SEPARATOR,
} from "./characters.ts";
import {
	resolveDecodeOptions,
	type DecodeOptions,
	type ResolvedDecodeOptions,
} from "./decodeOptions.ts";
import type { JSONValue, Outcome, RejectedOutcome } from "./types.ts";

type OnValue = (value: JSONValue) => void;

export type JSONDecoderOptions = DecodeOptions & {
	// Decode a sequence of JSON texts (concatenated, whitespace or record separator delimited) rather than exactly one
	multi?: boolean;
};

/**
 * Push-style driver: text arrives in chunks through write(), every code point is fed to a top-level ValueMachine, and each completed top-level value is handed to onValue.
 */
export class JSONDecoder {
	options: ResolvedDecodeOptions;
	multi: boolean;
	onValue: OnValue;
	machine: ValueMachine | undefined;
	position = 0;
	lastValue: JSONValue | undefined;

	// Once set, every later write() or end() throws it again
	error: JSONDecodeError | undefined;

	// High surrogate at the end of a chunk, waiting for its low half in the next one
	highSurrogate: string | undefined;

	constructor({
		onValue,
		multi,
		...options
	}: JSONDecoderOptions & { onValue: OnValue }) {
		this.options = resolveDecodeOptions(options);
		this.multi = multi ?? false;
		this.onValue = onValue;
	}

	write(text: string) {
		if (this.error) {
			throw this.error;
		}

		if (this.highSurrogate !== undefined) {
			text = this.highSurrogate + text;
			this.highSurrogate = undefined;
		}

		if (text.length > 0 && isHighSurrogate(text.charCodeAt(text.length - 1))) {
			this.highSurrogate = text.slice(-1);
			text = text.slice(0, -1);
		}

		for (const char of text) {
			this.feed(char);
			this.position += char.length;
		}
	}

	feed(char: string) {
		const machine = this.machine;

		if (machine === undefined) {
			if (isWhitespace(char) || (this.multi && char === RECORD_SEPARATOR)) {
				return;
			}
			if (!this.multi && this.lastValue !== undefined) {
				return this.fail(
					new JSONDecodeError({
						kind: "UnexpectedCharacter",
						message: `Unexpected ${quote(char)} after the end of the JSON value`,
						position: this.position,
						character: char,
					}),
				);
			}

			const next = new ValueMachine(this.options);
			this.machine = next;
			this.handle(next.feed(char), char);
			return;
		}

		// At the top level there is no closing bracket, so whitespace (or a record separator between texts) is what ends a number
		const last = machine.outcome;
		if (
			last.type === "partial" &&
			(isWhitespace(char) || (this.multi && char === RECORD_SEPARATOR))
		) {
			this.emit(last.value);
			return;
		}

		this.handle(machine.feed(char), char);
	}

	handle(outcome: Outcome, char: string) {
		if (outcome.type === "rejected") {
			return this.reject(outcome, char);
		}
		if (outcome.type === "done") {
			this.emit(outcome.value);
		}
	}

	emit(value: JSONValue) {
		this.machine = undefined;
		this.lastValue = value;
		this.onValue(value);
	}

	reject(outcome: RejectedOutcome, char?: string): never {
		return this.fail(
			new JSONDecodeError({
				kind: outcome.kind,
				message: outcome.message,
				position: this.position,
				character: char,
			}),
		);
	}

	fail(error: JSONDecodeError): never {
		this.error = error;
		throw error;
	}

	// Returns the last decoded value, which in single mode is the only one
	end(): JSONValue {
		if (this.error) {
			throw this.error;
		}

		if (this.highSurrogate !== undefined) {
			const char = this.highSurrogate;
			this.highSurrogate = undefined;
			this.feed(char);
			this.position += char.length;
		}

		const machine = this.machine;
		if (machine) {
			const last = machine.outcome;
			if (last.type === "partial") {
				this.emit(last.value);
			} else {
				const outcome = machine.finish();
				if (outcome.type === "rejected") {
					return this.reject(outcome);
				}
				this.emit(outcome.value);
			}
		}

		if (this.lastValue === undefined) {
			return this.fail(
				new JSONDecodeError({
					kind: "IncompleteInput",
					message: "No data in input",
					position: this.position,
				}),
			);
		}
		return this.lastValue;
	}
}
