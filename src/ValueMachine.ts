import { ArrayMachine } from "./ArrayMachine.ts";
import { LiteralMachine } from "./LiteralMachine.ts";
import { Machine } from "./Machine.ts";
import { NumberMachine } from "./NumberMachine.ts";
import { ObjectMachine } from "./ObjectMachine.ts";
import { StringMachine } from "./StringMachine.ts";
import { quote } from "./characters.ts";
import {
	DEFAULT_DECODE_OPTIONS,
	type ResolvedDecodeOptions,
} from "./decodeOptions.ts";
import { rejected, type JSONValue, type Outcome } from "./types.ts";

/**
 * Dispatcher for any JSON value. The first code point is fed to every grammar alternative, the ones that reject it are dropped, and everything after goes to the survivor.
 */
export class ValueMachine extends Machine {
	options: ResolvedDecodeOptions;

	// Number of containers enclosing this value
	depth: number;

	survivor: Machine | undefined;

	constructor(options = DEFAULT_DECODE_OPTIONS, depth = 0) {
		super();
		this.options = options;
		this.depth = depth;
	}

	// Order matters: when more than one alternative accepts, the first one wins
	alternatives(): Machine[] {
		return [
			new NumberMachine(),
			new ObjectMachine(this.options, this.depth),
			new ArrayMachine(this.options, this.depth),
			new StringMachine(this.options),
			new LiteralMachine("null", null),
			new LiteralMachine("false", false),
			new LiteralMachine("true", true),
		];
	}

	protected override step(char: string): Outcome<JSONValue> {
		if (this.survivor) {
			return this.survivor.feed(char);
		}

		if ((char === "[" || char === "{") && this.depth >= this.options.maxDepth) {
			return rejected(
				"MaxDepthExceeded",
				`Nesting deeper than ${this.options.maxDepth} levels`,
			);
		}

		const candidates = this.alternatives().map((machine) => ({
			machine,
			outcome: machine.feed(char),
		}));
		const survivor = candidates.find(
			(candidate) => candidate.outcome.type !== "rejected",
		);
		if (!survivor) {
			return rejected(
				"NoMatchingGrammar",
				`Unexpected ${quote(char)}, no JSON value starts with it`,
			);
		}

		this.survivor = survivor.machine;
		return survivor.outcome;
	}

	protected override end() {
		if (this.survivor) {
			return this.survivor.finish();
		}
		return super.end();
	}
}
