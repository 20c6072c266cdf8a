import { assert, describe, test } from "vitest";
import { ObjectMachine } from "./ObjectMachine.ts";
import { feedAll, lastOutcome, rejectionKind } from "./test/utils.ts";
import type { JSONObject } from "./types.ts";

describe("Valid objects", () => {
	const valid: [string, JSONObject][] = [
		["{}", {}],
		['{"one": 1}', { one: 1 }],
		['{ "one" :1, "two": 2}', { one: 1, two: 2 }],
		['{ "one" : 1 }', { one: 1 }],
		['{"delimiter": "}" }', { delimiter: "}" }],
		['{"nested": {"object": "here"}}', { nested: { object: "here" } }],
		['{"a":null,"b":false,"c":0,"d":"","e":[],"f":{}}', {
			a: null,
			b: false,
			c: 0,
			d: "",
			e: [],
			f: {},
		}],
	];

	for (const [json, expected] of valid) {
		test(json, () => {
			assert.deepStrictEqual(lastOutcome(new ObjectMachine(), json), {
				type: "done",
				value: expected,
			});
		});
	}

	test("Duplicate keys keep the first position and the last value", () => {
		const outcome = lastOutcome(new ObjectMachine(), '{"a":1,"b":2,"a":3}');
		assert.strictEqual(outcome.type, "done");
		if (outcome.type === "done") {
			assert.deepStrictEqual(Object.keys(outcome.value), ["a", "b"]);
			assert.deepStrictEqual(outcome.value, { a: 3, b: 2 });
		}
	});

	test("__proto__ is an ordinary key", () => {
		const outcome = lastOutcome(new ObjectMachine(), '{"__proto__": {"x": 1}}');
		assert.strictEqual(outcome.type, "done");
		if (outcome.type === "done") {
			assert.deepStrictEqual(Object.keys(outcome.value), ["__proto__"]);
			assert.strictEqual(Object.getPrototypeOf(outcome.value), Object.prototype);
			assert.isUndefined(Object.getOwnPropertyDescriptor(Object.prototype, "x"));
		}
	});

	test("Reports pending until the closing brace", () => {
		const outcomes = feedAll(new ObjectMachine(), '{"a":1}');
		assert.strictEqual(outcomes.length, 7);
		assert.isTrue(
			outcomes.slice(0, -1).every((outcome) => outcome.type === "pending"),
		);
		assert.deepStrictEqual(outcomes[6], { type: "done", value: { a: 1 } });
	});
});

describe("Invalid objects", () => {
	const invalid = [
		["[]", "UnexpectedCharacter"],
		["{,}", "UnexpectedCloseOrComma"],
		['{"key":}', "UnexpectedCloseOrComma"],
		['{"key":,}', "UnexpectedCloseOrComma"],
		['{:"value"}', "ExpectedQuote"],
		["{key: 1}", "ExpectedQuote"],
		['{"extra" : "comma",}', "TrailingComma"],
		['{"a":1,}', "TrailingComma"],
		['{"a":1,,"b":2}', "UnexpectedCloseOrComma"],
		['{"a" 1}', "MissingColon"],
		['{"a":1 "b":2}', "UnexpectedCharacter"],
		['{"a":1]', "InvalidNumberFormat"],
		['{"a":tru}', "UnexpectedCharacter"],
	] as const;

	for (const [json, kind] of invalid) {
		test(`${json} -> ${kind}`, () => {
			assert.strictEqual(
				rejectionKind(lastOutcome(new ObjectMachine(), json)),
				kind,
			);
		});
	}

	test("End of input in the middle of a member", () => {
		const machine = new ObjectMachine();
		feedAll(machine, '{"a":');
		assert.strictEqual(rejectionKind(machine.finish()), "IncompleteInput");
	});
});

test("Cannot be fed after it is closed", () => {
	const machine = new ObjectMachine();
	feedAll(machine, '{"a":1}');
	assert.throws(
		() => machine.feed("}"),
		'Cannot feed "}" to ObjectMachine after it is done',
	);
});
