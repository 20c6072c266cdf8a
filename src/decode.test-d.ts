import { assertType, expectTypeOf, test } from "vitest";
import { decode } from "./decode.ts";
import type { DecodeOptions, ResolvedDecodeOptions } from "./decodeOptions.ts";
import type { DecodeErrorKind } from "./JSONDecodeError.ts";
import { NumberMachine } from "./NumberMachine.ts";
import { StringMachine } from "./StringMachine.ts";
import { ValueMachine } from "./ValueMachine.ts";
import type { JSONValue, Outcome } from "./types.ts";

test("decode returns a JSONValue", () => {
	expectTypeOf(decode).returns.toEqualTypeOf<JSONValue>();
	expectTypeOf<undefined>().not.toMatchTypeOf<JSONValue>();
});

test("Outcomes narrow on type", () => {
	const outcome = new NumberMachine().feed("1");
	assertType<Outcome<number>>(outcome);

	if (outcome.type === "partial" || outcome.type === "done") {
		expectTypeOf(outcome.value).toEqualTypeOf<number>();
	} else if (outcome.type === "rejected") {
		expectTypeOf(outcome.kind).toEqualTypeOf<DecodeErrorKind>();
	} else {
		expectTypeOf(outcome).toEqualTypeOf<{ type: "pending" }>();
	}
});

test("Machines carry their value type", () => {
	expectTypeOf(new StringMachine().finish()).toEqualTypeOf<
		| { type: "done"; value: string }
		| { type: "rejected"; kind: DecodeErrorKind; message: string }
	>();
	expectTypeOf(new ValueMachine().outcome).toEqualTypeOf<Outcome<JSONValue>>();
});

test("Every option is optional on input and present once resolved", () => {
	assertType<DecodeOptions>({});
	assertType<DecodeOptions>({ maxDepth: 10 });
	expectTypeOf<ResolvedDecodeOptions["maxDepth"]>().toEqualTypeOf<number>();
	expectTypeOf<
		ResolvedDecodeOptions["rejectControlCharacters"]
	>().toEqualTypeOf<boolean>();

	// @ts-expect-error
	assertType<DecodeOptions>({ maxDepth: "10" });
});
