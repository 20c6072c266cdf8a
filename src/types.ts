import type { DecodeErrorKind } from "./JSONDecodeError.ts";

export type JSONObject = { [key: string]: JSONValue };

export type JSONValue =
	| null
	| boolean
	| number
	| string
	| JSONValue[]
	| JSONObject;

// The machine consumed the code point but has nothing to report yet
export type PendingOutcome = { type: "pending" };

// Provisional value that more input may still change. Only numbers produce this, since they have no closing character.
export type PartialOutcome<T> = { type: "partial"; value: T };

export type DoneOutcome<T> = { type: "done"; value: T };

export type RejectedOutcome = {
	type: "rejected";
	kind: DecodeErrorKind;
	message: string;
};

export type Outcome<T = JSONValue> =
	| PendingOutcome
	| PartialOutcome<T>
	| DoneOutcome<T>
	| RejectedOutcome;

export type TerminalOutcome<T = JSONValue> = DoneOutcome<T> | RejectedOutcome;

export const PENDING: PendingOutcome = { type: "pending" };

export const partial = <T>(value: T): PartialOutcome<T> => ({
	type: "partial",
	value,
});

export const done = <T>(value: T): DoneOutcome<T> => ({ type: "done", value });

export const rejected = (
	kind: DecodeErrorKind,
	message: string,
): RejectedOutcome => ({ type: "rejected", kind, message });

export const isTerminal = <T>(
	outcome: Outcome<T>,
): outcome is TerminalOutcome<T> => {
	return outcome.type === "done" || outcome.type === "rejected";
};
