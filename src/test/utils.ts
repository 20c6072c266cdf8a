import { JSONDecodeError, type DecodeErrorKind } from "../JSONDecodeError.ts";
import type { JSONDecoderOptions } from "../JSONDecoder.ts";
import { JSONDecodeStream } from "../JSONDecodeStream.ts";
import type { Machine } from "../Machine.ts";
import type { JSONValue, Outcome } from "../types.ts";

export const makeReadableStreamFromChunks = (chunks: string[]) => {
	return new ReadableStream<string>({
		start(controller) {
			for (const chunk of chunks) {
				controller.enqueue(chunk);
			}
			controller.close();
		},
	});
};

export const decodeChunks = async (
	chunks: string[],
	options?: JSONDecoderOptions,
) => {
	const values: JSONValue[] = [];
	await makeReadableStreamFromChunks(chunks)
		.pipeThrough(new JSONDecodeStream(options))
		.pipeTo(
			new WritableStream<JSONValue>({
				write(value) {
					values.push(value);
				},
			}),
		);
	return values;
};

// Feeds every code point and returns the outcome of each feed, stopping early at a terminal outcome
export const feedAll = <T extends JSONValue>(
	machine: Machine<T>,
	text: string,
): Outcome<T>[] => {
	const outcomes: Outcome<T>[] = [];
	for (const char of text) {
		const outcome = machine.feed(char);
		outcomes.push(outcome);
		if (outcome.type === "done" || outcome.type === "rejected") {
			break;
		}
	}
	return outcomes;
};

export const lastOutcome = <T extends JSONValue>(
	machine: Machine<T>,
	text: string,
): Outcome<T> => {
	const outcomes = feedAll(machine, text);
	const outcome = outcomes[outcomes.length - 1];
	if (outcome === undefined) {
		throw new Error("No input was fed");
	}
	return outcome;
};

export const rejectionKind = (
	outcome: Outcome<JSONValue>,
): DecodeErrorKind | undefined => {
	return outcome.type === "rejected" ? outcome.kind : undefined;
};

export const catchDecodeError = (callback: () => unknown): JSONDecodeError => {
	try {
		callback();
	} catch (error) {
		if (error instanceof JSONDecodeError) {
			return error;
		}
		throw error;
	}
	throw new Error("Expected a JSONDecodeError, but nothing was thrown");
};

export const rejectsWithDecodeError = async (
	promise: Promise<unknown>,
): Promise<JSONDecodeError> => {
	try {
		await promise;
	} catch (error) {
		if (error instanceof JSONDecodeError) {
			return error;
		}
		throw error;
	}
	throw new Error("Expected a JSONDecodeError, but the promise resolved");
};
