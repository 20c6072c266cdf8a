export { decode } from "./decode.ts";
export {
	decodeOptionsSchema,
	resolveDecodeOptions,
	type DecodeOptions,
	type ResolvedDecodeOptions,
} from "./decodeOptions.ts";
export {
	DECODE_ERROR_KINDS,
	JSONDecodeError,
	type DecodeErrorKind,
} from "./JSONDecodeError.ts";
export { JSONDecoder, type JSONDecoderOptions } from "./JSONDecoder.ts";
export { JSONDecodeStream } from "./JSONDecodeStream.ts";
export { Machine } from "./Machine.ts";
export { ArrayMachine } from "./ArrayMachine.ts";
export { LiteralMachine } from "./LiteralMachine.ts";
export { NumberMachine } from "./NumberMachine.ts";
export { ObjectMachine } from "./ObjectMachine.ts";
export { StringMachine } from "./StringMachine.ts";
export { ValueMachine } from "./ValueMachine.ts";
export {
	done,
	isTerminal,
	partial,
	PENDING,
	rejected,
	type DoneOutcome,
	type JSONObject,
	type JSONValue,
	type Outcome,
	type PartialOutcome,
	type PendingOutcome,
	type RejectedOutcome,
	type TerminalOutcome,
} from "./types.ts";
