import { JSONDecoder } from "./JSONDecoder.ts";
import type { DecodeOptions } from "./decodeOptions.ts";
import type { JSONValue } from "./types.ts";

export const decode = (text: string, options?: DecodeOptions): JSONValue => {
	const decoder = new JSONDecoder({
		...options,
		onValue: () => {},
	});
	decoder.write(text);
	return decoder.end();
};
