import { JSONDecoder, type JSONDecoderOptions } from "./JSONDecoder.ts";
import type { JSONValue } from "./types.ts";

export class JSONDecodeStream extends TransformStream<string, JSONValue> {
	constructor(options?: JSONDecoderOptions) {
		let decoder: JSONDecoder;

		super({
			start(controller) {
				decoder = new JSONDecoder({
					...options,
					onValue: (value) => {
						controller.enqueue(value);
					},
				});
			},

			transform(chunk) {
				decoder.write(chunk);
			},

			flush(controller) {
				decoder.end();
				controller.terminate();
			},
		});
	}
}
