import * as z from "zod";

export const decodeOptionsSchema = z.object({
	// Containers nested deeper than this are rejected. Each level adds frames to the synchronous feed chain, so this also bounds stack use.
	maxDepth: z.number().int().positive().default(512),

	// RFC 8259 forbids raw U+0000 through U+001F inside strings, but by default they are kept verbatim
	rejectControlCharacters: z.boolean().default(false),
});

export type DecodeOptions = z.input<typeof decodeOptionsSchema>;

export type ResolvedDecodeOptions = z.output<typeof decodeOptionsSchema>;

export const resolveDecodeOptions = (
	options: DecodeOptions = {},
): ResolvedDecodeOptions => {
	const result = decodeOptionsSchema.safeParse(options);
	if (!result.success) {
		throw new TypeError(`Invalid decode options: ${result.error.message}`, {
			cause: result.error,
		});
	}
	return result.data;
};

export const DEFAULT_DECODE_OPTIONS = resolveDecodeOptions();
