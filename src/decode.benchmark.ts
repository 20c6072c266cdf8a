import { bench, describe } from "vitest";
import { decode } from "./decode.ts";

// Generated rather than loaded, so the benchmark needs no data file
const records = Array.from({ length: 2000 }, (_, i) => ({
	id: i,
	name: `record ${i}`,
	score: i * 1.25 - 400,
	active: i % 3 === 0,
	tags: ["alpha", "beta", i % 2 === 0 ? "even" : "odd"],
	parent: i > 0 ? i - 1 : null,
	note: i % 10 === 0 ? "escaped \"quote\" and \\u2022 •" : "",
}));
const json = JSON.stringify(records);

const benchOptions = {
	iterations: 20,
} as const;

describe("Decode 2000 records", () => {
	bench(
		"decode",
		() => {
			decode(json);
		},
		benchOptions,
	);

	bench(
		"JSON.parse",
		() => {
			JSON.parse(json);
		},
		benchOptions,
	);
});
