export const WHITESPACE = new Set([" ", "\t", "\n", "\r"]);

// RFC 7464 record separator, allowed between values when decoding several texts
export const RECORD_SEPARATOR = "\u001e";

export const ESCAPES: Readonly<Record<string, string>> = {
	'"': '"',
	"\\": "\\",
	"/": "/",
	b: "\b",
	f: "\f",
	n: "\n",
	r: "\r",
	t: "\t",
};

export const isWhitespace = (char: string) => WHITESPACE.has(char);

export const isDigit = (char: string) => char >= "0" && char <= "9";

export const isHexDigit = (char: string) =>
	isDigit(char) ||
	(char >= "a" && char <= "f") ||
	(char >= "A" && char <= "F");

export const isControlCharacter = (char: string) =>
	char.length === 1 && char.charCodeAt(0) <= 0x001f;

export const isHighSurrogate = (codeUnit: number) =>
	codeUnit >= 0xd800 && codeUnit <= 0xdbff;

export const quote = (char: string) => JSON.stringify(char);
