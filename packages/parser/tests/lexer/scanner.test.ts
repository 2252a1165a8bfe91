import { describe, it, expect } from "vitest";
import {
	decodeInput,
	decodeLiteral,
	encodeLiteral,
	isValidUtf8,
	splitIndent,
	splitLines,
	splitLiteral,
} from "../../src/lexer/scanner.js";

describe("decodeInput", () => {
	it("returns strings unchanged", () => {
		expect(decodeInput("héllo")).toBe("héllo");
	});

	it("decodes valid UTF-8 bytes", () => {
		expect(decodeInput(new Uint8Array([0x68, 0xc3, 0xa9, 0x6c, 0x6c, 0x6f]))).toBe("héllo");
		expect(decodeInput(new Uint8Array([0xf0, 0x9f, 0x98, 0x80]))).toBe("😀");
	});

	it("maps invalid bytes to lone surrogates", () => {
		expect(decodeInput(new Uint8Array([0x61, 0xff, 0x62]))).toBe("a\udcffb");
	});

	it("rejects truncated and overlong sequences byte by byte", () => {
		expect(decodeInput(new Uint8Array([0xe2, 0x82]))).toBe("\udce2\udc82");
		expect(decodeInput(new Uint8Array([0xc0, 0x80]))).toBe("\udcc0\udc80");
	});

	it("rejects encoded surrogates", () => {
		expect(decodeInput(new Uint8Array([0xed, 0xa0, 0x80]))).toBe("\udced\udca0\udc80");
	});
});

describe("isValidUtf8", () => {
	it("accepts surrogate pairs", () => {
		expect(isValidUtf8("😀 ok")).toBe(true);
	});

	it("rejects unpaired surrogates", () => {
		expect(isValidUtf8("a\udcff")).toBe(false);
		expect(isValidUtf8("\ud83d")).toBe(false);
	});
});

describe("splitLines", () => {
	it("splits on every line ending", () => {
		expect(splitLines("a\r\nb\rc\nd")).toEqual(["a", "b", "c", "d"]);
	});

	it("keeps a trailing empty line", () => {
		expect(splitLines("a\n")).toEqual(["a", ""]);
	});
});

describe("splitIndent", () => {
	it("separates spaces and tabs from content", () => {
		expect(splitIndent("  \tkey = value")).toEqual(["  \t", "key = value"]);
	});

	it("handles lines without indentation", () => {
		expect(splitIndent("key")).toEqual(["", "key"]);
	});
});

describe("splitLiteral", () => {
	it("stops keys at the first equals sign", () => {
		expect(splitLiteral("a = b", true)).toEqual(["a", "= b"]);
	});

	it("stops keys at a comment before any equals sign", () => {
		expect(splitLiteral("a ; c = d", true)).toEqual(["a", "; c = d"]);
	});

	it("keeps equals signs in values", () => {
		expect(splitLiteral("x=y ; note", false)).toEqual(["x=y", "; note"]);
	});

	it("keeps separators inside quotes", () => {
		expect(splitLiteral('"a = b" = c', true)).toEqual(['"a = b"', "= c"]);
		expect(splitLiteral('"a ; b" ; c', false)).toEqual(['"a ; b"', "; c"]);
	});

	it("respects escaped quotes", () => {
		expect(splitLiteral('"a\\" = b" = c', true)).toEqual(['"a\\" = b"', "= c"]);
	});

	it("keeps trailing characters attached to quoted literals", () => {
		expect(splitLiteral('"a"b = c', true)).toEqual(['"a"b', "= c"]);
	});

	it("takes everything when a quote is unclosed", () => {
		expect(splitLiteral('"abc ; def', false)).toEqual(['"abc ; def', ""]);
	});
});

describe("decodeLiteral", () => {
	it("returns unquoted literals as they are", () => {
		expect(decodeLiteral("plain text")).toEqual({ content: "plain text" });
	});

	it("decodes escapes", () => {
		expect(decodeLiteral('"a\\nb\\tc\\rd\\"e\\\\f"')).toEqual({ content: 'a\nb\tc\rd"e\\f' });
	});

	it("decodes code point escapes", () => {
		expect(decodeLiteral('"\\{1F600}\\{41}"')).toEqual({ content: "😀A" });
	});

	it("reports the first invalid escape", () => {
		expect(decodeLiteral('"\\q\\z"')).toEqual({ content: "", error: "invalid escape code: \\q" });
	});

	it("rejects code points outside Unicode scalar values", () => {
		expect(decodeLiteral('"\\{D800}"').error).toBe("invalid escape code: \\{D800}");
		expect(decodeLiteral('"\\{110000}"').error).toBe("invalid escape code: \\{110000}");
		expect(decodeLiteral('"\\{}"').error).toBe("invalid escape code: \\{}");
		expect(decodeLiteral('"\\{123456789}"').error).toBe("invalid escape code: \\{123456789}");
	});

	it("reports unclosed quotes", () => {
		expect(decodeLiteral('"abc')).toEqual({ content: "", error: "unclosed quotes" });
	});

	it("reports characters after quotes", () => {
		expect(decodeLiteral('"a"b')).toEqual({ content: "", error: "characters after quotes" });
	});

	it("reports invalid UTF-8", () => {
		expect(decodeLiteral("a\udcff")).toEqual({ content: "", error: "invalid UTF-8" });
	});
});

describe("encodeLiteral", () => {
	it("leaves plain text bare", () => {
		expect(encodeLiteral("hello world")).toBe("hello world");
	});

	it("quotes text that would read differently bare", () => {
		expect(encodeLiteral("")).toBe('""');
		expect(encodeLiteral(" padded")).toBe('" padded"');
		expect(encodeLiteral("a;b")).toBe('"a;b"');
		expect(encodeLiteral("a=b")).toBe('"a=b"');
	});

	it("escapes quotes, backslashes and control characters", () => {
		expect(encodeLiteral('say "hi"')).toBe('"say \\"hi\\""');
		expect(encodeLiteral("a\\b\n")).toBe('"a\\\\b\\n"');
		expect(encodeLiteral("\u0001")).toBe('"\\{1}"');
	});

	it("decodes back to the original text", () => {
		for (const value of ["", "plain", " lead", "trail\t", 'q"uote', "semi;colon", "multi\nline", "\u007f", "😀"]) {
			expect(decodeLiteral(encodeLiteral(value)).content).toBe(value);
		}
	});
});
