/**
 * @title Patterns
 * @description Compiling schema patterns and enumerating their literals.
 *
 * @module validation
 */

const ESCAPE = /\\(.)/gs;
const ASCII_PUNCTUATION = /^[!-\/:-@\[-`{-~]$/;
const ALPHANUMERIC = /^[0-9A-Za-z]$/;
/** Characters that may be escaped in a Unicode-mode expression. */
const SYNTAX_CHARACTERS = new Set("^$\\.*+?()[]{}|/");
/** Characters that make an alternative more than a literal. */
const METACHARACTERS = new Set("^$.*+?()[]{}");

/**
 * Compile a schema pattern into an anchored expression.
 *
 * Any ASCII punctuation may be escaped, so `\<` or `\=` match literally.
 * `.` also matches newlines, which lets patterns cover multiline values.
 *
 * @throws {SyntaxError} When the pattern is not a valid expression
 */
export function compilePattern(source: string): RegExp {
	const body = source.replace(ESCAPE, (escape: string, char: string) => {
		if (!ASCII_PUNCTUATION.test(char) || SYNTAX_CHARACTERS.has(char)) {
			return escape;
		}
		return `\\u{${(char.codePointAt(0) ?? 0).toString(16)}}`;
	});
	return new RegExp(`^(?:${body})$`, "su");
}

/**
 * List the literal strings a pattern matches, if it is a plain alternation
 * like `red|green|blue`.
 *
 * @returns The literals in order, or undefined when the pattern uses
 * anything beyond escaped punctuation and `|`
 */
export function literalAlternatives(source: string): string[] | undefined {
	const alternatives: string[] = [];
	let current = "";

	for (let i = 0; i < source.length; i++) {
		const char = source[i];
		if (char === "\\") {
			if (i + 1 >= source.length || ALPHANUMERIC.test(source[i + 1])) {
				return undefined;
			}
			current += source[i + 1];
			i++;
		} else if (char === "|") {
			alternatives.push(current);
			current = "";
		} else if (METACHARACTERS.has(char)) {
			return undefined;
		} else {
			current += char;
		}
	}

	alternatives.push(current);
	return alternatives;
}

/**
 * Describe what a pattern expects, for error messages.
 * Literal alternations are listed one by one, anything else as written.
 */
export function patternCandidates(source: string): string[] {
	const literals = literalAlternatives(source);
	if (!literals) {
		return [source];
	}
	return literals.map((literal) => (literal === "" ? '""' : literal));
}
