import { INT_MAX, KEYWORDS, SYMBOLS } from "./Constants";
import { LexError } from "./Errors";
import type { Token } from "./Token";

const isDigit = (c: string) => c >= "0" && c <= "9";
const isLetter = (c: string) => (c >= "a" && c <= "z") || (c >= "A" && c <= "Z");
const isWordChar = (c: string) => isLetter(c) || isDigit(c) || c === "_";
const isWhitespace = (c: string) => c === " " || c === "\t" || c === "\r" || c === "\n";

/**
 * Splits SQL text into tokens in a single left-to-right pass.
 * Positions are code point offsets into `input`.
 */
export function lex(input: string): Token[] {
    // Iterate by code point so positions line up with what a user sees.
    const chars = Array.from(input);
    const tokens: Token[] = [];
    let pos = 0;

    const peek = () => chars[pos] ?? "";

    while (pos < chars.length) {
        const ch = peek();

        if (isWhitespace(ch)) {
            pos++;
            continue;
        }

        if (SYMBOLS.includes(ch)) {
            tokens.push({ type: "SYMBOL", value: ch, pos });
            pos++;
            continue;
        }

        if (isDigit(ch)) {
            const start = pos;
            let digits = "";
            while (pos < chars.length && isDigit(peek())) {
                digits += peek();
                pos++;
            }
            const value = BigInt(digits);
            if (value > INT_MAX) throw new LexError(`Invalid number at position ${start}`);
            tokens.push({ type: "NUMBER", value, pos: start });
            continue;
        }

        if (ch === "'") {
            const start = pos;
            pos++; // opening quote
            let text = "";
            let closed = false;
            while (pos < chars.length) {
                const c = peek();
                pos++;
                if (c === "'") {
                    closed = true;
                    break;
                }
                text += c;
            }
            if (!closed) throw new LexError(`Unterminated string starting at position ${start}`);
            tokens.push({ type: "STRING", value: text, pos: start });
            continue;
        }

        if (isLetter(ch)) {
            const start = pos;
            let word = "";
            while (pos < chars.length && isWordChar(peek())) {
                word += peek();
                pos++;
            }
            const upper = word.toUpperCase();
            if (KEYWORDS.includes(upper)) {
                tokens.push({ type: "KEYWORD", value: upper, pos: start });
            } else {
                tokens.push({ type: "IDENTIFIER", value: word, pos: start });
            }
            continue;
        }

        throw new LexError(`Unexpected character '${ch}' at position ${pos}`);
    }

    return tokens;
}
