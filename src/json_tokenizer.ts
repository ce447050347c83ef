/**
 * JSON tokenizer (RFC 8259)
 *
 * Turns JSON text into a value tree through a host's builder operations and
 * reports failures as data: `{ ok: false, kind, error: { message, offset } }`,
 * where `offset` is the UTF-16 index of the offending code unit (or the text
 * length for premature end of input). `kind` is 'depth' when well-formed text
 * nests deeper than the limit, 'syntax' otherwise.
 */

import { ValueBuilder } from './value_model';

export interface ParseError {
    message: string;
    offset: number;
}

export type ParseOutcome<V> =
    | { ok: true; value: V }
    | { ok: false; kind: ParseFailureKind; error: ParseError };

export type ParseFailureKind = 'syntax' | 'depth';

export interface TokenizerLimits {
    maxDepth: number;
}

const NUMBER = /-?(?:0|[1-9]\d*)(?:\.\d+)?(?:[eE][+-]?\d+)?/y;

const SIMPLE_ESCAPES: Record<string, string> = {
    '"': '"',
    '\\': '\\',
    '/': '/',
    b: '\b',
    f: '\f',
    n: '\n',
    r: '\r',
    t: '\t',
};

// Raised inside the tokenizer only; parseText converts it into a ParseOutcome.
class ParseFailure extends Error {
    constructor(message: string, public readonly offset: number, public readonly kind: ParseFailureKind = 'syntax') {
        super(message);
        this.name = 'ParseFailure';
    }
}

function isWhitespace(code: number): boolean {
    return code === 0x20 || code === 0x09 || code === 0x0a || code === 0x0d;
}

function isDigit(code: number): boolean {
    return code >= 0x30 && code <= 0x39;
}

class Tokenizer<V> {
    private pos = 0;
    private depth = 0;

    constructor(
        private readonly text: string,
        private readonly builder: ValueBuilder<V>,
        private readonly maxDepth: number
    ) {}

    parseDocument(): V {
        this.skipWhitespace();
        const value = this.parseValue();
        this.skipWhitespace();
        if (this.pos < this.text.length) {
            this.fail('Unexpected non-whitespace character after JSON');
        }
        return value;
    }

    private parseValue(): V {
        if (this.pos >= this.text.length) this.fail('Unexpected end of JSON input');

        const code = this.text.charCodeAt(this.pos);
        switch (code) {
            case 0x7b: return this.parseObject();     // {
            case 0x5b: return this.parseArray();      // [
            case 0x22: return this.builder.stringValue(this.parseString());
            case 0x74: return this.parseLiteral('true', this.builder.booleanValue(true));
            case 0x66: return this.parseLiteral('false', this.builder.booleanValue(false));
            case 0x6e: return this.parseLiteral('null', this.builder.nullValue());
            default:
                if (code === 0x2d || isDigit(code)) return this.parseNumber();
                return this.unexpected();
        }
    }

    private parseObject(): V {
        this.enter();
        this.pos++;
        const target = this.builder.createObject();

        this.skipWhitespace();
        if (this.peek() === 0x7d) {
            this.pos++;
            this.depth--;
            return target;
        }

        for (;;) {
            this.skipWhitespace();
            if (this.peek() !== 0x22) {
                if (this.pos >= this.text.length) this.fail('Unexpected end of JSON input');
                this.fail('Expected double-quoted property name');
            }
            const key = this.parseString();

            this.skipWhitespace();
            if (this.peek() !== 0x3a) this.expected("':' after property name");
            this.pos++;

            this.skipWhitespace();
            this.builder.defineProperty(target, key, this.parseValue());

            this.skipWhitespace();
            const next = this.peek();
            if (next === 0x2c) {
                this.pos++;
                continue;
            }
            if (next === 0x7d) {
                this.pos++;
                break;
            }
            this.expected("',' or '}' after property value");
        }

        this.depth--;
        return target;
    }

    private parseArray(): V {
        this.enter();
        this.pos++;
        const target = this.builder.createArray();

        this.skipWhitespace();
        if (this.peek() === 0x5d) {
            this.pos++;
            this.depth--;
            return target;
        }

        for (let index = 0; ; index++) {
            this.skipWhitespace();
            this.builder.defineProperty(target, String(index), this.parseValue());

            this.skipWhitespace();
            const next = this.peek();
            if (next === 0x2c) {
                this.pos++;
                continue;
            }
            if (next === 0x5d) {
                this.pos++;
                break;
            }
            this.expected("',' or ']' after array element");
        }

        this.depth--;
        return target;
    }

    /** Reads a string literal starting at the opening quote; leaves `pos` after the closing quote. */
    private parseString(): string {
        const text = this.text;
        this.pos++;
        let out = '';
        let runStart = this.pos;

        while (this.pos < text.length) {
            const code = text.charCodeAt(this.pos);
            if (code === 0x22) {
                out += text.slice(runStart, this.pos);
                this.pos++;
                return out;
            }
            if (code < 0x20) {
                this.fail('Bad control character in string literal');
            }
            if (code !== 0x5c) {
                this.pos++;
                continue;
            }

            out += text.slice(runStart, this.pos);
            const escapeAt = this.pos;
            if (this.pos + 1 >= text.length) {
                this.pos = text.length;
                break;
            }
            const marker = text[this.pos + 1];
            if (marker === 'u') {
                const hex = text.slice(this.pos + 2, this.pos + 6);
                if (!/^[0-9a-fA-F]{4}$/.test(hex)) {
                    this.pos = escapeAt;
                    this.fail('Bad Unicode escape');
                }
                out += String.fromCharCode(parseInt(hex, 16));
                this.pos += 6;
            } else {
                const replacement = SIMPLE_ESCAPES[marker];
                if (replacement === undefined) {
                    this.pos = escapeAt;
                    this.fail('Bad escaped character');
                }
                out += replacement;
                this.pos += 2;
            }
            runStart = this.pos;
        }

        this.fail('Unterminated string in JSON');
    }

    private parseNumber(): V {
        NUMBER.lastIndex = this.pos;
        const match = NUMBER.exec(this.text);
        if (match === null) {
            // A lone '-' or a '-' followed by a non-digit
            this.pos++;
            if (this.pos >= this.text.length) this.fail('No number after minus sign');
            this.unexpected();
        }
        this.pos += match[0].length;
        return this.builder.numberValue(Number(match[0]));
    }

    private parseLiteral(word: string, value: V): V {
        if (!this.text.startsWith(word, this.pos)) {
            // Point at the first code unit that diverges
            let i = 0;
            while (i < word.length && this.text.charCodeAt(this.pos + i) === word.charCodeAt(i)) i++;
            this.pos += i;
            if (this.pos >= this.text.length) this.fail('Unexpected end of JSON input');
            this.unexpected();
        }
        this.pos += word.length;
        return value;
    }

    private enter(): void {
        this.depth++;
        if (this.depth > this.maxDepth) {
            throw new ParseFailure(`Maximum nesting depth ${this.maxDepth} exceeded`, this.pos, 'depth');
        }
    }

    private skipWhitespace(): void {
        while (this.pos < this.text.length && isWhitespace(this.text.charCodeAt(this.pos))) {
            this.pos++;
        }
    }

    private peek(): number {
        return this.pos < this.text.length ? this.text.charCodeAt(this.pos) : -1;
    }

    private expected(what: string): never {
        if (this.pos >= this.text.length) this.fail('Unexpected end of JSON input');
        this.fail(`Expected ${what}`);
    }

    private unexpected(): never {
        const ch = this.text[this.pos];
        this.fail(`Unexpected token '${ch}'`);
    }

    private fail(message: string): never {
        throw new ParseFailure(message, this.pos);
    }
}

export function parseText<V>(text: string, builder: ValueBuilder<V>, limits: TokenizerLimits): ParseOutcome<V> {
    const tokenizer = new Tokenizer(text, builder, limits.maxDepth);
    try {
        return { ok: true, value: tokenizer.parseDocument() };
    } catch (err) {
        if (err instanceof ParseFailure) {
            return { ok: false, kind: err.kind, error: { message: err.message, offset: err.offset } };
        }
        throw err;
    }
}
