import type { Location, Range } from '../../types/diagnostic.js';
import { LangError } from '../errors.js';
import { RESERVED_KEYWORDS, SINGLE_CHAR_TOKENS } from './tokens.js';
import type { Token, TokenType } from './tokens.js';

const ID_START = /[\p{L}_]/u;
const ID_PART = /[\p{L}\p{N}_]/u;
const DIGIT = /[0-9]/;
const WHITESPACE = /\s/;

/**
 * Pull-based tokenizer. Each call to {@link Lexer.getNextToken} scans just far enough to
 * produce one token; once the input is exhausted every further call returns EOF.
 */
export class Lexer implements Iterable<Token> {
    private readonly text: string;
    private pos = 0;
    private line = 1;
    private col = 1;

    constructor(text: string) {
        this.text = text;
    }

    getNextToken(): Token {
        while (this.pos < this.text.length) {
            const char = this.text[this.pos];

            if (WHITESPACE.test(char)) {
                this.advance();
                continue;
            }

            if (char === '{') {
                this.skipComment();
                continue;
            }

            if (ID_START.test(char)) {
                return this.identifier();
            }

            if (DIGIT.test(char)) {
                return this.number();
            }

            const start = this.location();

            // ':=' has to win over ':'
            if (char === ':' && this.peek() === '=') {
                this.advance();
                this.advance();
                return this.makeToken('ASSIGN', ':=', start);
            }

            const single = SINGLE_CHAR_TOKENS.get(char);
            if (single !== undefined) {
                this.advance();
                return this.makeToken(single, char, start);
            }

            this.advance();
            throw new LangError('InvalidCharacter', `Invalid character '${char}' at line ${start.line}, column ${start.col}`, {
                range: { start, end: this.location() }
            });
        }

        const here = this.location();
        return { kind: 'EOF', value: null, range: { start: here, end: here } };
    }

    *[Symbol.iterator](): Generator<Token, void, undefined> {
        while (true) {
            const token = this.getNextToken();
            yield token;
            if (token.kind === 'EOF') return;
        }
    }

    private location(): Location {
        return { line: this.line, col: this.col, offset: this.pos };
    }

    private peek(): string | undefined {
        return this.text[this.pos + 1];
    }

    private advance(): void {
        if (this.text[this.pos] === '\n') {
            this.line++;
            this.col = 1;
        } else {
            this.col++;
        }
        this.pos++;
    }

    private skipComment(): void {
        const start = this.location();
        this.advance(); // '{'
        while (this.pos < this.text.length && this.text[this.pos] !== '}') {
            this.advance();
        }
        if (this.pos >= this.text.length) {
            throw new LangError('UnterminatedComment', `Comment opened at line ${start.line}, column ${start.col} is never closed`, {
                range: { start, end: this.location() }
            });
        }
        this.advance(); // '}'
    }

    private identifier(): Token {
        const start = this.location();
        let value = '';
        while (this.pos < this.text.length && ID_PART.test(this.text[this.pos])) {
            value += this.text[this.pos];
            this.advance();
        }
        value = value.toUpperCase();
        const keyword = RESERVED_KEYWORDS.get(value);
        return this.makeToken(keyword ?? 'ID', value, start);
    }

    private number(): Token {
        const start = this.location();
        let value = this.digits();

        // A trailing '.' belongs to the number even without fraction digits: "3." is 3.0
        if (this.text[this.pos] === '.') {
            value += '.';
            this.advance();
            value += this.digits();
            return this.makeToken('REAL_CONST', Number.parseFloat(value), start);
        }

        return this.makeToken('INTEGER_CONST', BigInt(value), start);
    }

    private digits(): string {
        let value = '';
        while (this.pos < this.text.length && DIGIT.test(this.text[this.pos])) {
            value += this.text[this.pos];
            this.advance();
        }
        return value;
    }

    private makeToken(kind: TokenType, value: number | bigint | string, start: Location): Token {
        const range: Range = { start, end: this.location() };
        return { kind, value, range };
    }
}

export function tokenize(input: string): Token[] {
    return Array.from(new Lexer(input));
}
