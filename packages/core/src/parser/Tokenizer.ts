/**
 * TinyRel - SQL Tokenizer
 *
 * Converts raw SQL input into a stream of tokens for parsing.
 *
 * Design decisions:
 * - Hand-written scanner, one character of lookahead
 * - Strings in single or double quotes; a doubled quote escapes itself
 * - Case-insensitive keywords
 * - Every token records the line/column where it starts
 */

import { ParseError } from '../errors';

export type TokenType =
    | 'KEYWORD'
    | 'IDENTIFIER'
    | 'NUMBER'
    | 'STRING'
    | 'BOOLEAN'
    | 'OPERATOR'
    | 'PUNCTUATION'
    | 'STAR'
    | 'EOF';

export interface Token {
    type: TokenType;
    value: string;
    position: number;
    line: number;
    column: number;
}

// SQL keywords we recognize
const KEYWORDS = new Set([
    'CREATE', 'TABLE', 'INSERT', 'INTO', 'VALUES', 'SELECT', 'FROM',
    'WHERE', 'UPDATE', 'SET', 'DELETE', 'INNER', 'JOIN', 'ON',
    'INT', 'VARCHAR', 'BOOLEAN', 'PRIMARY', 'KEY', 'UNIQUE', 'AND', 'OR',
    'NULL', 'NOT', 'SHOW', 'TABLES', 'DESCRIBE', 'DROP',
]);

const OPERATORS = new Set(['=', '<', '>', '<=', '>=', '<>', '!=']);

const PUNCTUATION = new Set(['(', ')', ',', ';', '.']);

export class Tokenizer {
    private input: string;
    private position: number;
    private line: number;
    private column: number;
    private tokens: Token[];

    constructor(input: string) {
        this.input = input;
        this.position = 0;
        this.line = 1;
        this.column = 1;
        this.tokens = [];
    }

    /**
     * Tokenize the entire input. The last token is always EOF.
     */
    tokenize(): Token[] {
        while (this.position < this.input.length) {
            this.skipWhitespace();

            if (this.position >= this.input.length) {
                break;
            }

            const char = this.input[this.position];

            if (char === '-' && this.peek(1) === '-') {
                this.skipLineComment();
                continue;
            }

            if (char === "'" || char === '"') {
                this.readString(char);
                continue;
            }

            // Numbers (including negative)
            if (this.isDigit(char) || (char === '-' && this.isDigit(this.peek(1) ?? ''))) {
                this.readNumber();
                continue;
            }

            if (this.isAlpha(char) || char === '_') {
                this.readIdentifier();
                continue;
            }

            if (char === '*') {
                this.addToken('STAR', '*', this.mark());
                this.advance();
                continue;
            }

            if (char === '<' || char === '>' || char === '!') {
                this.readOperator();
                continue;
            }

            if (OPERATORS.has(char)) {
                this.addToken('OPERATOR', char, this.mark());
                this.advance();
                continue;
            }

            if (PUNCTUATION.has(char)) {
                this.addToken('PUNCTUATION', char, this.mark());
                this.advance();
                continue;
            }

            throw new ParseError(`Unexpected character '${char}'`, char, this.line, this.column);
        }

        this.addToken('EOF', '', this.mark());
        return this.tokens;
    }

    private peek(offset: number = 0): string | undefined {
        return this.input[this.position + offset];
    }

    /**
     * Advance the position and update line/column tracking.
     */
    private advance(): string {
        const char = this.input[this.position];
        this.position++;

        if (char === '\n') {
            this.line++;
            this.column = 1;
        } else {
            this.column++;
        }

        return char;
    }

    private mark(): Omit<Token, 'type' | 'value'> {
        return { position: this.position, line: this.line, column: this.column };
    }

    private addToken(type: TokenType, value: string, start: Omit<Token, 'type' | 'value'>): void {
        this.tokens.push({ type, value, ...start });
    }

    private skipWhitespace(): void {
        while (this.position < this.input.length) {
            const char = this.input[this.position];
            if (char === ' ' || char === '\t' || char === '\n' || char === '\r') {
                this.advance();
            } else {
                break;
            }
        }
    }

    private skipLineComment(): void {
        while (this.position < this.input.length && this.input[this.position] !== '\n') {
            this.advance();
        }
    }

    private isDigit(char: string): boolean {
        return char >= '0' && char <= '9';
    }

    private isAlpha(char: string): boolean {
        return (char >= 'a' && char <= 'z') || (char >= 'A' && char <= 'Z');
    }

    private isAlphaNumeric(char: string): boolean {
        return this.isAlpha(char) || this.isDigit(char) || char === '_';
    }

    /**
     * Read a string literal delimited by `quote`.
     */
    private readString(quote: string): void {
        const start = this.mark();

        this.advance(); // opening quote

        let value = '';
        while (this.position < this.input.length) {
            const char = this.input[this.position];

            if (char === quote) {
                if (this.peek(1) === quote) {
                    value += quote;
                    this.advance();
                    this.advance();
                } else {
                    this.advance(); // closing quote
                    this.addToken('STRING', value, start);
                    return;
                }
            } else {
                value += this.advance();
            }
        }

        throw new ParseError(
            'Unterminated string',
            this.input.slice(start.position),
            start.line,
            start.column
        );
    }

    private readNumber(): void {
        const start = this.mark();
        let value = '';

        if (this.input[this.position] === '-') {
            value += this.advance();
        }

        while (this.position < this.input.length && this.isDigit(this.input[this.position])) {
            value += this.advance();
        }

        // Keep a fractional part in the token
        if (this.input[this.position] === '.' && this.isDigit(this.peek(1) ?? '')) {
            value += this.advance();
            while (this.position < this.input.length && this.isDigit(this.input[this.position])) {
                value += this.advance();
            }
        }

        this.addToken('NUMBER', value, start);
    }

    private readIdentifier(): void {
        const start = this.mark();
        let value = '';

        while (
            this.position < this.input.length &&
            this.isAlphaNumeric(this.input[this.position])
        ) {
            value += this.advance();
        }

        const upperValue = value.toUpperCase();

        if (upperValue === 'TRUE' || upperValue === 'FALSE') {
            this.addToken('BOOLEAN', upperValue, start);
        } else if (KEYWORDS.has(upperValue)) {
            this.addToken('KEYWORD', upperValue, start);
        } else {
            this.addToken('IDENTIFIER', value, start);
        }
    }

    private readOperator(): void {
        const start = this.mark();
        let value = this.advance();

        const next = this.peek();
        if (next === '=' || (value === '<' && next === '>')) {
            value += this.advance();
        }

        if (!OPERATORS.has(value)) {
            throw new ParseError(`Unknown operator '${value}'`, value, start.line, start.column);
        }
        this.addToken('OPERATOR', value, start);
    }
}
