import { describe, expect, test } from 'vitest';
import { Tokenizer } from './Tokenizer';
import { ParseError } from '../errors';

function types(sql: string): string[] {
    return new Tokenizer(sql).tokenize().map(token => `${token.type}:${token.value}`);
}

describe('Tokenizer', () => {
    test('recognizes keywords case-insensitively and keeps identifier case', () => {
        expect(types('select Name from Users')).toEqual([
            'KEYWORD:SELECT',
            'IDENTIFIER:Name',
            'KEYWORD:FROM',
            'IDENTIFIER:Users',
            'EOF:',
        ]);
    });

    test('reads TRUE and FALSE as booleans', () => {
        expect(types('true False')).toEqual(['BOOLEAN:TRUE', 'BOOLEAN:FALSE', 'EOF:']);
    });

    test('reads strings with doubled-quote escapes', () => {
        expect(types(`'it''s' "say ""hi"""`)).toEqual(['STRING:it\'s', 'STRING:say "hi"', 'EOF:']);
    });

    test('reads negative numbers', () => {
        expect(types('x > -12')).toEqual(['IDENTIFIER:x', 'OPERATOR:>', 'NUMBER:-12', 'EOF:']);
    });

    test('keeps a fractional part in the number', () => {
        expect(types('3.5 1.')).toEqual(['NUMBER:3.5', 'NUMBER:1', 'PUNCTUATION:.', 'EOF:']);
    });

    test('reads two-character operators', () => {
        expect(types('<= >= <> != < > =')).toEqual([
            'OPERATOR:<=',
            'OPERATOR:>=',
            'OPERATOR:<>',
            'OPERATOR:!=',
            'OPERATOR:<',
            'OPERATOR:>',
            'OPERATOR:=',
            'EOF:',
        ]);
    });

    test('skips line comments', () => {
        expect(types('SHOW -- everything\nTABLES')).toEqual(['KEYWORD:SHOW', 'KEYWORD:TABLES', 'EOF:']);
    });

    test('records where each token starts', () => {
        const tokens = new Tokenizer('SELECT *\n  FROM t').tokenize();
        expect(tokens[2]).toEqual({ type: 'KEYWORD', value: 'FROM', position: 11, line: 2, column: 3 });
    });

    test('rejects an unterminated string', () => {
        expect(() => new Tokenizer("SELECT 'abc").tokenize())
            .toThrow('Parse error at line 1, column 8: Unterminated string');
    });

    test('rejects unknown characters', () => {
        expect(() => new Tokenizer('SELECT #').tokenize()).toThrow(ParseError);
        expect(() => new Tokenizer('a ! b').tokenize()).toThrow("Unknown operator '!'");
    });
});
