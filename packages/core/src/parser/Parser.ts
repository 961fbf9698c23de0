/**
 * TinyRel - SQL Parser
 *
 * Parses tokenized SQL into a statement object.
 *
 * Supported grammar (keywords are case-insensitive):
 *
 * statement := (create_table | insert | select | update | delete
 *               | show_tables | describe | drop_table) ';'?
 *
 * create_table := CREATE TABLE identifier '(' column_def (',' column_def)* ')'
 * column_def := identifier type constraint*
 * type := INT | VARCHAR ('(' number ')')? | BOOLEAN
 * constraint := PRIMARY KEY | UNIQUE | NOT NULL | NULL
 *
 * insert := INSERT INTO identifier ('(' identifier (',' identifier)* ')')?
 *           VALUES tuple (',' tuple)*
 * tuple := '(' value (',' value)* ')'
 *
 * select := SELECT ('*' | column (',' column)*) FROM identifier join? where?
 * join := INNER? JOIN identifier ON column '=' column
 * where := WHERE column operator value
 * operator := '=' | '!=' | '<>' | '>' | '<' | '>=' | '<='
 *
 * update := UPDATE identifier SET identifier '=' value (',' identifier '=' value)* where?
 * delete := DELETE FROM identifier where?
 *
 * show_tables := SHOW TABLES
 * describe := DESCRIBE identifier
 * drop_table := DROP TABLE identifier
 *
 * value := string | integer | TRUE | FALSE | NULL | raw
 * raw := any other bare word or number, taken as text as written
 * integer := '-'? digit+  (within the safe integer range)
 *
 * A WHERE clause holds exactly one comparison; AND/OR are rejected.
 */

import { Token, Tokenizer, TokenType } from './Tokenizer';
import { ParseError } from '../errors';
import {
    ParsedStatement,
    CreateTableStatement,
    InsertStatement,
    SelectStatement,
    UpdateStatement,
    DeleteStatement,
    ShowTablesStatement,
    DescribeStatement,
    DropTableStatement,
    ColumnSpec,
    ColumnType,
    ComparisonOperator,
    WhereCondition,
    JoinClause,
    RowData,
    Value,
} from '../types';

// `<>` is accepted as a synonym of `!=`
const COMPARISON_OPERATORS = new Map<string, ComparisonOperator>([
    ['=', '='],
    ['!=', '!='],
    ['<>', '!='],
    ['>', '>'],
    ['<', '<'],
    ['>=', '>='],
    ['<=', '<='],
]);

const INTEGER_LITERAL = /^-?\d+$/;

export class Parser {
    private input: string;
    private tokens: Token[];
    private current: number;

    constructor(input: string) {
        this.input = input;
        const tokenizer = new Tokenizer(input);
        this.tokens = tokenizer.tokenize();
        this.current = 0;
    }

    /**
     * Parse the input and return a parsed statement.
     */
    parse(): ParsedStatement {
        const statement = this.parseStatement();

        if (this.check('PUNCTUATION', ';')) {
            this.advance();
        }

        if (!this.isAtEnd()) {
            throw this.error(`Unexpected token: '${this.peek().value}'`);
        }

        return statement;
    }

    private parseStatement(): ParsedStatement {
        if (this.check('KEYWORD', 'CREATE')) {
            return this.parseCreateTable();
        }
        if (this.check('KEYWORD', 'INSERT')) {
            return this.parseInsert();
        }
        if (this.check('KEYWORD', 'SELECT')) {
            return this.parseSelect();
        }
        if (this.check('KEYWORD', 'UPDATE')) {
            return this.parseUpdate();
        }
        if (this.check('KEYWORD', 'DELETE')) {
            return this.parseDelete();
        }
        if (this.check('KEYWORD', 'SHOW')) {
            return this.parseShowTables();
        }
        if (this.check('KEYWORD', 'DESCRIBE')) {
            return this.parseDescribe();
        }
        if (this.check('KEYWORD', 'DROP')) {
            return this.parseDropTable();
        }

        throw this.error(
            `Expected statement, got '${this.peek().value}'. ` +
            `Supported: CREATE TABLE, INSERT, SELECT, UPDATE, DELETE, SHOW TABLES, DESCRIBE, DROP TABLE`
        );
    }

    // ==========================================================================
    // CREATE TABLE
    // ==========================================================================

    private parseCreateTable(): CreateTableStatement {
        this.consume('KEYWORD', 'CREATE');
        this.consume('KEYWORD', 'TABLE');

        const tableName = this.consumeIdentifier();

        this.consume('PUNCTUATION', '(');
        const columns = this.parseList(() => this.parseColumnDefinition());
        this.consume('PUNCTUATION', ')');

        return {
            type: 'CREATE_TABLE',
            tableName,
            columns,
        };
    }

    private parseColumnDefinition(): ColumnSpec {
        const name = this.consumeIdentifier();
        const { type, maxLength } = this.parseColumnType();
        const column: ColumnSpec = { name, type };
        if (maxLength !== undefined) {
            column.maxLength = maxLength;
        }

        this.parseConstraints(column);
        return column;
    }

    private parseColumnType(): { type: ColumnType; maxLength?: number } {
        const token = this.peek();

        if (this.check('KEYWORD', 'INT')) {
            this.advance();
            return { type: 'INT' };
        }
        if (this.check('KEYWORD', 'BOOLEAN')) {
            this.advance();
            return { type: 'BOOLEAN' };
        }
        if (this.check('KEYWORD', 'VARCHAR')) {
            this.advance();
            if (!this.check('PUNCTUATION', '(')) {
                return { type: 'VARCHAR' };
            }
            this.advance();
            const length = this.parseInteger(this.consume('NUMBER'));
            this.consume('PUNCTUATION', ')');
            return { type: 'VARCHAR', maxLength: length };
        }

        throw this.error(`Unknown data type: '${token.value}'. Supported: INT, VARCHAR(n), BOOLEAN`);
    }

    /**
     * Parse trailing column constraints into `column`, in any order.
     */
    private parseConstraints(column: ColumnSpec): void {
        while (true) {
            if (this.check('KEYWORD', 'PRIMARY')) {
                this.advance();
                this.consume('KEYWORD', 'KEY');
                column.primaryKey = true;
            } else if (this.check('KEYWORD', 'UNIQUE')) {
                this.advance();
                column.unique = true;
            } else if (this.check('KEYWORD', 'NOT')) {
                this.advance();
                this.consume('KEYWORD', 'NULL');
                column.nullable = false;
            } else if (this.check('KEYWORD', 'NULL')) {
                this.advance();
                column.nullable = true;
            } else {
                break;
            }
        }
    }

    // ==========================================================================
    // INSERT
    // ==========================================================================

    private parseInsert(): InsertStatement {
        this.consume('KEYWORD', 'INSERT');
        this.consume('KEYWORD', 'INTO');

        const tableName = this.consumeIdentifier();

        let columns: string[] = [];
        if (this.check('PUNCTUATION', '(')) {
            this.advance();
            columns = this.parseList(() => this.consumeIdentifier());
            this.consume('PUNCTUATION', ')');
        }

        this.consume('KEYWORD', 'VALUES');

        const values = this.parseList(() => {
            this.consume('PUNCTUATION', '(');
            const tuple = this.parseList(() => this.parseValue());
            this.consume('PUNCTUATION', ')');
            return tuple;
        });

        return {
            type: 'INSERT',
            tableName,
            columns,
            values,
        };
    }

    /**
     * Parse a single literal value.
     */
    private parseValue(): Value {
        const token = this.peek();

        switch (token.type) {
            case 'NUMBER':
                if (!INTEGER_LITERAL.test(token.value)) {
                    // Not an integer: kept as raw text
                    this.advance();
                    return token.value;
                }
                return this.parseInteger(this.advance());
            case 'STRING':
                this.advance();
                return token.value;
            case 'BOOLEAN':
                this.advance();
                return token.value === 'TRUE';
            case 'IDENTIFIER':
                // Bare words are taken as raw text
                this.advance();
                return token.value;
            case 'KEYWORD':
                this.advance();
                if (token.value === 'NULL') {
                    return null;
                }
                // Keywords are raw text too, as written
                return this.input.slice(token.position, token.position + token.value.length);
        }

        throw this.error(`Expected value, got '${token.value}'`);
    }

    private parseInteger(token: Token): number {
        const value = parseInt(token.value, 10);
        if (!INTEGER_LITERAL.test(token.value)) {
            throw new ParseError(`Expected integer, got '${token.value}'`, token.value, token.line, token.column);
        }
        if (!Number.isSafeInteger(value)) {
            throw new ParseError(`Integer out of range: '${token.value}'`, token.value, token.line, token.column);
        }
        return value;
    }

    // ==========================================================================
    // SELECT
    // ==========================================================================

    private parseSelect(): SelectStatement {
        this.consume('KEYWORD', 'SELECT');

        let columns: string[] | '*';
        if (this.check('STAR')) {
            this.advance();
            columns = '*';
        } else {
            columns = this.parseList(() => this.parseColumnReference());
        }

        this.consume('KEYWORD', 'FROM');
        const tableName = this.consumeIdentifier();

        const statement: SelectStatement = {
            type: 'SELECT',
            columns,
            tableName,
        };

        if (this.check('KEYWORD', 'INNER') || this.check('KEYWORD', 'JOIN')) {
            statement.join = this.parseJoinClause();
        }

        if (this.check('KEYWORD', 'WHERE')) {
            statement.where = this.parseWhereClause();
        }

        return statement;
    }

    /**
     * Parse a column reference (may include table.column format).
     */
    private parseColumnReference(): string {
        let name = this.consumeIdentifier();

        if (this.check('PUNCTUATION', '.')) {
            this.advance();
            const column = this.consumeIdentifier();
            name = `${name}.${column}`;
        }

        return name;
    }

    private parseJoinClause(): JoinClause {
        if (this.check('KEYWORD', 'INNER')) {
            this.advance();
        }
        this.consume('KEYWORD', 'JOIN');

        const table = this.consumeIdentifier();

        this.consume('KEYWORD', 'ON');

        const leftColumn = this.parseColumnReference();
        this.consume('OPERATOR', '=');
        const rightColumn = this.parseColumnReference();

        return {
            type: 'INNER',
            table,
            leftColumn,
            rightColumn,
        };
    }

    private parseWhereClause(): WhereCondition {
        this.consume('KEYWORD', 'WHERE');

        const column = this.parseColumnReference();
        const operator = this.parseOperator();
        const value = this.parseValue();

        if (this.check('KEYWORD', 'AND') || this.check('KEYWORD', 'OR')) {
            throw this.error('Compound conditions (AND/OR) are not supported');
        }

        return { column, operator, value };
    }

    private parseOperator(): ComparisonOperator {
        const token = this.consume('OPERATOR');
        const operator = COMPARISON_OPERATORS.get(token.value);
        if (!operator) {
            throw new ParseError(
                `Unsupported operator '${token.value}'`,
                token.value,
                token.line,
                token.column
            );
        }
        return operator;
    }

    // ==========================================================================
    // UPDATE / DELETE
    // ==========================================================================

    private parseUpdate(): UpdateStatement {
        this.consume('KEYWORD', 'UPDATE');

        const tableName = this.consumeIdentifier();

        this.consume('KEYWORD', 'SET');
        const set: RowData = Object.fromEntries(
            this.parseList(() => this.parseAssignment()).map(({ column, value }): [string, Value] => [column, value])
        );

        const statement: UpdateStatement = {
            type: 'UPDATE',
            tableName,
            set,
        };

        if (this.check('KEYWORD', 'WHERE')) {
            statement.where = this.parseWhereClause();
        }

        return statement;
    }

    private parseAssignment(): { column: string; value: Value } {
        const column = this.consumeIdentifier();
        this.consume('OPERATOR', '=');
        const value = this.parseValue();
        return { column, value };
    }

    private parseDelete(): DeleteStatement {
        this.consume('KEYWORD', 'DELETE');
        this.consume('KEYWORD', 'FROM');

        const tableName = this.consumeIdentifier();

        const statement: DeleteStatement = {
            type: 'DELETE',
            tableName,
        };

        if (this.check('KEYWORD', 'WHERE')) {
            statement.where = this.parseWhereClause();
        }

        return statement;
    }

    // ==========================================================================
    // INTROSPECTION
    // ==========================================================================

    private parseShowTables(): ShowTablesStatement {
        this.consume('KEYWORD', 'SHOW');
        this.consume('KEYWORD', 'TABLES');

        return { type: 'SHOW_TABLES' };
    }

    private parseDescribe(): DescribeStatement {
        this.consume('KEYWORD', 'DESCRIBE');
        const tableName = this.consumeIdentifier();

        return {
            type: 'DESCRIBE',
            tableName,
        };
    }

    private parseDropTable(): DropTableStatement {
        this.consume('KEYWORD', 'DROP');
        this.consume('KEYWORD', 'TABLE');
        const tableName = this.consumeIdentifier();

        return {
            type: 'DROP_TABLE',
            tableName,
        };
    }

    // ==========================================================================
    // HELPER METHODS
    // ==========================================================================

    /**
     * Parse one or more comma-separated items.
     */
    private parseList<T>(parseItem: () => T): T[] {
        const items: T[] = [parseItem()];

        while (this.check('PUNCTUATION', ',')) {
            this.advance();
            items.push(parseItem());
        }

        return items;
    }

    private peek(): Token {
        return this.tokens[this.current];
    }

    private isAtEnd(): boolean {
        return this.peek().type === 'EOF';
    }

    private advance(): Token {
        if (!this.isAtEnd()) {
            this.current++;
        }
        return this.tokens[this.current - 1];
    }

    /**
     * Check if current token matches expected type and value.
     */
    private check(type: TokenType, value?: string): boolean {
        if (this.isAtEnd()) return false;
        const token = this.peek();
        if (token.type !== type) return false;
        if (value !== undefined && token.value !== value) return false;
        return true;
    }

    /**
     * Consume expected token or throw error.
     */
    private consume(type: TokenType, value?: string): Token {
        if (this.check(type, value)) {
            return this.advance();
        }

        const token = this.peek();
        const expected = value ? `'${value}'` : type;
        const got = token.type === 'EOF' ? 'end of input' : `'${token.value}'`;
        throw this.error(`Expected ${expected}, got ${got}`);
    }

    /**
     * Consume an identifier token. Keywords are accepted as lower-cased names.
     */
    private consumeIdentifier(): string {
        const token = this.peek();
        if (token.type === 'IDENTIFIER') {
            this.advance();
            return token.value;
        }
        if (token.type === 'KEYWORD' && token.value !== 'NULL') {
            this.advance();
            return token.value.toLowerCase();
        }
        const got = token.type === 'EOF' ? 'end of input' : `'${token.value}'`;
        throw this.error(`Expected identifier, got ${got}`);
    }

    /**
     * Create a parse error pointing at the current token.
     */
    private error(message: string): ParseError {
        const token = this.peek();
        return new ParseError(message, token.value, token.line, token.column);
    }
}

/**
 * Parse a single SQL statement.
 */
export function parseSQL(sql: string): ParsedStatement {
    return new Parser(sql).parse();
}
