/**
 * TinyRel - WHERE predicates
 *
 * Compiles a parsed WhereCondition into a pure row predicate. Column resolution
 * happens before compilation, so the predicate only reads one known key.
 */

import { ComparisonOperator, Value, WhereCondition } from '../types';
import { SchemaError } from '../errors';
import { describeValueType } from '../schema/Schema';
import { Row } from '../storage/Row';
import { RowPredicate } from '../storage/Table';

export const MATCH_ALL: RowPredicate = () => true;

/**
 * Order two values of the same type. Numbers, strings and booleans are
 * comparable with themselves (false < true); every other pairing fails.
 */
export function compareValues(left: Value, right: Value): number {
    if (typeof left === 'number' && typeof right === 'number') {
        return left - right;
    }
    if (typeof left === 'string' && typeof right === 'string') {
        return left < right ? -1 : left > right ? 1 : 0;
    }
    if (typeof left === 'boolean' && typeof right === 'boolean') {
        return Number(left) - Number(right);
    }
    throw new SchemaError(
        `Cannot compare ${describeValueType(left)} with ${describeValueType(right)}`
    );
}

export function evaluateComparison(left: Value, operator: ComparisonOperator, right: Value): boolean {
    switch (operator) {
        case '=':
            return left === right;
        case '!=':
            return left !== right;
        case '>':
            return compareValues(left, right) > 0;
        case '<':
            return compareValues(left, right) < 0;
        case '>=':
            return compareValues(left, right) >= 0;
        case '<=':
            return compareValues(left, right) <= 0;
    }
}

/**
 * Build a predicate testing `row[column] <operator> condition.value`.
 *
 * @param column - the resolved key to read from each row; defaults to
 *   `condition.column`
 */
export function compilePredicate(condition: WhereCondition, column: string = condition.column): RowPredicate {
    const { operator, value } = condition;
    return (row: Row): boolean => evaluateComparison(row.get(column) ?? null, operator, value);
}
