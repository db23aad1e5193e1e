/**
 * @file tests/builtins_fixture.ts
 * @description A handful of small arithmetic and predicate builtins for
 * exercising the evaluator. The kernel itself ships none.
 */

import { Element, Expr, Int, Real, Sym, mkExpr } from '../src/types';
import { ATTR, SYS } from '../src/symbols';
import { isExact, toNumber } from '../src/structural';
import { BuiltinRegistry, getGlobalBuiltins } from '../src/builtins';

export const Plus = () => Sym('Plus');
export const Times = () => Sym('Times');
export const Greater = () => Sym('Greater');
export const IntegerQ = () => Sym('IntegerQ');

const ARITHMETIC_ATTRIBUTES = [ATTR.Flat, ATTR.Orderless, ATTR.OneIdentity, ATTR.Listable, ATTR.NumericFunction];

/**
 * Folds the numeric arguments with `op`. Symbolic arguments are kept after
 * the folded number; a single number among symbols is left alone.
 */
function fold(expr: Expr, identity: number, op: (a: number, b: number) => number): Element {
    if (expr.tail.length === 0) return Int(identity);
    if (expr.tail.length === 1) return expr.tail[0];
    let total = identity;
    let count = 0;
    let exact = true;
    const others: Element[] = [];
    for (const arg of expr.tail) {
        const value = toNumber(arg);
        if (value === undefined) {
            others.push(arg);
            continue;
        }
        total = op(total, value);
        count++;
        exact = exact && isExact(arg);
    }
    if (count < 2 && others.length > 0) return expr;
    const folded = exact ? Int(total) : Real(total);
    return others.length === 0 ? folded : mkExpr(expr.head, [folded, ...others]);
}

const truth = (value: boolean): Element => value ? SYS.True : SYS.False;

export function installTestBuiltins(registry: BuiltinRegistry = getGlobalBuiltins()): BuiltinRegistry {
    registry.register(Plus(), expr => fold(expr, 0, (a, b) => a + b), ARITHMETIC_ATTRIBUTES);
    registry.register(Times(), expr => fold(expr, 1, (a, b) => a * b), ARITHMETIC_ATTRIBUTES);
    registry.register(Greater(), expr => {
        if (expr.tail.length !== 2) return expr;
        const a = toNumber(expr.tail[0]);
        const b = toNumber(expr.tail[1]);
        return a === undefined || b === undefined ? expr : truth(a > b);
    });
    registry.register(IntegerQ(), expr => expr.tail.length === 1 ? truth(isExact(expr.tail[0])) : expr);
    return registry;
}
