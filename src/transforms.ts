/**
 * @file transforms.ts
 * @description Structural normalizations applied by the evaluator after
 * argument evaluation. Each returns its input unchanged (the same object)
 * when there is nothing to do.
 */

import { Element, Expr, hasHead, mkExpr } from './types';
import { SYS } from './symbols';
import { compareElements, elementsEqual } from './structural';

/** Splices top-level `Sequence[...]` arguments into the argument list. */
export function flattenSequences(expr: Expr): Expr {
    if (!expr.tail.some(arg => hasHead(arg, SYS.Sequence))) return expr;
    const tail: Element[] = [];
    for (const arg of expr.tail) {
        if (hasHead(arg, SYS.Sequence)) tail.push(...arg.tail);
        else tail.push(arg);
    }
    return mkExpr(expr.head, tail, expr.attributes);
}

/** Flattens nested arguments with the same head: `f[f[a, b], c]` becomes `f[a, b, c]`. */
export function applyFlat(expr: Expr): Expr {
    const isNested = (arg: Element): arg is Expr => arg.tag === 'Expr' && elementsEqual(arg.head, expr.head);
    if (!expr.tail.some(isNested)) return expr;
    const tail: Element[] = [];
    const collect = (args: readonly Element[]): void => {
        for (const arg of args) {
            if (isNested(arg)) collect(arg.tail);
            else tail.push(arg);
        }
    };
    collect(expr.tail);
    return mkExpr(expr.head, tail, expr.attributes);
}

/** A sorted copy of `elements` in canonical order. The sort is stable. */
export function canonicalSort(elements: readonly Element[]): Element[] {
    return [...elements].sort(compareElements);
}

/** Sorts the arguments of an Orderless expression into canonical order. */
export function applyOrderless(expr: Expr): Expr {
    const sorted = canonicalSort(expr.tail);
    return sorted.every((arg, i) => arg === expr.tail[i]) ? expr : mkExpr(expr.head, sorted, expr.attributes);
}

/**
 * Threads a Listable head over its `List[...]` arguments:
 * `f[{a, b}, c]` becomes `{f[a, c], f[b, c]}`. Non-list arguments are reused
 * in every position. Returns `expr` when no argument is a list or the lists
 * differ in length.
 */
export function applyListable(expr: Expr): Expr {
    const lists = expr.tail.filter(arg => hasHead(arg, SYS.List));
    if (lists.length === 0) return expr;
    const length = lists[0].tag === 'Expr' ? lists[0].tail.length : 0;
    if (!lists.every(list => list.tag === 'Expr' && list.tail.length === length)) return expr;

    const threaded: Expr[] = [];
    for (let i = 0; i < length; i++) {
        const args = expr.tail.map(arg => hasHead(arg, SYS.List) ? arg.tail[i] : arg);
        threaded.push(mkExpr(expr.head, args, expr.attributes));
    }
    return mkExpr(SYS.List, threaded);
}
