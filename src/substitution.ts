/**
 * @file substitution.ts
 * @description Replacing pattern variables by their bound values.
 */

import { Element, Expr, hasHead, isHead, mkExpr } from './types';
import { SYS } from './symbols';
import { Bindings } from './bindings';
import { ConstructionError } from './errors';
import { printElement } from './utils';

/**
 * Replaces every symbol bound in `bindings` with its value, recursively.
 * A value of the form `Sequence[...]` that lands in an argument position is
 * spliced into the enclosing argument list. The transform never evaluates,
 * and returns the very same element when nothing was replaced.
 * @throws ConstructionError if a head would be replaced by an atom.
 */
export function substitute(element: Element, bindings: Bindings): Element {
    if (bindings.isEmpty()) return element;
    return substituteIn(element, bindings);
}

function substituteIn(element: Element, bindings: Bindings): Element {
    switch (element.tag) {
        case 'Atom': return element;
        case 'Symbol': return bindings.get(element) ?? element;
        case 'Expr': return substituteExpr(element, bindings);
    }
}

function substituteExpr(expr: Expr, bindings: Bindings): Expr {
    const head = substituteIn(expr.head, bindings);
    if (!isHead(head)) {
        throw new ConstructionError(`Substitution would put atom ${printElement(head)} in head position of ${printElement(expr)}`);
    }
    let changed = head !== expr.head;
    const tail: Element[] = [];
    for (const arg of expr.tail) {
        const replaced = substituteIn(arg, bindings);
        if (replaced === arg) {
            tail.push(arg);
            continue;
        }
        changed = true;
        if (hasHead(replaced, SYS.Sequence)) {
            tail.push(...replaced.tail);
        } else {
            tail.push(replaced);
        }
    }
    return changed ? mkExpr(head, tail, expr.attributes) : expr;
}
