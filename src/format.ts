/**
 * @file format.ts
 * @description Output formatting through FormatValues.
 */

import { Element, mkExpr } from './types';
import { rootSymbol } from './structural';
import { tryRules } from './rules';
import { MatchOptions } from './matcher';
import { EvaluationContext, currentContext } from './context';
import { evaluate } from './evaluator';
import { printElement } from './utils';

/**
 * Rewrites `expr` with the FormatValues of its symbols, innermost parts
 * first. Each part is rewritten at most once; the result is not evaluated.
 */
export function applyFormatValues(expr: Element, context: EvaluationContext = currentContext()): Element {
    const options: MatchOptions = { context, evaluate: e => evaluate(e, context) };
    const visit = (element: Element): Element => {
        switch (element.tag) {
            case 'Atom':
                return element;
            case 'Symbol':
                return tryRules(context.getValues('FormatValues', element), element, options).result;
            case 'Expr': {
                const tail = element.tail.map(visit);
                const rebuilt = tail.every((arg, i) => arg === element.tail[i])
                    ? element
                    : mkExpr(element.head, tail, element.attributes);
                return tryRules(context.getValues('FormatValues', rootSymbol(rebuilt.head)), rebuilt, options).result;
            }
            default:
                const exhaustiveCheck: never = element;
                throw new Error(`applyFormatValues: Unhandled element: ${JSON.stringify(exhaustiveCheck)}`);
        }
    };
    return visit(expr);
}

/** The FullForm text of `expr` after FormatValues are applied. */
export function formatElement(expr: Element, context: EvaluationContext = currentContext()): string {
    return printElement(applyFormatValues(expr, context));
}
