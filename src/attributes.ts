/**
 * @file attributes.ts
 * @description Attribute queries used by the matcher and the evaluator.
 * Attributes are plain data: looking them up never has side effects.
 */

import type { Element, Expr, Sym } from './types';
import type { EvaluationContext } from './context';
import { ATTR, SYS } from './symbols';
import { ATTRIBUTE_NAMES } from './constants';

export type AttributeSet = ReadonlySet<Sym>;

export const NO_ATTRIBUTES: AttributeSet = new Set();

const vocabulary: ReadonlySet<string> = new Set(ATTRIBUTE_NAMES);

export function isAttribute(element: Element): boolean {
    return element.tag === 'Symbol' && vocabulary.has(element.name);
}

/**
 * Attributes the global context gives to the kernel's own heads, so that
 * patterns and delayed right-hand sides survive evaluation unchanged.
 */
export const SYSTEM_ATTRIBUTES: ReadonlyArray<readonly [Sym, readonly Sym[]]> = [
    [SYS.HoldPattern, [ATTR.HoldAll, ATTR.Protected]],
    [SYS.Verbatim, [ATTR.HoldAll, ATTR.Protected]],
    [SYS.Condition, [ATTR.HoldAll, ATTR.Protected]],
    [SYS.SetDelayed, [ATTR.HoldAll, ATTR.Protected]],
    [SYS.Pattern, [ATTR.HoldFirst, ATTR.Protected]],
    [SYS.Set, [ATTR.HoldFirst, ATTR.Protected]],
    [SYS.UpSetDelayed, [ATTR.HoldAll, ATTR.Protected]],
    [SYS.UpSet, [ATTR.HoldFirst, ATTR.Protected]],
    [SYS.RuleDelayed, [ATTR.HoldRest, ATTR.Protected]],
];

export function hasAttribute(attributes: AttributeSet, attr: Sym): boolean {
    if (attributes.has(attr)) return true;
    for (const a of attributes) {
        if (a.name === attr.name) return true;
    }
    return false;
}

export function holdsFirst(attributes: AttributeSet): boolean {
    return hasAttribute(attributes, ATTR.HoldFirst) || holdsAll(attributes);
}

export function holdsRest(attributes: AttributeSet): boolean {
    return hasAttribute(attributes, ATTR.HoldRest) || holdsAll(attributes);
}

export function holdsAll(attributes: AttributeSet): boolean {
    return hasAttribute(attributes, ATTR.HoldAll) || holdsCompletely(attributes);
}

export function holdsCompletely(attributes: AttributeSet): boolean {
    return hasAttribute(attributes, ATTR.HoldAllComplete);
}

/** True if the argument at `index` is left unevaluated. */
export function isHeldPosition(attributes: AttributeSet, index: number): boolean {
    return index === 0 ? holdsFirst(attributes) : holdsRest(attributes);
}

/** True if the argument at `index` keeps its exact numbers under numeric evaluation. */
export function isNumericHeldPosition(attributes: AttributeSet, index: number): boolean {
    if (hasAttribute(attributes, ATTR.NHoldAll)) return true;
    return index === 0
        ? hasAttribute(attributes, ATTR.NHoldFirst)
        : hasAttribute(attributes, ATTR.NHoldRest);
}

/**
 * The attributes a context assigns to a symbol. Without a context a symbol
 * has no attributes.
 */
export function attributesOf(context: EvaluationContext | undefined, symbol: Sym): AttributeSet {
    return context ? context.attributesOf(symbol) : NO_ATTRIBUTES;
}

/**
 * Attributes in force for `expr`: those of its head symbol (when the head is
 * a symbol) together with the expression's own local attributes.
 */
export function effectiveAttributes(context: EvaluationContext | undefined, expr: Expr): AttributeSet {
    const fromHead = expr.head.tag === 'Symbol' ? attributesOf(context, expr.head) : NO_ATTRIBUTES;
    if (expr.attributes.length === 0) return fromHead;
    const combined = new Set(fromHead);
    for (const attr of expr.attributes) combined.add(attr);
    return combined;
}
