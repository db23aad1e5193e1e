/**
 * @file pattern.ts
 * @description Pattern constructs. Patterns are ordinary expressions with
 * reserved heads (`Blank[]`, `Pattern[x, Blank[]]`, ...); this module builds
 * them and answers structural questions about them. Matching lives in
 * matcher.ts.
 */

import { Element, Expr, Sym, ElementLike, hasHead, mkExpr, toElement } from './types';
import { SYS } from './symbols';
import { ConstructionError } from './errors';

// Narrowed shapes. The tuple types keep a failed predicate from narrowing
// away `Expr` as a whole.
export type BlankExpr = Expr & { readonly tail: readonly [] | readonly [Element] };
export type UnaryExpr = Expr & { readonly tail: readonly [Element] };
export type BinaryExpr = Expr & { readonly tail: readonly [Element, Element] };
export type UnaryOrBinaryExpr = Expr & { readonly tail: readonly [Element] | readonly [Element, Element] };
export type NamedPatternExpr = Expr & { readonly tail: readonly [Sym, Element] };

// Blank family

function blankOf(head: Sym, constraint?: Sym): Expr {
    if (constraint !== undefined && (typeof constraint !== 'object' || constraint.tag !== 'Symbol')) {
        throw new ConstructionError(`${head.name} head constraint must be a symbol`);
    }
    return mkExpr(head, constraint ? [constraint] : []);
}

/** `Blank[]` or `Blank[h]`: exactly one element, optionally with head `h`. */
export const Blank = (head?: Sym): Expr => blankOf(SYS.Blank, head);
/** `BlankSequence[]`: one or more elements. */
export const BlankSequence = (head?: Sym): Expr => blankOf(SYS.BlankSequence, head);
/** `BlankNullSequence[]`: zero or more elements. */
export const BlankNullSequence = (head?: Sym): Expr => blankOf(SYS.BlankNullSequence, head);

const BLANK_HEADS: readonly Sym[] = [SYS.Blank, SYS.BlankSequence, SYS.BlankNullSequence];

/** Any member of the Blank family with at most one (constraint) argument. */
export function isBlank(e: Element): e is BlankExpr {
    return e.tag === 'Expr' && e.tail.length <= 1 && BLANK_HEADS.some(h => hasHead(e, h));
}

export function isSingleBlank(e: Element): e is BlankExpr {
    return isBlank(e) && hasHead(e, SYS.Blank);
}

export function isSequenceBlank(e: Element): e is BlankExpr {
    return isBlank(e) && !hasHead(e, SYS.Blank);
}

/** The head a blank requires of the elements it matches, if any. */
export function blankHeadConstraint(blank: Expr): Element | undefined {
    return blank.tail.length === 1 ? blank.tail[0] : undefined;
}

// Structural constructs

/** `Pattern[name, inner]`; `inner` defaults to `Blank[]`. */
export function Pattern(name: Sym, inner: Element = Blank()): Expr {
    if (typeof name !== 'object' || name.tag !== 'Symbol') {
        throw new ConstructionError('Pattern name must be a symbol');
    }
    return mkExpr(SYS.Pattern, [name, inner]);
}

export const Condition = (pattern: Element, test: Element): Expr => mkExpr(SYS.Condition, [pattern, test]);

export function Alternatives(...patterns: ElementLike[]): Expr {
    if (patterns.length < 2) {
        throw new ConstructionError('Alternatives requires at least two patterns');
    }
    return mkExpr(SYS.Alternatives, patterns);
}

export const PatternTest = (pattern: Element, test: Element): Expr => mkExpr(SYS.PatternTest, [pattern, test]);

/** `Optional[p, default]`, or `Optional[p]` to fall back on the head's default value. */
export const Optional = (pattern: Element, defaultValue?: ElementLike): Expr =>
    mkExpr(SYS.Optional, defaultValue === undefined ? [pattern] : [pattern, toElement(defaultValue)]);

export const Repeated = (pattern: Element): Expr => mkExpr(SYS.Repeated, [pattern]);
export const RepeatedNull = (pattern: Element): Expr => mkExpr(SYS.RepeatedNull, [pattern]);

export const Except = (excluded: Element, alternative?: Element): Expr =>
    mkExpr(SYS.Except, alternative === undefined ? [excluded] : [excluded, alternative]);

export const Verbatim = (literal: ElementLike): Expr => mkExpr(SYS.Verbatim, [literal]);
export const HoldPattern = (pattern: Element): Expr => mkExpr(SYS.HoldPattern, [pattern]);

// Shape predicates. Each checks the arity as well as the head, so a reserved
// head used with the wrong number of arguments is matched literally.

export function isNamedPattern(e: Element): e is NamedPatternExpr {
    return hasHead(e, SYS.Pattern) && e.tail.length === 2 && e.tail[0].tag === 'Symbol';
}

export function patternName(e: Element): Sym | undefined {
    return isNamedPattern(e) ? e.tail[0] : undefined;
}

export const isCondition = (e: Element): e is BinaryExpr => hasHead(e, SYS.Condition) && e.tail.length === 2;
export const isAlternatives = (e: Element): e is Expr & { readonly tail: readonly [Element, ...Element[]] } => hasHead(e, SYS.Alternatives) && e.tail.length >= 1;
export const isPatternTest = (e: Element): e is BinaryExpr => hasHead(e, SYS.PatternTest) && e.tail.length === 2;
export const isOptional = (e: Element): e is UnaryOrBinaryExpr => hasHead(e, SYS.Optional) && (e.tail.length === 1 || e.tail.length === 2);
export const isExcept = (e: Element): e is UnaryOrBinaryExpr => hasHead(e, SYS.Except) && (e.tail.length === 1 || e.tail.length === 2);
export const isVerbatim = (e: Element): e is UnaryExpr => hasHead(e, SYS.Verbatim) && e.tail.length === 1;
export const isHoldPattern = (e: Element): e is UnaryExpr => hasHead(e, SYS.HoldPattern) && e.tail.length === 1;
export const isRepeated = (e: Element): e is UnaryExpr =>
    (hasHead(e, SYS.Repeated) || hasHead(e, SYS.RepeatedNull)) && e.tail.length === 1;

/** The explicit default of `Optional[p, d]`. */
export function optionalDefault(e: Expr): Element | undefined {
    return e.tail.length === 2 ? e.tail[1] : undefined;
}

/** The alternative of `Except[excluded, alternative]`. */
export function exceptAlternative(e: Expr): Element | undefined {
    return e.tail.length === 2 ? e.tail[1] : undefined;
}

/** Strips any number of `HoldPattern` wrappers. */
export function unwrapHoldPattern(e: Element): Element {
    let current = e;
    while (isHoldPattern(current)) current = current.tail[0];
    return current;
}

/**
 * True if `p` stands for a run of arguments rather than a single one:
 * sequence blanks, `Repeated`, and names, conditions or `HoldPattern`
 * wrapped around those.
 */
export function isSequencePattern(p: Element): boolean {
    if (isSequenceBlank(p) || isRepeated(p)) return true;
    if (isNamedPattern(p) || isCondition(p) || isHoldPattern(p)) {
        return isSequencePattern(isNamedPattern(p) ? p.tail[1] : p.tail[0]);
    }
    return false;
}

/** Fewest arguments `p` can consume in an argument list. */
export function minSequenceLength(p: Element): number {
    if (isBlank(p)) return hasHead(p, SYS.BlankNullSequence) ? 0 : 1;
    if (isRepeated(p)) return hasHead(p, SYS.RepeatedNull) ? 0 : 1;
    if (isOptional(p)) return 0;
    if (isNamedPattern(p)) return minSequenceLength(p.tail[1]);
    if (isCondition(p) || isHoldPattern(p)) return minSequenceLength(p.tail[0]);
    return 1;
}

/** True if `e` contains any pattern construct, so it cannot be compared literally. */
export function containsPattern(e: Element): boolean {
    if (e.tag !== 'Expr') return false;
    if (isBlank(e) || isNamedPattern(e) || isCondition(e) || isAlternatives(e) || isPatternTest(e)
        || isOptional(e) || isExcept(e) || isVerbatim(e) || isRepeated(e)) {
        return true;
    }
    if (isHoldPattern(e)) return containsPattern(e.tail[0]);
    return containsPattern(e.head) || e.tail.some(containsPattern);
}

/** Pattern variable names in first-occurrence order, without duplicates. */
export function collectPatternNames(e: Element, into: Sym[] = []): Sym[] {
    if (e.tag !== 'Expr') return into;
    if (isVerbatim(e)) return into;
    const name = patternName(e);
    if (name && !into.some(s => s.name === name.name)) into.push(name);
    collectPatternNames(e.head, into);
    for (const arg of e.tail) collectPatternNames(arg, into);
    return into;
}
