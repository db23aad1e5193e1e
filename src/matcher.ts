/**
 * @file matcher.ts
 * @description The pattern matcher. Matching is a backtracking search written
 * in continuation-passing style: every matching function receives the
 * bindings found so far and a continuation for "the rest of the match". A
 * branch that cannot complete returns undefined, and the caller moves on to
 * its next candidate (another alternative, another sequence length, another
 * Orderless element). A failed match is an ordinary value, never an exception.
 */

import { Element, Expr, Head, mkExpr } from './types';
import { ATTR, SYS } from './symbols';
import { Bindings } from './bindings';
import { elementsEqual, headOf, isTrue } from './structural';
import { substitute } from './substitution';
import { NO_ATTRIBUTES, attributesOf, effectiveAttributes, hasAttribute } from './attributes';
import {
    BlankExpr, blankHeadConstraint, exceptAlternative, isAlternatives, isBlank, isCondition, isExcept,
    isHoldPattern, isNamedPattern, isOptional, isPatternTest, isRepeated, isSequencePattern,
    isSingleBlank, isVerbatim, minSequenceLength, optionalDefault
} from './pattern';
import type { EvaluationContext } from './context';
import { getFlag } from './state';

export interface MatchResult {
    readonly success: boolean;
    readonly bindings: Bindings;
}

/** The result of every failed match. */
export const NO_MATCH: MatchResult = Object.freeze({ success: false, bindings: Bindings.empty() });

export interface MatchOptions {
    /** Source of head attributes (Flat, Orderless) and of default values for `Optional`. */
    readonly context?: EvaluationContext;
    /**
     * Evaluates `Condition` tests and `PatternTest` applications. Without it a
     * condition holds only if it is literally `True` after substitution, and
     * a pattern test never holds.
     */
    readonly evaluate?: (expr: Element) => Element;
}

export interface SequenceMatchOptions extends MatchOptions {
    /** Head of the expression whose arguments are matched. */
    readonly head?: Head;
    /** Overrides the Flat attribute looked up for `head`. */
    readonly flat?: boolean;
    /** Overrides the Orderless attribute looked up for `head`. */
    readonly orderless?: boolean;
}

type Continuation = (bindings: Bindings) => Bindings | undefined;

interface ArgumentEnv {
    readonly head?: Head;
    readonly flat: boolean;
    readonly orderless: boolean;
}

const accept: Continuation = bindings => bindings;

function succeed(bindings: Bindings): MatchResult {
    return Object.freeze({ success: true, bindings });
}

/**
 * Matches `pattern` against `expr`, extending `bindings`.
 * @returns The first solution found, or `NO_MATCH`.
 */
export function match(
    pattern: Element,
    expr: Element,
    bindings: Bindings = Bindings.empty(),
    options: MatchOptions = {}
): MatchResult {
    const found = matchElement(pattern, expr, bindings, options, accept);
    return found ? succeed(found) : NO_MATCH;
}

export function matches(pattern: Element, expr: Element, options: MatchOptions = {}): boolean {
    return match(pattern, expr, Bindings.empty(), options).success;
}

/**
 * Matches a list of argument patterns against a list of elements.
 * Flat and Orderless come from `options.head` in `options.context` unless
 * given explicitly.
 */
export function matchSequence(
    patterns: readonly Element[],
    exprs: readonly Element[],
    bindings: Bindings = Bindings.empty(),
    options: SequenceMatchOptions = {}
): MatchResult {
    const headAttributes = options.head && options.head.tag === 'Symbol'
        ? attributesOf(options.context, options.head)
        : NO_ATTRIBUTES;
    const env: ArgumentEnv = {
        head: options.head,
        flat: options.flat ?? hasAttribute(headAttributes, ATTR.Flat),
        orderless: options.orderless ?? hasAttribute(headAttributes, ATTR.Orderless),
    };
    const found = matchArguments(patterns, 0, exprs, bindings, options, env, accept);
    return found ? succeed(found) : NO_MATCH;
}

/**
 * Enumerates the distinct solutions of a match, in search order, by
 * rejecting each solution as it is found so the search backtracks into
 * the next one.
 * @param limit Stop after this many solutions.
 */
export function matchAll(pattern: Element, expr: Element, options: MatchOptions = {}, limit = Number.POSITIVE_INFINITY): Bindings[] {
    const solutions: Bindings[] = [];
    matchElement(pattern, expr, Bindings.empty(), options, found => {
        if (!solutions.some(existing => existing.equals(found))) solutions.push(found);
        return solutions.length >= limit ? found : undefined;
    });
    return solutions;
}

export interface FoundMatch {
    readonly element: Element;
    readonly bindings: Bindings;
}

/** Every subexpression of `expr` (itself first, then its arguments depth-first) that matches. */
export function findMatches(pattern: Element, expr: Element, options: MatchOptions = {}): FoundMatch[] {
    const found: FoundMatch[] = [];
    const visit = (element: Element): void => {
        const result = match(pattern, element, Bindings.empty(), options);
        if (result.success) found.push({ element, bindings: result.bindings });
        if (element.tag === 'Expr') {
            for (const arg of element.tail) visit(arg);
        }
    };
    visit(expr);
    return found;
}

export function countMatches(pattern: Element, expr: Element, options: MatchOptions = {}): number {
    return findMatches(pattern, expr, options).length;
}

// Single elements

function matchElement(pattern: Element, expr: Element, bindings: Bindings, options: MatchOptions, k: Continuation): Bindings | undefined {
    if (pattern.tag !== 'Expr') {
        return elementsEqual(pattern, expr) ? k(bindings) : undefined;
    }
    if (isHoldPattern(pattern)) {
        return matchElement(pattern.tail[0], expr, bindings, options, k);
    }
    if (isVerbatim(pattern)) {
        return elementsEqual(pattern.tail[0], expr) ? k(bindings) : undefined;
    }
    if (isBlank(pattern)) {
        return blankAccepts(pattern, expr) ? k(bindings) : undefined;
    }
    if (isNamedPattern(pattern)) {
        const [name, inner] = pattern.tail;
        if (isSequencePattern(inner)) return matchRun(pattern, [expr], bindings, options, k);
        return matchElement(inner, expr, bindings, options, found => {
            const bound = found.tryBind(name, expr);
            return bound ? k(bound) : undefined;
        });
    }
    if (isCondition(pattern)) {
        const [inner, test] = pattern.tail;
        return matchElement(inner, expr, bindings, options,
            found => conditionHolds(test, found, options) ? k(found) : undefined);
    }
    if (isAlternatives(pattern)) {
        for (const alternative of pattern.tail) {
            const found = matchElement(alternative, expr, bindings, options, k);
            if (found) return found;
        }
        return undefined;
    }
    if (isPatternTest(pattern)) {
        const [inner, test] = pattern.tail;
        return matchElement(inner, expr, bindings, options,
            found => patternTestHolds(test, expr, options) ? k(found) : undefined);
    }
    if (isExcept(pattern)) {
        if (matchElement(pattern.tail[0], expr, bindings, options, accept)) return undefined;
        const alternative = exceptAlternative(pattern);
        return alternative ? matchElement(alternative, expr, bindings, options, k) : k(bindings);
    }
    if (isOptional(pattern) || isRepeated(pattern)) {
        return matchElement(pattern.tail[0], expr, bindings, options, k);
    }
    if (expr.tag !== 'Expr') return undefined;
    return matchCompound(pattern, expr, bindings, options, k);
}

function matchCompound(pattern: Expr, expr: Expr, bindings: Bindings, options: MatchOptions, k: Continuation): Bindings | undefined {
    return matchElement(pattern.head, expr.head, bindings, options, found => {
        const attributes = effectiveAttributes(options.context, expr);
        const env: ArgumentEnv = {
            head: expr.head,
            flat: hasAttribute(attributes, ATTR.Flat),
            orderless: hasAttribute(attributes, ATTR.Orderless),
        };
        return matchArguments(pattern.tail, 0, expr.tail, found, options, env, k);
    });
}

function blankAccepts(blank: BlankExpr, expr: Element): boolean {
    const constraint = blankHeadConstraint(blank);
    return constraint === undefined || elementsEqual(headOf(expr), constraint);
}

function conditionHolds(test: Element, bindings: Bindings, options: MatchOptions): boolean {
    const instantiated = substitute(test, bindings);
    return isTrue(options.evaluate ? options.evaluate(instantiated) : instantiated);
}

function patternTestHolds(test: Element, expr: Element, options: MatchOptions): boolean {
    if (!options.evaluate || test.tag === 'Atom') return false;
    return isTrue(options.evaluate(mkExpr(test, [expr])));
}

// Argument lists

function matchArguments(
    patterns: readonly Element[],
    index: number,
    exprs: readonly Element[],
    bindings: Bindings,
    options: MatchOptions,
    env: ArgumentEnv,
    k: Continuation
): Bindings | undefined {
    if (index === patterns.length) {
        return exprs.length === 0 ? k(bindings) : undefined;
    }
    const pattern = patterns[index];
    let reserved = 0;
    for (let j = index + 1; j < patterns.length; j++) reserved += minSequenceLength(patterns[j]);
    const maxTake = exprs.length - reserved;
    if (maxTake < minSequenceLength(pattern)) return undefined;

    const rest = (remaining: readonly Element[]): Continuation =>
        found => matchArguments(patterns, index + 1, remaining, found, options, env, k);

    if (isOptional(pattern)) {
        const inner = pattern.tail[0];
        if (maxTake >= 1) {
            const present = matchOne(inner, exprs, maxTake, bindings, options, env, rest);
            if (present) return present;
        }
        const fallback = optionalDefault(pattern) ?? defaultFor(options, env.head, index + 1);
        if (fallback === undefined) return undefined;
        return matchElement(inner, fallback, bindings, options, rest(exprs));
    }

    if (isSequencePattern(pattern)) {
        const shortest = Math.max(minSequenceLength(pattern), exprs.length - maxAbsorbed(patterns, index + 1, env));
        for (let length = shortest; length <= maxTake; length++) {
            if (env.orderless) {
                for (const split of combinations(exprs, length)) {
                    const found = matchRun(pattern, split.picked, bindings, options, rest(split.remaining));
                    if (found) return found;
                }
            } else {
                const found = matchRun(pattern, exprs.slice(0, length), bindings, options, rest(exprs.slice(length)));
                if (found) return found;
            }
        }
        return undefined;
    }

    return matchOne(pattern, exprs, maxTake, bindings, options, env, rest);
}

/** Most arguments `patterns[from..]` can consume together; Infinity if a sequence pattern or Flat is involved. */
function maxAbsorbed(patterns: readonly Element[], from: number, env: ArgumentEnv): number {
    let total = 0;
    for (let j = from; j < patterns.length; j++) {
        if (isSequencePattern(patterns[j]) || (env.flat && env.head)) return Infinity;
        total += 1;
    }
    return total;
}

/**
 * Matches a pattern that takes a single argument. Under Orderless any
 * remaining element may be taken; under Flat a run of two or more elements
 * may be taken, wrapped in the head.
 */
function matchOne(
    pattern: Element,
    exprs: readonly Element[],
    maxTake: number,
    bindings: Bindings,
    options: MatchOptions,
    env: ArgumentEnv,
    rest: (remaining: readonly Element[]) => Continuation
): Bindings | undefined {
    if (env.orderless) {
        const backtrack = getFlag('orderlessBacktracking');
        for (let i = 0; i < exprs.length; i++) {
            let committed = false;
            const continueWith = rest(withoutIndex(exprs, i));
            const found = matchElement(pattern, exprs[i], bindings, options, partial => {
                committed = true;
                return continueWith(partial);
            });
            if (found) return found;
            if (committed && !backtrack) return undefined;
        }
    } else if (exprs.length > 0) {
        const found = matchElement(pattern, exprs[0], bindings, options, rest(exprs.slice(1)));
        if (found) return found;
    }

    const head = env.head;
    if (!env.flat || !head) return undefined;
    for (let length = 2; length <= maxTake; length++) {
        if (env.orderless) {
            for (const split of combinations(exprs, length)) {
                const found = matchElement(pattern, mkExpr(head, split.picked), bindings, options, rest(split.remaining));
                if (found) return found;
            }
        } else {
            const found = matchElement(pattern, mkExpr(head, exprs.slice(0, length)), bindings, options, rest(exprs.slice(length)));
            if (found) return found;
        }
    }
    return undefined;
}

/** Matches a sequence pattern against an exact run of elements. */
function matchRun(pattern: Element, run: readonly Element[], bindings: Bindings, options: MatchOptions, k: Continuation): Bindings | undefined {
    if (isHoldPattern(pattern)) {
        return matchRun(pattern.tail[0], run, bindings, options, k);
    }
    if (isBlank(pattern)) {
        const blank = pattern;
        if (run.length < minSequenceLength(blank)) return undefined;
        if (isSingleBlank(blank) && run.length !== 1) return undefined;
        return run.every(element => blankAccepts(blank, element)) ? k(bindings) : undefined;
    }
    if (isNamedPattern(pattern)) {
        const [name, inner] = pattern.tail;
        return matchRun(inner, run, bindings, options, found => {
            const bound = found.tryBind(name, mkExpr(SYS.Sequence, run));
            return bound ? k(bound) : undefined;
        });
    }
    if (isCondition(pattern)) {
        const [inner, test] = pattern.tail;
        return matchRun(inner, run, bindings, options,
            found => conditionHolds(test, found, options) ? k(found) : undefined);
    }
    if (isRepeated(pattern)) {
        if (run.length < minSequenceLength(pattern)) return undefined;
        const repeated = pattern.tail[0];
        const each = (position: number, found: Bindings): Bindings | undefined =>
            position === run.length
                ? k(found)
                : matchElement(repeated, run[position], found, options, next => each(position + 1, next));
        return each(0, bindings);
    }
    return run.length === 1 ? matchElement(pattern, run[0], bindings, options, k) : undefined;
}

function defaultFor(options: MatchOptions, head: Head | undefined, position: number): Element | undefined {
    if (!options.context || !head || head.tag !== 'Symbol') return undefined;
    return options.context.defaultValueFor(head, position);
}

function withoutIndex(items: readonly Element[], index: number): Element[] {
    return [...items.slice(0, index), ...items.slice(index + 1)];
}

interface Split {
    readonly picked: Element[];
    readonly remaining: Element[];
}

/** Every way to pick `size` elements, in lexicographic index order; both parts keep the original order. */
function* combinations(items: readonly Element[], size: number): Generator<Split> {
    const chosen: number[] = [];
    function* pick(start: number): Generator<Split> {
        if (chosen.length === size) {
            const picked: Element[] = [];
            const remaining: Element[] = [];
            items.forEach((item, i) => (chosen.includes(i) ? picked : remaining).push(item));
            yield { picked, remaining };
            return;
        }
        for (let i = start; i <= items.length - (size - chosen.length); i++) {
            chosen.push(i);
            yield* pick(i + 1);
            chosen.pop();
        }
    }
    yield* pick(0);
}
