/**
 * @file rules.ts
 * @description Rewrite rules and their application.
 */

import { Element, Expr, hasHead, mkExpr } from './types';
import { SYS } from './symbols';
import { Bindings } from './bindings';
import { MatchOptions, match } from './matcher';
import { substitute } from './substitution';
import { elementsEqual, isTrue } from './structural';
import { EvaluationError, IterationLimitError, LimitError } from './errors';
import { DEFAULT_REPLACE_LIMIT } from './constants';
import { consoleLog, printElement } from './utils';
import type { EvaluationContext } from './context';

/**
 * Immediate rules evaluate the instantiated right-hand side before returning
 * it; delayed rules return it as is and leave evaluation to the caller.
 */
export type RuleKind = 'Immediate' | 'Delayed';

/** A right-hand side computed natively from the bindings of a match. */
export type RuleCallback = (bindings: Bindings, context: EvaluationContext | undefined) => Element;

export interface Rule {
    readonly lhs: Element;
    readonly rhs: Element | RuleCallback;
    readonly kind: RuleKind;
    readonly condition?: Element;
    /** Higher priorities are tried first. */
    readonly priority: number;
}

export interface RuleOptions {
    condition?: Element;
    priority?: number;
}

export function makeRule(lhs: Element, rhs: Element | RuleCallback, kind: RuleKind = 'Delayed', options: RuleOptions = {}): Rule {
    const rule: Rule = options.condition === undefined
        ? { lhs, rhs, kind, priority: options.priority ?? 0 }
        : { lhs, rhs, kind, condition: options.condition, priority: options.priority ?? 0 };
    return Object.freeze(rule);
}

export const RuleImmediate = (lhs: Element, rhs: Element | RuleCallback, options: RuleOptions = {}): Rule =>
    makeRule(lhs, rhs, 'Immediate', options);

export const RuleDelayed = (lhs: Element, rhs: Element | RuleCallback, options: RuleOptions = {}): Rule =>
    makeRule(lhs, rhs, 'Delayed', options);

/** Reads `Rule[lhs, rhs]` / `RuleDelayed[lhs, rhs]` data; undefined for anything else. */
export function ruleFromElement(element: Element): Rule | undefined {
    if (element.tag !== 'Expr' || element.tail.length !== 2) return undefined;
    const [lhs, rhs] = element.tail;
    if (hasHead(element, SYS.Rule)) return makeRule(lhs, rhs, 'Immediate');
    if (hasHead(element, SYS.RuleDelayed)) return makeRule(lhs, rhs, 'Delayed');
    return undefined;
}

/**
 * Writes a rule back as `Rule[...]` or `RuleDelayed[...]`. Conditions are
 * folded into the left-hand side as `Condition[lhs, test]`.
 * @throws EvaluationError for rules whose right-hand side is a callback.
 */
export function ruleToElement(rule: Rule): Expr {
    if (typeof rule.rhs === 'function') {
        throw new EvaluationError(`Rule for ${printElement(rule.lhs)} has a native right-hand side and no element form`);
    }
    const lhs = rule.condition ? mkExpr(SYS.Condition, [rule.lhs, rule.condition]) : rule.lhs;
    return mkExpr(rule.kind === 'Immediate' ? SYS.Rule : SYS.RuleDelayed, [lhs, rule.rhs]);
}

export interface RuleApplication {
    readonly result: Element;
    readonly matched: boolean;
}

/**
 * Applies one rule to `expr`. A present condition must evaluate to `True`
 * with the match bindings substituted in.
 */
export function applyRule(rule: Rule, expr: Element, options: MatchOptions = {}): RuleApplication {
    const matched = match(rule.lhs, expr, Bindings.empty(), options);
    if (!matched.success) return { result: expr, matched: false };
    const bindings = matched.bindings;

    if (rule.condition !== undefined) {
        const test = substitute(rule.condition, bindings);
        const value = options.evaluate ? options.evaluate(test) : test;
        if (!isTrue(value)) return { result: expr, matched: false };
    }

    let result: Element;
    if (typeof rule.rhs === 'function') {
        try {
            result = rule.rhs(bindings, options.context);
        } catch (error) {
            if (error instanceof LimitError) throw error;
            throw new EvaluationError(`Native replacement for ${printElement(rule.lhs)} failed: ${String(error)}`, expr, error);
        }
    } else {
        result = substitute(rule.rhs, bindings);
    }

    if (rule.kind === 'Immediate' && options.evaluate) {
        result = options.evaluate(result);
    }
    return { result, matched: true };
}

/** Stable sort by descending priority; equal priorities keep list order. */
export function sortRulesByPriority(rules: readonly Rule[]): Rule[] {
    return rules
        .map((rule, index) => ({ rule, index }))
        .sort((a, b) => b.rule.priority - a.rule.priority || a.index - b.index)
        .map(entry => entry.rule);
}

/**
 * Tries `rules` in priority order and returns the first rewrite, or `expr`
 * unchanged with `matched: false`.
 */
export function tryRules(rules: readonly Rule[], expr: Element, options: MatchOptions = {}): RuleApplication {
    if (rules.length === 0) return { result: expr, matched: false };
    for (const rule of sortRulesByPriority(rules)) {
        const application = applyRule(rule, expr, options);
        if (application.matched) return application;
    }
    return { result: expr, matched: false };
}

/**
 * Rewrites every subexpression that some rule matches, trying the whole
 * expression first and descending only into parts no rule rewrote. Each
 * part is rewritten at most once.
 */
export function replaceAll(expr: Element, rules: readonly Rule[], options: MatchOptions = {}): Element {
    const sorted = sortRulesByPriority(rules);
    const visit = (element: Element): Element => {
        for (const rule of sorted) {
            const application = applyRule(rule, element, options);
            if (application.matched) return application.result;
        }
        if (element.tag !== 'Expr') return element;
        const compound = element;
        const head = visit(compound.head);
        const tail = compound.tail.map(visit);
        const changed = head !== compound.head || tail.some((arg, i) => arg !== compound.tail[i]);
        if (!changed) return compound;
        if (head.tag === 'Atom') {
            throw new EvaluationError(`replaceAll produced atom ${printElement(head)} in head position`, compound);
        }
        return mkExpr(head, spliceSequences(tail), compound.attributes);
    };
    return visit(expr);
}

function spliceSequences(tail: readonly Element[]): Element[] {
    const spliced: Element[] = [];
    for (const arg of tail) {
        if (hasHead(arg, SYS.Sequence)) spliced.push(...arg.tail);
        else spliced.push(arg);
    }
    return spliced;
}

/**
 * Applies `replaceAll` until the expression stops changing.
 * @throws IterationLimitError if no fixed point is reached within `maxIterations` passes.
 */
export function replaceRepeated(
    expr: Element,
    rules: readonly Rule[],
    options: MatchOptions = {},
    maxIterations: number = DEFAULT_REPLACE_LIMIT
): Element {
    let current = expr;
    for (let i = 0; i < maxIterations; i++) {
        const next = replaceAll(current, rules, options);
        if (elementsEqual(next, current)) return current;
        consoleLog(`[replaceRepeated] pass ${i + 1}: ${printElement(current)} -> ${printElement(next)}`);
        current = next;
    }
    throw new IterationLimitError(maxIterations, current);
}
