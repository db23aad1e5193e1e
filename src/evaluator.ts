/**
 * @file evaluator.ts
 * @description The standard evaluation procedure. An element is rewritten
 * until no rule applies: arguments are evaluated according to the hold
 * attributes, sequences spliced, Flat/Orderless/Listable normalizations
 * applied, and then value rules and builtins are tried in a fixed order.
 * Each rewrite loops back to the start with the new expression.
 *
 * Recursion depth is tracked per top-level call, so independent evaluations
 * never share counters. The rewrite count is kept per expression: it bounds
 * the chain of rewrites one expression goes through before it is stable.
 */

import { Element, Expr, Head, Sym, isElement, mkExpr, Real } from './types';
import { ATTR } from './symbols';
import {
    AttributeSet, effectiveAttributes, hasAttribute, holdsCompletely, isHeldPosition, isNumericHeldPosition
} from './attributes';
import { elementsEqual, rootSymbol } from './structural';
import { applyFlat, applyListable, applyOrderless, flattenSequences } from './transforms';
import { tryRules } from './rules';
import { MatchOptions } from './matcher';
import { EvaluationContext, currentContext } from './context';
import { BuiltinDefinition, EvaluationHandle } from './builtins';
import { EvaluationError, IterationLimitError, LimitError, RecursionLimitError } from './errors';
import { ValueCategory } from './values';
import { getFlag, getIterationLimit, getRecursionLimit } from './state';
import { consoleLog, printElement } from './utils';
import { DEFAULT_FIXED_POINT_LIMIT } from './constants';

export interface EvaluationOptions {
    /** Maximum nesting depth; defaults to the process-wide recursion limit. */
    recursionLimit?: number;
    /** Maximum number of successive rewrites of one expression; defaults to the process-wide iteration limit. */
    iterationLimit?: number;
    /** Evaluate numerically: integers become reals and NValues apply. */
    numeric?: boolean;
}

interface EvaluationState {
    depth: number;
    readonly recursionLimit: number;
    readonly iterationLimit: number;
}

interface Step {
    readonly value: Element;
    readonly rewritten: boolean;
    /** Where a rewrite came from, for tracing. */
    readonly source?: ValueCategory | 'builtin';
}

const stable = (value: Element): Step => ({ value, rewritten: false });
const rewrite = (value: Element, source: ValueCategory | 'builtin'): Step => ({ value, rewritten: true, source });

/**
 * Evaluates `expr` to a fixed point.
 * @throws RecursionLimitError if evaluation nests deeper than the recursion limit.
 * @throws IterationLimitError if one expression is rewritten more times than the iteration limit.
 * @throws EvaluationError if a builtin returns something that is not an element,
 * or a head evaluates to an atom.
 */
export function evaluate(expr: Element, context: EvaluationContext = currentContext(), options: EvaluationOptions = {}): Element {
    const state: EvaluationState = {
        depth: 0,
        recursionLimit: options.recursionLimit ?? getRecursionLimit(),
        iterationLimit: options.iterationLimit ?? getIterationLimit(),
    };
    return evaluateIn(state, expr, context, options.numeric ?? false);
}

/** Numeric evaluation: `evaluate` with `numeric` set. */
export function evaluateN(expr: Element, context: EvaluationContext = currentContext(), options: EvaluationOptions = {}): Element {
    return evaluate(expr, context, { ...options, numeric: true });
}

/**
 * Evaluates `expr`, returning `fallback` if evaluation hits a limit or an
 * evaluation error. Other errors propagate.
 */
export function tryEvaluate(
    expr: Element,
    context: EvaluationContext,
    fallback: Element,
    options: EvaluationOptions = {}
): Element {
    try {
        return evaluate(expr, context, options);
    } catch (error) {
        if (error instanceof LimitError || error instanceof EvaluationError) {
            consoleLog(`[tryEvaluate] ${printElement(expr)} failed: ${error.message}`);
            return fallback;
        }
        throw error;
    }
}

/**
 * Applies `fn` repeatedly until two successive results satisfy `sameTest`,
 * or `maxIterations` applications have been made.
 */
export function fixedPoint(
    fn: (element: Element) => Element,
    expr: Element,
    maxIterations: number = DEFAULT_FIXED_POINT_LIMIT,
    sameTest: (a: Element, b: Element) => boolean = (a, b) => elementsEqual(a, b)
): Element {
    let current = expr;
    for (let i = 0; i < maxIterations; i++) {
        const next = fn(current);
        if (sameTest(current, next)) return next;
        current = next;
    }
    return current;
}

/** Evaluates `expr` `times` times in a row, each as a separate call. */
export function evaluateIterated(
    expr: Element,
    context: EvaluationContext,
    times: number,
    options: EvaluationOptions = {}
): Element {
    let current = expr;
    for (let i = 0; i < times; i++) {
        current = evaluate(current, context, options);
    }
    return current;
}

function evaluateIn(state: EvaluationState, expr: Element, context: EvaluationContext, numeric: boolean): Element {
    state.depth++;
    try {
        if (state.depth > state.recursionLimit) {
            throw new RecursionLimitError(state.recursionLimit, expr);
        }
        let current = expr;
        let iterations = 0;
        for (;;) {
            const step = evaluateStep(state, current, context, numeric);
            if (!step.rewritten) return step.value;
            iterations++;
            if (iterations > state.iterationLimit) {
                throw new IterationLimitError(state.iterationLimit, step.value);
            }
            if (getFlag('traceRewrites')) {
                consoleLog(`[evaluate] ${step.source ?? 'rewrite'}: ${printElement(current)} -> ${printElement(step.value)}`);
            }
            current = step.value;
        }
    } finally {
        state.depth--;
    }
}

function evaluateStep(state: EvaluationState, expr: Element, context: EvaluationContext, numeric: boolean): Step {
    switch (expr.tag) {
        case 'Atom':
            return stable(numeric && expr.kind === 'Integer' ? Real(expr.value) : expr);
        case 'Symbol':
            return evaluateSymbol(state, expr, context, numeric);
        case 'Expr':
            return evaluateExpr(state, expr, context, numeric);
        default:
            const exhaustiveCheck: never = expr;
            throw new Error(`evaluateStep: Unhandled element: ${JSON.stringify(exhaustiveCheck)}`);
    }
}

function matchOptionsFor(state: EvaluationState, context: EvaluationContext): MatchOptions {
    return { context, evaluate: e => evaluateIn(state, e, context, false) };
}

function evaluateSymbol(state: EvaluationState, symbol: Sym, context: EvaluationContext, numeric: boolean): Step {
    const options = matchOptionsFor(state, context);
    const own = tryRules(context.getValues('OwnValues', symbol), symbol, options);
    if (own.matched) return rewrite(own.result, 'OwnValues');
    if (numeric) {
        const approx = tryRules(context.getValues('NValues', symbol), symbol, options);
        if (approx.matched) return rewrite(approx.result, 'NValues');
    }
    return stable(symbol);
}

function evaluateExpr(state: EvaluationState, expr: Expr, context: EvaluationContext, numeric: boolean): Step {
    let head: Head = expr.head;
    if (!holdsCompletely(effectiveAttributes(context, expr))) {
        const evaluatedHead = evaluateIn(state, expr.head, context, false);
        if (evaluatedHead.tag === 'Atom') {
            throw new EvaluationError(`Head of ${printElement(expr)} evaluated to atom ${printElement(evaluatedHead)}`, expr);
        }
        head = evaluatedHead;
    }
    let current = head === expr.head ? expr : mkExpr(head, expr.tail, expr.attributes);
    const attributes = effectiveAttributes(context, current);

    let changed = false;
    const args: Element[] = [];
    for (let i = 0; i < current.tail.length; i++) {
        const arg = current.tail[i];
        if (isHeldPosition(attributes, i)) {
            args.push(arg);
            continue;
        }
        const value = evaluateIn(state, arg, context, numeric && !isNumericHeldPosition(attributes, i));
        if (value !== arg) changed = true;
        args.push(value);
    }
    if (changed) current = mkExpr(current.head, args, current.attributes);

    if (!holdsCompletely(attributes) && !hasAttribute(attributes, ATTR.SequenceHold)) {
        current = flattenSequences(current);
    }
    if (hasAttribute(attributes, ATTR.Flat)) current = applyFlat(current);
    if (hasAttribute(attributes, ATTR.Orderless)) current = applyOrderless(current);

    if (hasAttribute(attributes, ATTR.Listable)) {
        const threaded = applyListable(current);
        if (threaded !== current) return stable(evaluateIn(state, threaded, context, numeric));
    }

    return dispatch(state, current, attributes, context, numeric);
}

/** The symbol whose UpValues an argument may carry: the argument itself or its head. */
function upValueOwner(arg: Element): Sym | undefined {
    if (arg.tag === 'Symbol') return arg;
    if (arg.tag === 'Expr' && arg.head.tag === 'Symbol') return arg.head;
    return undefined;
}

function dispatch(state: EvaluationState, expr: Expr, attributes: AttributeSet, context: EvaluationContext, numeric: boolean): Step {
    const options = matchOptionsFor(state, context);

    if (!holdsCompletely(attributes)) {
        const seen = new Set<string>();
        for (const arg of expr.tail) {
            const owner = upValueOwner(arg);
            if (!owner || seen.has(owner.name)) continue;
            seen.add(owner.name);
            const up = tryRules(context.getValues('UpValues', owner), expr, options);
            if (up.matched) return rewrite(up.result, 'UpValues');
        }
    }

    if (expr.head.tag === 'Symbol') {
        const down = tryRules(context.getValues('DownValues', expr.head), expr, options);
        if (down.matched) return rewrite(down.result, 'DownValues');
    } else {
        const sub = tryRules(context.getValues('SubValues', rootSymbol(expr.head)), expr, options);
        if (sub.matched) return rewrite(sub.result, 'SubValues');
    }

    if (numeric) {
        const approx = tryRules(context.getValues('NValues', rootSymbol(expr.head)), expr, options);
        if (approx.matched) return rewrite(approx.result, 'NValues');
    }

    if (expr.head.tag === 'Symbol') {
        const builtin = context.lookupBuiltin(expr.head);
        if (builtin) return applyBuiltin(state, builtin, expr, expr.head, context, numeric);
    }
    return stable(expr);
}

/**
 * Runs a builtin. A builtin that throws leaves the expression as it was
 * (arguments already evaluated); limit errors still propagate.
 */
function applyBuiltin(
    state: EvaluationState,
    builtin: BuiltinDefinition,
    expr: Expr,
    symbol: Sym,
    context: EvaluationContext,
    numeric: boolean
): Step {
    const handle: EvaluationHandle = {
        evaluate: e => evaluateIn(state, e, context, numeric),
        numeric,
    };
    let result: unknown;
    try {
        result = builtin.apply(expr, context, handle);
    } catch (error) {
        if (error instanceof LimitError) throw error;
        const message = error instanceof Error ? error.message : String(error);
        if (getFlag('warnOnBuiltinFailure')) {
            console.warn(`Builtin ${symbol.name} failed on ${printElement(expr)}: ${message}`);
        }
        consoleLog(`[evaluate] builtin ${symbol.name} failed; returning ${printElement(expr)} unevaluated`);
        return stable(expr);
    }
    if (!isElement(result)) {
        throw new EvaluationError(`Builtin ${symbol.name} returned a non-element for ${printElement(expr)}`, expr);
    }
    return elementsEqual(result, expr) ? stable(expr) : rewrite(result, 'builtin');
}
