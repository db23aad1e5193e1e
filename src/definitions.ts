/**
 * @file definitions.ts
 * @description Adding and removing definitions. The `define*Value` family
 * stores a rule under an explicit category; `set`, `setDelayed`, `upSet` and
 * `upSetDelayed` pick the category from the shape of the left-hand side the
 * way assignments do.
 */

import { Element, Expr, Sym } from './types';
import { ATTR, SYS } from './symbols';
import { isCondition, unwrapHoldPattern } from './pattern';
import { Rule, RuleCallback, RuleKind, makeRule } from './rules';
import { ValueCategory } from './values';
import { EvaluationContext } from './context';
import { BuiltinRegistry, getGlobalBuiltins } from './builtins';
import { rootSymbol } from './structural';
import { DefinitionError, ProtectedSymbolError } from './errors';
import { evaluate } from './evaluator';
import { consoleLog, printElement } from './utils';

function assertUnprotected(context: EvaluationContext, symbol: Sym, action: string): void {
    if (context.hasAttribute(symbol, ATTR.Protected)) {
        throw new ProtectedSymbolError(symbol, action);
    }
}

/**
 * Stores `rule` as a value of `symbol`.
 * @throws ProtectedSymbolError if `symbol` is Protected in `context`.
 */
export function defineValue(category: ValueCategory, context: EvaluationContext, symbol: Sym, rule: Rule): void {
    assertUnprotected(context, symbol, `define ${category}`);
    consoleLog(`[define] ${category} ${symbol.name}: ${printElement(rule.lhs)}`);
    context.addValue(category, symbol, rule);
}

function definer(category: ValueCategory) {
    return (
        context: EvaluationContext,
        symbol: Sym,
        pattern: Element,
        replacement: Element | RuleCallback,
        condition?: Element,
        priority?: number,
        kind: RuleKind = 'Delayed'
    ): Rule => {
        const rule = makeRule(pattern, replacement, kind, { condition, priority });
        defineValue(category, context, symbol, rule);
        return rule;
    };
}

/** `x = value`: a rule for the symbol itself. */
export const defineOwnValue = definer('OwnValues');
/** `f[args] := value` */
export const defineDownValue = definer('DownValues');
/** `g /: f[g[...]] := value`, attached to `g`. */
export const defineUpValue = definer('UpValues');
/** `f[a][b] := value`, attached to the root head `f`. */
export const defineSubValue = definer('SubValues');
/** Numeric approximations, used only by numeric evaluation. */
export const defineNValue = definer('NValues');
/** Rules for `Default[f]` / `Default[f, i]`, consulted by optional patterns. */
export const defineDefaultValue = definer('DefaultValues');
/** Display rules, applied by `formatElement`. */
export const defineFormatValue = definer('FormatValues');

/**
 * Removes one category of values of `symbol`, or all of them.
 * @throws ProtectedSymbolError if `symbol` is Protected.
 */
export function clearValues(context: EvaluationContext, symbol: Sym, category?: ValueCategory): void {
    assertUnprotected(context, symbol, 'clear values');
    consoleLog(`[define] clear ${category ?? 'all values'} of ${symbol.name}`);
    context.clearValues(symbol, category);
}

/** @throws ProtectedSymbolError if `symbol` is Locked. */
export function setAttributes(context: EvaluationContext, symbol: Sym, attributes: Iterable<Sym>): void {
    if (context.hasAttribute(symbol, ATTR.Locked)) throw new ProtectedSymbolError(symbol, 'change attributes');
    context.setAttributes(symbol, attributes);
}

/** @throws ProtectedSymbolError if `symbol` is Locked. */
export function clearAttributes(context: EvaluationContext, symbol: Sym): void {
    if (context.hasAttribute(symbol, ATTR.Locked)) throw new ProtectedSymbolError(symbol, 'change attributes');
    context.clearAttributes(symbol);
}

interface Target {
    readonly category: ValueCategory;
    readonly symbol: Sym;
    readonly lhs: Element;
    readonly condition?: Element;
}

/** Strips `HoldPattern` and a trailing `Condition` from an assignment's left-hand side. */
function splitLhs(lhs: Element): { pattern: Element, condition?: Element } {
    const pattern = unwrapHoldPattern(lhs);
    if (!isCondition(pattern)) return { pattern };
    return { pattern: unwrapHoldPattern(pattern.tail[0]), condition: pattern.tail[1] };
}

function symbolArgument(expr: Expr, what: string): Sym {
    const target = expr.tail[0];
    if (target === undefined) throw new DefinitionError(`${what} needs an argument: ${printElement(expr)}`);
    if (target.tag === 'Symbol') return target;
    if (target.tag === 'Expr') return rootSymbol(target.head);
    throw new DefinitionError(`Cannot attach ${what} to ${printElement(target)}`);
}

/**
 * Where an assignment to `lhs` goes:
 * `x` to OwnValues of x, `f[...]` to DownValues of f, `f[...][...]` to
 * SubValues of f, `N[f[...]]` to NValues of f, `Default[f, ...]` to
 * DefaultValues of f and `Format[f[...]]` to FormatValues of f.
 */
function assignmentTarget(lhs: Element): Target {
    const { pattern, condition } = splitLhs(lhs);
    switch (pattern.tag) {
        case 'Atom':
            throw new DefinitionError(`Cannot assign to atom ${printElement(pattern)}`);
        case 'Symbol':
            return { category: 'OwnValues', symbol: pattern, lhs: pattern, condition };
        case 'Expr': {
            const head = pattern.head;
            if (head.tag === 'Expr') {
                return { category: 'SubValues', symbol: rootSymbol(head), lhs: pattern, condition };
            }
            if (head.name === SYS.N.name && pattern.tail.length === 1 && pattern.tail[0].tag === 'Expr') {
                return { category: 'NValues', symbol: symbolArgument(pattern, 'N'), lhs: pattern.tail[0], condition };
            }
            if (head.name === SYS.Format.name && pattern.tail.length === 1) {
                return { category: 'FormatValues', symbol: symbolArgument(pattern, 'Format'), lhs: pattern.tail[0], condition };
            }
            if (head.name === SYS.Default.name) {
                return { category: 'DefaultValues', symbol: symbolArgument(pattern, 'Default'), lhs: pattern, condition };
            }
            return { category: 'DownValues', symbol: head, lhs: pattern, condition };
        }
        default:
            const exhaustiveCheck: never = pattern;
            throw new Error(`assignmentTarget: Unhandled element: ${JSON.stringify(exhaustiveCheck)}`);
    }
}

function assign(context: EvaluationContext, lhs: Element, rhs: Element, kind: RuleKind): void {
    const target = assignmentTarget(lhs);
    defineValue(target.category, context, target.symbol, makeRule(target.lhs, rhs, kind, { condition: target.condition }));
}

/**
 * `lhs = rhs`: evaluates `rhs` now and stores the result.
 * @returns The evaluated right-hand side.
 */
export function set(context: EvaluationContext, lhs: Element, rhs: Element): Element {
    const value = evaluate(rhs, context);
    assign(context, lhs, value, 'Immediate');
    return value;
}

/** `lhs := rhs`: stores `rhs` unevaluated. */
export function setDelayed(context: EvaluationContext, lhs: Element, rhs: Element): Element {
    assign(context, lhs, rhs, 'Delayed');
    return SYS.Null;
}

/** Symbols an up-assignment to `lhs` attaches to: each argument symbol or argument head symbol. */
function upValueOwners(lhs: Expr): Sym[] {
    const owners = new Map<string, Sym>();
    for (const arg of lhs.tail) {
        const { pattern } = splitLhs(arg);
        if (pattern.tag === 'Symbol') owners.set(pattern.name, pattern);
        else if (pattern.tag === 'Expr' && pattern.head.tag === 'Symbol') owners.set(pattern.head.name, pattern.head);
    }
    return [...owners.values()];
}

function upAssign(context: EvaluationContext, lhs: Element, rhs: Element, kind: RuleKind): void {
    const { pattern, condition } = splitLhs(lhs);
    if (pattern.tag !== 'Expr') {
        throw new DefinitionError(`Up-assignment needs an expression on the left, got ${printElement(pattern)}`);
    }
    const owners = upValueOwners(pattern);
    if (owners.length === 0) {
        throw new DefinitionError(`No symbol in ${printElement(pattern)} to attach an up-value to`);
    }
    const rule = makeRule(pattern, rhs, kind, { condition });
    for (const owner of owners) defineValue('UpValues', context, owner, rule);
}

/** `lhs ^= rhs`: stores an UpValue on every argument symbol of `lhs`. */
export function upSet(context: EvaluationContext, lhs: Element, rhs: Element): Element {
    const value = evaluate(rhs, context);
    upAssign(context, lhs, value, 'Immediate');
    return value;
}

/** `lhs ^:= rhs` */
export function upSetDelayed(context: EvaluationContext, lhs: Element, rhs: Element): Element {
    upAssign(context, lhs, rhs, 'Delayed');
    return SYS.Null;
}

/**
 * Registers `Set`, `SetDelayed`, `UpSet` and `UpSetDelayed` as builtins so that
 * evaluating `Set[lhs, rhs]` makes the definition.
 */
export function registerAssignmentBuiltins(registry: BuiltinRegistry = getGlobalBuiltins()): void {
    const binary = (name: string, expr: Expr): readonly [Element, Element] => {
        const [lhs, rhs] = expr.tail;
        if (expr.tail.length !== 2 || lhs === undefined || rhs === undefined) {
            throw new DefinitionError(`${name} expects 2 arguments, got ${expr.tail.length}`);
        }
        return [lhs, rhs];
    };
    // The right-hand side of Set/UpSet is already evaluated by the time the builtin runs.
    registry.register(SYS.Set, (expr, context) => {
        const [lhs, rhs] = binary('Set', expr);
        assign(context, lhs, rhs, 'Immediate');
        return rhs;
    }, [ATTR.HoldFirst, ATTR.Protected]);
    registry.register(SYS.SetDelayed, (expr, context) => {
        const [lhs, rhs] = binary('SetDelayed', expr);
        return setDelayed(context, lhs, rhs);
    }, [ATTR.HoldAll, ATTR.Protected]);
    registry.register(SYS.UpSet, (expr, context) => {
        const [lhs, rhs] = binary('UpSet', expr);
        upAssign(context, lhs, rhs, 'Immediate');
        return rhs;
    }, [ATTR.HoldFirst, ATTR.Protected]);
    registry.register(SYS.UpSetDelayed, (expr, context) => {
        const [lhs, rhs] = binary('UpSetDelayed', expr);
        return upSetDelayed(context, lhs, rhs);
    }, [ATTR.HoldAll, ATTR.Protected]);
}
