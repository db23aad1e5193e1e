/**
 * @file builtins.ts
 * @description The builtin dispatch interface and a registry implementing it.
 * The kernel ships no builtin bodies; hosts register native implementations
 * here and the evaluator calls them when no user rule applies.
 */

import type { Element, Expr, Sym } from './types';
import type { EvaluationContext } from './context';
import type { AttributeSet } from './attributes';
import { consoleLog } from './utils';

/** Access to the evaluation call a builtin runs inside. */
export interface EvaluationHandle {
    /** Evaluates `expr` under the same recursion and iteration counters. */
    evaluate(expr: Element): Element;
    /** True while evaluating numerically (`evaluateN`). */
    readonly numeric: boolean;
}

export type BuiltinFunction = (expr: Expr, context: EvaluationContext, handle: EvaluationHandle) => Element;

export interface BuiltinDefinition {
    readonly apply: BuiltinFunction;
    readonly attributes: AttributeSet;
}

export interface BuiltinDispatcher {
    lookupBuiltin(symbol: Sym): BuiltinDefinition | undefined;
}

/**
 * Builtins keyed by symbol name. A registry with a parent falls back to it
 * for names it does not define itself.
 */
export class BuiltinRegistry implements BuiltinDispatcher {
    private readonly definitions: Map<string, BuiltinDefinition> = new Map();

    constructor(private readonly parent?: BuiltinDispatcher) {}

    register(symbol: Sym, apply: BuiltinFunction, attributes: Iterable<Sym> = []): void {
        consoleLog(`[builtins] register ${symbol.name}`);
        this.definitions.set(symbol.name, Object.freeze({ apply, attributes: new Set(attributes) }));
    }

    unregister(symbol: Sym): boolean {
        return this.definitions.delete(symbol.name);
    }

    lookupBuiltin(symbol: Sym): BuiltinDefinition | undefined {
        return this.definitions.get(symbol.name) ?? this.parent?.lookupBuiltin(symbol);
    }

    has(symbol: Sym): boolean {
        return this.lookupBuiltin(symbol) !== undefined;
    }

    /** Names defined in this registry itself, sorted. */
    names(): string[] {
        return [...this.definitions.keys()].sort();
    }

    clear(): void {
        this.definitions.clear();
    }
}

// Process-wide registry used by the global context

const globalBuiltins = new BuiltinRegistry();

export function getGlobalBuiltins(): BuiltinRegistry {
    return globalBuiltins;
}

/** Empties the process-wide registry. */
export function resetGlobalBuiltins(): void {
    globalBuiltins.clear();
}

export function registerBuiltin(symbol: Sym, apply: BuiltinFunction, attributes: Iterable<Sym> = []): void {
    globalBuiltins.register(symbol, apply, attributes);
}
