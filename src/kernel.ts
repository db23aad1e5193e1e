/**
 * @file kernel.ts
 * @description Process-wide reset and the `Kernel` facade, which bundles a
 * context with the evaluation and definition entry points.
 */

import { Element, Sym } from './types';
import { resetSymbolTable } from './symbols';
import { resetFlags, resetLimits, setDebugVerbose } from './state';
import { BuiltinFunction, BuiltinRegistry, getGlobalBuiltins, resetGlobalBuiltins } from './builtins';
import { EvaluationContext, createGlobalContext, getGlobalContext, resetGlobalContext, withContext } from './context';
import { EvaluationOptions, evaluate, evaluateN } from './evaluator';
import {
    clearAttributes, clearValues, defineDownValue, defineOwnValue, registerAssignmentBuiltins,
    set, setAttributes, setDelayed, upSet, upSetDelayed
} from './definitions';
import { RuleCallback } from './rules';
import { ValueCategory } from './values';
import { formatElement } from './format';

/**
 * Resets every piece of process-wide state: the symbol table, the global
 * builtin registry, the global context, flags, limits and verbose logging.
 */
export function resetKernel() {
    resetSymbolTable();
    resetGlobalBuiltins();
    resetGlobalContext();
    resetFlags();
    resetLimits();
    setDebugVerbose(false);
}

export interface KernelOptions {
    /** Context to evaluate in; defaults to a fresh root context. */
    context?: EvaluationContext;
    /** Builtins for the fresh root context; defaults to a registry over the global one. */
    builtins?: BuiltinRegistry;
    /** Register the assignment heads (`Set`, `SetDelayed`, ...) as builtins. */
    assignments?: boolean;
}

export class Kernel {
    readonly context: EvaluationContext;
    readonly builtins: BuiltinRegistry;

    constructor(options: KernelOptions = {}) {
        this.builtins = options.builtins ?? new BuiltinRegistry(getGlobalBuiltins());
        this.context = options.context ?? createGlobalContext(this.builtins);
        if (options.assignments ?? true) registerAssignmentBuiltins(this.builtins);
    }

    /** A kernel over the process-wide global context. */
    static global(): Kernel {
        return new Kernel({ context: getGlobalContext(), builtins: getGlobalBuiltins() });
    }

    evaluate(expr: Element, options: EvaluationOptions = {}): Element {
        return withContext(this.context, context => evaluate(expr, context, options));
    }

    evaluateN(expr: Element, options: EvaluationOptions = {}): Element {
        return withContext(this.context, context => evaluateN(expr, context, options));
    }

    register(symbol: Sym, apply: BuiltinFunction, attributes: Iterable<Sym> = []): this {
        this.builtins.register(symbol, apply, attributes);
        return this;
    }

    set(lhs: Element, rhs: Element): Element {
        return set(this.context, lhs, rhs);
    }

    setDelayed(lhs: Element, rhs: Element): Element {
        return setDelayed(this.context, lhs, rhs);
    }

    upSet(lhs: Element, rhs: Element): Element {
        return upSet(this.context, lhs, rhs);
    }

    upSetDelayed(lhs: Element, rhs: Element): Element {
        return upSetDelayed(this.context, lhs, rhs);
    }

    defineOwnValue(symbol: Sym, replacement: Element | RuleCallback): this {
        defineOwnValue(this.context, symbol, symbol, replacement);
        return this;
    }

    defineDownValue(symbol: Sym, pattern: Element, replacement: Element | RuleCallback, condition?: Element, priority?: number): this {
        defineDownValue(this.context, symbol, pattern, replacement, condition, priority);
        return this;
    }

    setAttributes(symbol: Sym, attributes: Iterable<Sym>): this {
        setAttributes(this.context, symbol, attributes);
        return this;
    }

    clearAttributes(symbol: Sym): this {
        clearAttributes(this.context, symbol);
        return this;
    }

    clear(symbol: Sym, category?: ValueCategory): this {
        clearValues(this.context, symbol, category);
        return this;
    }

    format(expr: Element): string {
        return formatElement(expr, this.context);
    }
}
