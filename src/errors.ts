/**
 * @file errors.ts
 * @description Error classes raised by the kernel. Pattern mismatches are
 * never errors; see `NO_MATCH` in matcher.ts.
 */

import type { Element, Sym } from './types';
import { printElement } from './utils';

/** A malformed expression or atom was requested. */
export class ConstructionError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ConstructionError';
    }
}

/**
 * Raised when a pattern variable that is already bound is bound again to a
 * structurally different value.
 */
export class BindingConflict extends Error {
    constructor(
        public readonly symbol: Sym,
        public readonly existing: Element,
        public readonly attempted: Element
    ) {
        super(`Cannot bind ${symbol.name} to ${printElement(attempted)}: already bound to ${printElement(existing)}`);
        this.name = 'BindingConflict';
    }
}

export class LimitError extends Error {
    constructor(message: string, public readonly limit: number) {
        super(message);
        this.name = 'LimitError';
    }
}

export class RecursionLimitError extends LimitError {
    constructor(limit: number, public readonly expr: Element) {
        super(`Recursion depth of ${limit} exceeded while evaluating ${printElement(expr)}`, limit);
        this.name = 'RecursionLimitError';
    }
}

export class IterationLimitError extends LimitError {
    constructor(limit: number, public readonly expr: Element) {
        super(`Iteration limit of ${limit} exceeded; last expression ${printElement(expr)}`, limit);
        this.name = 'IterationLimitError';
    }
}

export class EvaluationError extends Error {
    constructor(message: string, public readonly expr?: Element, cause?: unknown) {
        super(message, cause === undefined ? undefined : { cause });
        this.name = 'EvaluationError';
    }
}

/** An assignment whose left-hand side cannot carry a definition. */
export class DefinitionError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'DefinitionError';
    }
}

export class ProtectedSymbolError extends DefinitionError {
    constructor(public readonly symbol: Sym, action: string) {
        super(`Symbol ${symbol.name} is protected; cannot ${action}`);
        this.name = 'ProtectedSymbolError';
    }
}
