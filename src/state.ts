/**
 * @file state.ts
 * @description Process-wide settings of the kernel: behaviour flags,
 * evaluation limits and the verbose-debugging switch.
 */

import { DEFAULT_ITERATION_LIMIT, DEFAULT_RECURSION_LIMIT } from './constants';

// Global Flags
const flags = {
    traceRewrites: false,
    warnOnBuiltinFailure: true,
    orderlessBacktracking: true,
};

export type FlagName = keyof typeof flags;

const defaultFlags: Readonly<Record<FlagName, boolean>> = { ...flags };

function isFlagName(name: string): name is FlagName {
    return Object.prototype.hasOwnProperty.call(flags, name);
}

export function setFlag(name: FlagName, value: boolean) {
    if (isFlagName(name)) {
        flags[name] = value;
    } else {
        console.warn(`Attempted to set unknown flag: ${name}`);
    }
}

export function getFlag(name: FlagName): boolean {
    return flags[name] ?? false;
}

export function resetFlags() {
    flags.traceRewrites = defaultFlags.traceRewrites;
    flags.warnOnBuiltinFailure = defaultFlags.warnOnBuiltinFailure;
    flags.orderlessBacktracking = defaultFlags.orderlessBacktracking;
}

// Evaluation limits, used when a call does not override them
const limits = {
    recursion: DEFAULT_RECURSION_LIMIT,
    iteration: DEFAULT_ITERATION_LIMIT,
};

function checkLimit(kind: string, value: number): void {
    if (!Number.isSafeInteger(value) || value < 1) {
        throw new RangeError(`${kind} limit must be a positive integer, got ${value}`);
    }
}

export function getRecursionLimit(): number {
    return limits.recursion;
}

/** @returns The previous limit. */
export function setRecursionLimit(value: number): number {
    checkLimit('Recursion', value);
    const previous = limits.recursion;
    limits.recursion = value;
    return previous;
}

export function getIterationLimit(): number {
    return limits.iteration;
}

/** @returns The previous limit. */
export function setIterationLimit(value: number): number {
    checkLimit('Iteration', value);
    const previous = limits.iteration;
    limits.iteration = value;
    return previous;
}

export function resetLimits() {
    limits.recursion = DEFAULT_RECURSION_LIMIT;
    limits.iteration = DEFAULT_ITERATION_LIMIT;
}

let _debug_verbose_flag = false;

export function setDebugVerbose(value: boolean): void {
    _debug_verbose_flag = value;
}

export function getDebugVerbose(): boolean {
    return _debug_verbose_flag;
}
