/**
 * @file bindings.ts
 * @description Immutable maps from pattern variables to the elements they
 * matched. Every operation returns a new `Bindings` (or the receiver itself
 * when nothing changes); an existing instance is never modified.
 */

import type { Element, Sym } from './types';
import { BindingConflict } from './errors';
import { elementsEqual } from './structural';
import { printElement } from './utils';

interface BindingEntry {
    readonly symbol: Sym;
    readonly value: Element;
}

export class Bindings {
    private static readonly EMPTY = new Bindings(new Map());

    private constructor(private readonly entries: ReadonlyMap<string, BindingEntry>) {}

    static empty(): Bindings {
        return Bindings.EMPTY;
    }

    /** @throws BindingConflict if the pairs bind one name to two different values. */
    static fromPairs(pairs: Iterable<readonly [Sym, Element]>): Bindings {
        let result = Bindings.EMPTY;
        for (const [symbol, value] of pairs) {
            result = result.bind(symbol, value);
        }
        return result;
    }

    static single(symbol: Sym, value: Element): Bindings {
        return Bindings.EMPTY.bind(symbol, value);
    }

    get size(): number {
        return this.entries.size;
    }

    isEmpty(): boolean {
        return this.entries.size === 0;
    }

    get(symbol: Sym): Element | undefined {
        return this.entries.get(symbol.name)?.value;
    }

    has(symbol: Sym): boolean {
        return this.entries.has(symbol.name);
    }

    symbols(): Sym[] {
        return [...this.entries.values()].map(entry => entry.symbol);
    }

    pairs(): Array<[Sym, Element]> {
        return [...this.entries.values()].map(entry => [entry.symbol, entry.value]);
    }

    /**
     * Binds `symbol` to `value`, or returns undefined if it is already bound
     * to something else. Used by the matcher, where a conflict is just a
     * failed branch.
     */
    tryBind(symbol: Sym, value: Element): Bindings | undefined {
        const existing = this.entries.get(symbol.name);
        if (existing) {
            return elementsEqual(existing.value, value) ? this : undefined;
        }
        const next = new Map(this.entries);
        next.set(symbol.name, { symbol, value });
        return new Bindings(next);
    }

    /**
     * Binds `symbol` to `value`. Repeating an identical binding returns the
     * same instance.
     * @throws BindingConflict if `symbol` is bound to a different value.
     */
    bind(symbol: Sym, value: Element): Bindings {
        const result = this.tryBind(symbol, value);
        if (result) return result;
        const existing = this.entries.get(symbol.name);
        throw new BindingConflict(symbol, existing ? existing.value : value, value);
    }

    unbind(symbol: Sym): Bindings {
        if (!this.entries.has(symbol.name)) return this;
        const next = new Map(this.entries);
        next.delete(symbol.name);
        return next.size === 0 ? Bindings.EMPTY : new Bindings(next);
    }

    isCompatible(other: Bindings): boolean {
        for (const [name, entry] of other.entries) {
            const mine = this.entries.get(name);
            if (mine && !elementsEqual(mine.value, entry.value)) return false;
        }
        return true;
    }

    /** @throws BindingConflict if the two bindings disagree on a name. */
    merge(other: Bindings): Bindings {
        if (this.isEmpty()) return other;
        let result: Bindings = this;
        for (const entry of other.entries.values()) {
            result = result.bind(entry.symbol, entry.value);
        }
        return result;
    }

    equals(other: Bindings): boolean {
        if (this.size !== other.size) return false;
        for (const name of this.entries.keys()) {
            if (!other.entries.has(name)) return false;
        }
        return this.isCompatible(other);
    }

    toString(): string {
        const parts = [...this.entries.values()].map(entry => `${entry.symbol.name} -> ${printElement(entry.value)}`);
        return `{${parts.join(', ')}}`;
    }
}
