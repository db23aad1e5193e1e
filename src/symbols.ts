/**
 * @file symbols.ts
 * @description The process-wide symbol table. Every symbol is interned here,
 * so two symbols with the same name are the same object and `===` is a valid
 * equality test between symbols obtained since the last reset.
 *
 * Lifecycle: the table is filled lazily by `internSymbol`. `resetSymbolTable`
 * drops every user symbol but keeps the pinned system symbols, so the
 * constants in `SYS` and `ATTR` stay valid across resets. Symbols obtained
 * before a reset are still compared correctly by name (`sameSymbol`), but
 * identity no longer holds for them. JavaScript runs this table on a single
 * thread, so no locking is involved.
 */

import type { Sym } from './types';
import { ConstructionError } from './errors';
import type { AttributeName } from './constants';

const symbolTable: Map<string, Sym> = new Map();
const pinnedSymbols: Map<string, Sym> = new Map();

let nextGensymId = 1;

export function internSymbol(name: string): Sym {
    if (typeof name !== 'string' || name.length === 0) {
        throw new ConstructionError(`Symbol name must be a non-empty string, got ${JSON.stringify(name)}`);
    }
    const existing = symbolTable.get(name);
    if (existing) return existing;
    const created: Sym = Object.freeze({ tag: 'Symbol', name });
    symbolTable.set(name, created);
    return created;
}

/** Returns the interned symbol for `name`, or undefined if it was never created. */
export function lookupSymbol(name: string): Sym | undefined {
    return symbolTable.get(name);
}

function pinSymbol(name: string): Sym {
    const sym = internSymbol(name);
    pinnedSymbols.set(name, sym);
    return sym;
}

/**
 * Creates a symbol whose name is not yet in the table.
 * @param prefix Leading part of the generated name.
 */
export function gensym(prefix: string = 'G'): Sym {
    let name = `${prefix}$${nextGensymId++}`;
    while (symbolTable.has(name)) {
        name = `${prefix}$${nextGensymId++}`;
    }
    return internSymbol(name);
}

export function symbolCount(): number {
    return symbolTable.size;
}

/**
 * Clears every user symbol and the gensym counter. Pinned system symbols
 * keep their identity.
 */
export function resetSymbolTable(): void {
    symbolTable.clear();
    for (const [name, sym] of pinnedSymbols) {
        symbolTable.set(name, sym);
    }
    nextGensymId = 1;
}

export function sameSymbol(a: Sym, b: Sym): boolean {
    return a === b || a.name === b.name;
}

/** Reserved heads and constants of the kernel. */
export const SYS = Object.freeze({
    Symbol: pinSymbol('Symbol'),
    Integer: pinSymbol('Integer'),
    Real: pinSymbol('Real'),
    Rational: pinSymbol('Rational'),
    Complex: pinSymbol('Complex'),
    String: pinSymbol('String'),
    List: pinSymbol('List'),
    Sequence: pinSymbol('Sequence'),
    Rule: pinSymbol('Rule'),
    RuleDelayed: pinSymbol('RuleDelayed'),
    Set: pinSymbol('Set'),
    SetDelayed: pinSymbol('SetDelayed'),
    Blank: pinSymbol('Blank'),
    BlankSequence: pinSymbol('BlankSequence'),
    BlankNullSequence: pinSymbol('BlankNullSequence'),
    Pattern: pinSymbol('Pattern'),
    Condition: pinSymbol('Condition'),
    Alternatives: pinSymbol('Alternatives'),
    PatternTest: pinSymbol('PatternTest'),
    Optional: pinSymbol('Optional'),
    Repeated: pinSymbol('Repeated'),
    RepeatedNull: pinSymbol('RepeatedNull'),
    Except: pinSymbol('Except'),
    Verbatim: pinSymbol('Verbatim'),
    HoldPattern: pinSymbol('HoldPattern'),
    Default: pinSymbol('Default'),
    N: pinSymbol('N'),
    Format: pinSymbol('Format'),
    UpSet: pinSymbol('UpSet'),
    UpSetDelayed: pinSymbol('UpSetDelayed'),
    True: pinSymbol('True'),
    False: pinSymbol('False'),
    Null: pinSymbol('Null'),
    Nothing: pinSymbol('Nothing'),
});

/** The attribute vocabulary as symbols. */
export const ATTR = Object.freeze({
    Protected: pinSymbol('Protected'),
    ReadProtected: pinSymbol('ReadProtected'),
    Locked: pinSymbol('Locked'),
    Constant: pinSymbol('Constant'),
    Temporary: pinSymbol('Temporary'),
    HoldFirst: pinSymbol('HoldFirst'),
    HoldRest: pinSymbol('HoldRest'),
    HoldAll: pinSymbol('HoldAll'),
    HoldAllComplete: pinSymbol('HoldAllComplete'),
    SequenceHold: pinSymbol('SequenceHold'),
    NHoldFirst: pinSymbol('NHoldFirst'),
    NHoldRest: pinSymbol('NHoldRest'),
    NHoldAll: pinSymbol('NHoldAll'),
    Flat: pinSymbol('Flat'),
    Orderless: pinSymbol('Orderless'),
    OneIdentity: pinSymbol('OneIdentity'),
    Listable: pinSymbol('Listable'),
    NumericFunction: pinSymbol('NumericFunction'),
    Stub: pinSymbol('Stub'),
} satisfies Record<AttributeName, Sym>);
