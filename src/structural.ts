/**
 * @file structural.ts
 * @description Structural equality, hashing and canonical ordering of
 * elements, plus the atom-level queries built on them.
 *
 * An expression's local attributes take no part in equality, hashing or
 * ordering: two expressions are the same value when their heads and tails are.
 */

import type { Atom, Element, Head, Sym } from './types';
import { SYS } from './symbols';
import { printAtom, printElement } from './utils';
import { MAX_STACK_DEPTH } from './constants';

/**
 * Checks if two elements are structurally equal.
 * @param depth Recursion depth.
 */
export function elementsEqual(a: Element, b: Element, depth = 0): boolean {
    if (a === b) return true;
    if (depth > MAX_STACK_DEPTH) throw new Error(`Structural equality check depth exceeded (elementsEqual depth: ${depth})`);
    switch (a.tag) {
        case 'Symbol': return b.tag === 'Symbol' && a.name === b.name;
        case 'Atom': return b.tag === 'Atom' && atomsEqual(a, b);
        case 'Expr': {
            if (b.tag !== 'Expr' || a.tail.length !== b.tail.length) return false;
            if (!elementsEqual(a.head, b.head, depth + 1)) return false;
            for (let i = 0; i < a.tail.length; i++) {
                if (!elementsEqual(a.tail[i], b.tail[i], depth + 1)) return false;
            }
            return true;
        }
        default:
            const exhaustiveCheck: never = a;
            throw new Error(`elementsEqual: Unhandled element: ${JSON.stringify(exhaustiveCheck)}`);
    }
}

function atomsEqual(a: Atom, b: Atom): boolean {
    switch (a.kind) {
        case 'Integer': return b.kind === 'Integer' && a.value === b.value;
        case 'Real': return b.kind === 'Real' && a.value === b.value;
        case 'String': return b.kind === 'String' && a.value === b.value;
        case 'Boolean': return b.kind === 'Boolean' && a.value === b.value;
        case 'Complex': return b.kind === 'Complex' && a.re === b.re && a.im === b.im;
        case 'Null': return b.kind === 'Null';
    }
}

// FNV-1a over strings, folded for compound nodes
const FNV_OFFSET = 0x811c9dc5;
const FNV_PRIME = 0x01000193;

function hashString(text: string, seed: number = FNV_OFFSET): number {
    let h = seed;
    for (let i = 0; i < text.length; i++) {
        h = Math.imul(h ^ text.charCodeAt(i), FNV_PRIME);
    }
    return h >>> 0;
}

function mix(h: number, value: number): number {
    return Math.imul(h ^ value, FNV_PRIME) >>> 0;
}

const exprHashCache: WeakMap<Element, number> = new WeakMap();

/** Hash consistent with `elementsEqual`. Expression hashes are memoized. */
export function hashElement(element: Element, depth = 0): number {
    if (depth > MAX_STACK_DEPTH) throw new Error(`hashElement depth exceeded (depth: ${depth})`);
    switch (element.tag) {
        case 'Symbol': return hashString(element.name, hashString('S'));
        case 'Atom': return hashString(printAtom(element), hashString(element.kind));
        case 'Expr': {
            const cached = exprHashCache.get(element);
            if (cached !== undefined) return cached;
            let h = mix(hashString('E'), hashElement(element.head, depth + 1));
            for (const arg of element.tail) {
                h = mix(h, hashElement(arg, depth + 1));
            }
            h = mix(h, element.tail.length);
            exprHashCache.set(element, h);
            return h;
        }
    }
}

/**
 * The head of any element: `f` for `f[...]`, `Integer`/`Real`/`Complex`/
 * `String` for atoms of those kinds, `Symbol` for symbols, booleans and null.
 */
export function headOf(element: Element): Head {
    switch (element.tag) {
        case 'Expr': return element.head;
        case 'Symbol': return SYS.Symbol;
        case 'Atom':
            switch (element.kind) {
                case 'Integer': return SYS.Integer;
                case 'Real': return SYS.Real;
                case 'Complex': return SYS.Complex;
                case 'String': return SYS.String;
                case 'Boolean':
                case 'Null':
                    return SYS.Symbol;
            }
    }
}

/** Walks `f[a][b][c]` down to `f`. */
export function rootSymbol(head: Head): Sym {
    let current: Head = head;
    while (current.tag === 'Expr') current = current.head;
    return current;
}

export function isNumeric(element: Element): boolean {
    return element.tag === 'Atom' && (element.kind === 'Integer' || element.kind === 'Real' || element.kind === 'Complex');
}

export function isExact(element: Element): boolean {
    return element.tag === 'Atom' && element.kind === 'Integer';
}

/** Native number of a real-valued numeric atom. */
export function toNumber(element: Element): number | undefined {
    if (element.tag !== 'Atom') return undefined;
    return element.kind === 'Integer' || element.kind === 'Real' ? element.value : undefined;
}

/** Logical truth: the symbol `True` or the boolean atom `true`. */
export function isTrue(element: Element): boolean {
    if (element.tag === 'Symbol') return element.name === SYS.True.name;
    return element.tag === 'Atom' && element.kind === 'Boolean' && element.value;
}

function orderClass(element: Element): number {
    if (element.tag === 'Expr') return 3;
    if (isNumeric(element)) return 0;
    if (element.tag === 'Atom' && element.kind === 'String') return 1;
    return 2;
}

function numericKey(element: Element): [number, number] {
    if (element.tag === 'Atom') {
        if (element.kind === 'Integer' || element.kind === 'Real') return [element.value, 0];
        if (element.kind === 'Complex') return [element.re, element.im];
    }
    return [0, 0];
}

function compareText(a: string, b: string): number {
    return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Canonical order used for Orderless arguments: numbers (by value), then
 * strings, then symbols, then expressions; remaining ties by printed form.
 */
export function compareElements(a: Element, b: Element): number {
    const classA = orderClass(a);
    const classB = orderClass(b);
    if (classA !== classB) return classA - classB;
    if (classA === 0) {
        const [reA, imA] = numericKey(a);
        const [reB, imB] = numericKey(b);
        if (reA !== reB) return reA < reB ? -1 : 1;
        if (imA !== imB) return imA < imB ? -1 : 1;
    }
    return compareText(printElement(a), printElement(b));
}
