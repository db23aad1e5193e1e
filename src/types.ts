/**
 * @file types.ts
 * @description Core data structures of the kernel: symbols, atoms and
 * expressions, with their constructors. Every element is frozen on creation.
 */

import { internSymbol } from './symbols';
import { ConstructionError } from './errors';
import { ATTRIBUTE_NAMES } from './constants';

export type Sym = { readonly tag: 'Symbol', readonly name: string };

export type Atom =
    | { readonly tag: 'Atom', readonly kind: 'Integer', readonly value: number }
    | { readonly tag: 'Atom', readonly kind: 'Real', readonly value: number }
    | { readonly tag: 'Atom', readonly kind: 'Complex', readonly re: number, readonly im: number }
    | { readonly tag: 'Atom', readonly kind: 'String', readonly value: string }
    | { readonly tag: 'Atom', readonly kind: 'Boolean', readonly value: boolean }
    | { readonly tag: 'Atom', readonly kind: 'Null' }
    ;

export type AtomKind = Atom['kind'];

export interface Expr {
    readonly tag: 'Expr';
    readonly head: Head;
    readonly tail: readonly Element[];
    /** Local attributes, sorted by name. Not part of structural identity. */
    readonly attributes: readonly Sym[];
}

export type Head = Sym | Expr;
export type Element = Sym | Atom | Expr;

/** Plain values accepted wherever an element is expected. */
export type ElementLike = Element | number | string | boolean | null;

// Constructors

export const Sym = (name: string): Sym => internSymbol(name);

export const Int = (value: number): Atom & { kind: 'Integer' } => {
    if (!Number.isSafeInteger(value)) {
        throw new ConstructionError(`Integer atom requires a safe integer, got ${value}`);
    }
    return Object.freeze({ tag: 'Atom', kind: 'Integer', value });
};

export const Real = (value: number): Atom & { kind: 'Real' } => {
    if (typeof value !== 'number' || Number.isNaN(value)) {
        throw new ConstructionError(`Real atom requires a number, got ${String(value)}`);
    }
    return Object.freeze({ tag: 'Atom', kind: 'Real', value });
};

export const Complex = (re: number, im: number): Atom & { kind: 'Complex' } => {
    if (Number.isNaN(re) || Number.isNaN(im)) {
        throw new ConstructionError('Complex atom parts must be numbers');
    }
    return Object.freeze({ tag: 'Atom', kind: 'Complex', re, im });
};

export const Str = (value: string): Atom & { kind: 'String' } => Object.freeze({ tag: 'Atom', kind: 'String', value });

const TRUE_ATOM: Atom & { kind: 'Boolean' } = Object.freeze({ tag: 'Atom', kind: 'Boolean', value: true });
const FALSE_ATOM: Atom & { kind: 'Boolean' } = Object.freeze({ tag: 'Atom', kind: 'Boolean', value: false });
const NULL_ATOM: Atom & { kind: 'Null' } = Object.freeze({ tag: 'Atom', kind: 'Null' });

export const Bool = (value: boolean): Atom & { kind: 'Boolean' } => value ? TRUE_ATOM : FALSE_ATOM;
export const Null = (): Atom & { kind: 'Null' } => NULL_ATOM;

// Runtime guards, used at construction boundaries where values may come from untyped callers

export function isElement(value: unknown): value is Element {
    if (typeof value !== 'object' || value === null || !('tag' in value)) return false;
    switch (value.tag) {
        case 'Symbol': return 'name' in value && typeof value.name === 'string';
        case 'Atom': return 'kind' in value && typeof value.kind === 'string';
        case 'Expr': return 'head' in value && 'tail' in value && Array.isArray(value.tail);
        default: return false;
    }
}

export function isHead(value: unknown): value is Head {
    return isElement(value) && value.tag !== 'Atom';
}

/**
 * Converts a plain value to an element: integral numbers become Integer
 * atoms, other numbers Real atoms, strings String atoms.
 * @throws ConstructionError for an integral number outside the safe integer range.
 */
export function toElement(value: ElementLike): Element {
    if (value === null) return NULL_ATOM;
    switch (typeof value) {
        case 'number': return Number.isInteger(value) ? Int(value) : Real(value);
        case 'string': return Str(value);
        case 'boolean': return Bool(value);
        default:
            if (isElement(value)) return value;
            throw new ConstructionError(`Not an element: ${String(value)}`);
    }
}

const attributeNames: ReadonlySet<string> = new Set(ATTRIBUTE_NAMES);

function normalizeAttributes(attributes: Iterable<Sym>): readonly Sym[] {
    const byName = new Map<string, Sym>();
    for (const attr of attributes) {
        if (!isElement(attr) || attr.tag !== 'Symbol') {
            throw new ConstructionError(`Expression attribute must be a symbol, got ${String(attr)}`);
        }
        if (!attributeNames.has(attr.name)) {
            throw new ConstructionError(`Unknown attribute: ${attr.name}`);
        }
        byName.set(attr.name, attr);
    }
    return Object.freeze([...byName.values()].sort((a, b) => a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
}

const NO_ATTRIBUTES: readonly Sym[] = Object.freeze([]);

/**
 * Builds an expression from an explicit tail array.
 * @throws ConstructionError if the head is not a symbol or expression, a tail
 * entry is not an element, or an attribute is outside the vocabulary.
 */
export function mkExpr(head: Head, tail: readonly ElementLike[], attributes: Iterable<Sym> = NO_ATTRIBUTES): Expr {
    if (!isHead(head)) {
        throw new ConstructionError(`Expression head must be a symbol or expression, got ${String(head)}`);
    }
    const elements = Object.freeze(tail.map(toElement));
    const attrs = attributes === NO_ATTRIBUTES ? NO_ATTRIBUTES : normalizeAttributes(attributes);
    return Object.freeze({ tag: 'Expr', head, tail: elements, attributes: attrs });
}

/** `Expr(f, a, b)` builds `f[a, b]`. */
export const Expr = (head: Head, ...tail: ElementLike[]): Expr => mkExpr(head, tail);

// Type guards

export const isSym = (e: Element): e is Sym => e.tag === 'Symbol';
export const isAtom = (e: Element): e is Atom => e.tag === 'Atom';
export const isExpr = (e: Element): e is Expr => e.tag === 'Expr';

/** True if `e` is an expression whose head is the symbol `head`. */
export function hasHead(e: Element, head: Sym): e is Expr & { readonly head: Sym } {
    return e.tag === 'Expr' && e.head.tag === 'Symbol' && e.head.name === head.name;
}


// Copy-on-write helpers. Each returns a new expression.

export const withHead = (expr: Expr, head: Head): Expr => mkExpr(head, expr.tail, expr.attributes);

export const withTail = (expr: Expr, tail: readonly ElementLike[]): Expr => mkExpr(expr.head, tail, expr.attributes);

/** Adds local attributes to `expr`. */
export const withAttributes = (expr: Expr, attributes: Iterable<Sym>): Expr =>
    mkExpr(expr.head, expr.tail, [...expr.attributes, ...attributes]);

/** Removes the named local attributes, or all of them when none are given. */
export function withoutAttributes(expr: Expr, attributes?: Iterable<Sym>): Expr {
    if (attributes === undefined) return mkExpr(expr.head, expr.tail);
    const removed = new Set([...attributes].map(a => a.name));
    return mkExpr(expr.head, expr.tail, expr.attributes.filter(a => !removed.has(a.name)));
}

export const mapArgs = (expr: Expr, fn: (arg: Element, index: number) => ElementLike): Expr =>
    mkExpr(expr.head, expr.tail.map(fn), expr.attributes);

export const appendArg = (expr: Expr, arg: ElementLike): Expr => mkExpr(expr.head, [...expr.tail, arg], expr.attributes);

export const prependArg = (expr: Expr, arg: ElementLike): Expr => mkExpr(expr.head, [arg, ...expr.tail], expr.attributes);

export function hasLocalAttribute(expr: Expr, attribute: Sym): boolean {
    return expr.attributes.some(a => a.name === attribute.name);
}
