/**
 * @file context.ts
 * @description Evaluation contexts. A context owns the attributes and value
 * rules of the symbols defined in it and may chain to a parent; lookups that
 * find nothing locally continue in the parent. Contexts change only through
 * explicit definition calls and are not safe for concurrent writers: callers
 * that share one context between evaluations must serialize definitions.
 */

import { Element, Sym, Expr, Int } from './types';
import { SYS } from './symbols';
import { AttributeSet, NO_ATTRIBUTES, SYSTEM_ATTRIBUTES, hasAttribute, isAttribute } from './attributes';
import { ValueCategory, ValueStore } from './values';
import { Rule, tryRules } from './rules';
import { BuiltinDefinition, BuiltinDispatcher, getGlobalBuiltins } from './builtins';
import { ConstructionError } from './errors';

export interface ContextOptions {
    name?: string;
    parent?: EvaluationContext;
    builtins?: BuiltinDispatcher;
}

const NO_RULES: readonly Rule[] = Object.freeze([]);

export class EvaluationContext {
    readonly name: string;
    readonly parent: EvaluationContext | undefined;
    readonly values: ValueStore = new ValueStore();
    private readonly attributeTable: Map<string, AttributeSet> = new Map();
    private readonly symbolTable: Map<string, Sym> = new Map();
    private readonly builtins: BuiltinDispatcher | undefined;

    constructor(options: ContextOptions = {}) {
        this.name = options.name ?? 'Global';
        this.parent = options.parent;
        this.builtins = options.builtins;
    }

    /** A nested scope whose lookups fall back to this context. */
    child(name: string = 'Local'): EvaluationContext {
        return new EvaluationContext({ name, parent: this });
    }

    // Symbols

    declareSymbol(symbol: Sym): void {
        this.symbolTable.set(symbol.name, symbol);
    }

    /** Finds a symbol declared here or in a parent. */
    lookupSymbol(name: string): Sym | undefined {
        return this.symbolTable.get(name) ?? this.parent?.lookupSymbol(name);
    }

    /** Names of symbols declared in this context itself, sorted. */
    symbolNames(): string[] {
        return [...this.symbolTable.keys()].sort();
    }

    // Attributes

    /**
     * Attributes set for `symbol` in this context or the nearest parent that
     * sets any; otherwise the attributes its builtin declares.
     */
    attributesOf(symbol: Sym): AttributeSet {
        return this.findAttributes(symbol) ?? this.lookupBuiltin(symbol)?.attributes ?? NO_ATTRIBUTES;
    }

    private findAttributes(symbol: Sym): AttributeSet | undefined {
        return this.attributeTable.get(symbol.name) ?? this.parent?.findAttributes(symbol);
    }

    hasAttribute(symbol: Sym, attribute: Sym): boolean {
        return hasAttribute(this.attributesOf(symbol), attribute);
    }

    /** @throws ConstructionError if an entry is not in the attribute vocabulary. */
    setAttributes(symbol: Sym, attributes: Iterable<Sym>): void {
        const checked = new Set<Sym>();
        for (const attr of attributes) {
            if (!isAttribute(attr)) throw new ConstructionError(`Unknown attribute: ${attr.name}`);
            checked.add(attr);
        }
        this.declareSymbol(symbol);
        this.attributeTable.set(symbol.name, checked);
    }

    addAttributes(symbol: Sym, attributes: Iterable<Sym>): void {
        this.setAttributes(symbol, [...this.attributesOf(symbol), ...attributes]);
    }

    removeAttributes(symbol: Sym, attributes: Iterable<Sym>): void {
        const removed = new Set([...attributes].map(a => a.name));
        this.setAttributes(symbol, [...this.attributesOf(symbol)].filter(a => !removed.has(a.name)));
    }

    /** Drops the attributes set here, exposing the parent's or builtin's again. */
    clearAttributes(symbol: Sym): void {
        this.attributeTable.delete(symbol.name);
    }

    // Values

    /** Rules of one category, from this context or the nearest parent defining any. */
    getValues(category: ValueCategory, symbol: Sym): readonly Rule[] {
        if (this.values.has(category, symbol)) return this.values.get(category, symbol);
        return this.parent ? this.parent.getValues(category, symbol) : NO_RULES;
    }

    addValue(category: ValueCategory, symbol: Sym, rule: Rule): void {
        this.declareSymbol(symbol);
        this.values.add(category, symbol, rule);
    }

    clearValues(symbol: Sym, category?: ValueCategory): void {
        this.values.clear(symbol, category);
    }

    /** Forgets every value, attribute and symbol of this context (not of its parents). */
    clearAll(): void {
        this.values.clearAll();
        this.attributeTable.clear();
        this.symbolTable.clear();
    }

    lookupBuiltin(symbol: Sym): BuiltinDefinition | undefined {
        return this.builtins?.lookupBuiltin(symbol) ?? this.parent?.lookupBuiltin(symbol);
    }

    /**
     * The default argument of `head` at `position` (1-based), taken from its
     * DefaultValues: a rule for `Default[head, position]` first, then
     * `Default[head]`.
     */
    defaultValueFor(head: Sym, position?: number): Element | undefined {
        const rules = this.getValues('DefaultValues', head);
        if (rules.length === 0) return undefined;
        const keys = position === undefined
            ? [Expr(SYS.Default, head)]
            : [Expr(SYS.Default, head, Int(position)), Expr(SYS.Default, head)];
        for (const key of keys) {
            const application = tryRules(rules, key, { context: this });
            if (application.matched) return application.result;
        }
        return undefined;
    }
}

// Process-wide global context and the stack of active contexts

let globalContext: EvaluationContext | undefined;
const contextStack: EvaluationContext[] = [];

/** A root context with the kernel's own heads given their attributes. */
export function createGlobalContext(builtins: BuiltinDispatcher = getGlobalBuiltins()): EvaluationContext {
    const context = new EvaluationContext({ name: 'Global', builtins });
    for (const [symbol, attributes] of SYSTEM_ATTRIBUTES) {
        context.setAttributes(symbol, attributes);
    }
    return context;
}

/** The process-wide context, created on first use. */
export function getGlobalContext(): EvaluationContext {
    if (!globalContext) globalContext = createGlobalContext();
    return globalContext;
}

/** Discards the global context and the context stack. */
export function resetGlobalContext(): void {
    globalContext = undefined;
    contextStack.length = 0;
}

/** The innermost context entered with `withContext`, or the global context. */
export function currentContext(): EvaluationContext {
    return contextStack.at(-1) ?? getGlobalContext();
}

export function withContext<T>(context: EvaluationContext, body: (context: EvaluationContext) => T): T {
    contextStack.push(context);
    try {
        return body(context);
    } finally {
        contextStack.pop();
    }
}
