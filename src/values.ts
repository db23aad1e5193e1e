/**
 * @file values.ts
 * @description Per-symbol storage of the seven value categories.
 */

import type { Sym } from './types';
import type { Rule } from './rules';
import { elementsEqual } from './structural';

export type ValueCategory =
    | 'OwnValues'
    | 'DownValues'
    | 'UpValues'
    | 'SubValues'
    | 'NValues'
    | 'DefaultValues'
    | 'FormatValues';

export const VALUE_CATEGORIES: readonly ValueCategory[] = [
    'OwnValues', 'DownValues', 'UpValues', 'SubValues', 'NValues', 'DefaultValues', 'FormatValues',
];

const NO_RULES: readonly Rule[] = Object.freeze([]);

function sameDefinition(a: Rule, b: Rule): boolean {
    if (!elementsEqual(a.lhs, b.lhs)) return false;
    if (a.condition === undefined || b.condition === undefined) return a.condition === b.condition;
    return elementsEqual(a.condition, b.condition);
}

/**
 * Rule lists per category and symbol name. Lists keep definition order;
 * priorities are applied when rules are tried.
 */
export class ValueStore {
    private readonly tables: Map<ValueCategory, Map<string, Rule[]>> = new Map();

    private table(category: ValueCategory): Map<string, Rule[]> {
        let table = this.tables.get(category);
        if (!table) {
            table = new Map();
            this.tables.set(category, table);
        }
        return table;
    }

    /**
     * Adds a rule. A rule with the same left-hand side and condition as an
     * existing one replaces it in place.
     */
    add(category: ValueCategory, symbol: Sym, rule: Rule): void {
        const table = this.table(category);
        const rules = table.get(symbol.name);
        if (!rules) {
            table.set(symbol.name, [rule]);
            return;
        }
        const existing = rules.findIndex(r => sameDefinition(r, rule));
        if (existing >= 0) {
            rules[existing] = rule;
        } else {
            rules.push(rule);
        }
    }

    get(category: ValueCategory, symbol: Sym): readonly Rule[] {
        return this.tables.get(category)?.get(symbol.name) ?? NO_RULES;
    }

    has(category: ValueCategory, symbol: Sym): boolean {
        return this.get(category, symbol).length > 0;
    }

    /** Clears one category of `symbol`, or all of them. */
    clear(symbol: Sym, category?: ValueCategory): void {
        const categories = category ? [category] : VALUE_CATEGORIES;
        for (const c of categories) {
            this.tables.get(c)?.delete(symbol.name);
        }
    }

    clearAll(): void {
        this.tables.clear();
    }

    /** Names of symbols with at least one stored rule. */
    symbolNames(): string[] {
        const names = new Set<string>();
        for (const table of this.tables.values()) {
            for (const [name, rules] of table) {
                if (rules.length > 0) names.add(name);
            }
        }
        return [...names].sort();
    }
}
