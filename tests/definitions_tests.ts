/**
 * @file tests/definitions_tests.ts
 * @description Tests for the definition API and the assignment forms.
 */
import { describe, it, beforeEach } from 'node:test';
import assert from 'node:assert';
import { Expr, Int, Str, Sym, mkExpr } from '../src/types';
import { ATTR, SYS } from '../src/symbols';
import { Condition, HoldPattern, Pattern } from '../src/pattern';
import { EvaluationContext } from '../src/context';
import { evaluate } from '../src/evaluator';
import {
    clearAttributes, clearValues, defineDownValue, defineOwnValue, setAttributes, set, setDelayed, upSet,
    upSetDelayed
} from '../src/definitions';
import { DefinitionError, ProtectedSymbolError } from '../src/errors';
import { Kernel, resetKernel } from '../src/kernel';
import { printElement } from '../src/utils';
import { Greater, Plus, installTestBuiltins } from './builtins_fixture';
import { assert as check, assertEqual } from './utils';

describe("Definitions", () => {
    let ctx: EvaluationContext;
    let f: Sym;
    let g: Sym;
    let x: Sym;

    beforeEach(() => {
        resetKernel();
        const kernel = new Kernel();
        installTestBuiltins(kernel.builtins);
        ctx = kernel.context;
        f = Sym('f');
        g = Sym('g');
        x = Sym('x');
    });

    it("evaluates the right-hand side of set once, and not that of setDelayed", () => {
        const a = Sym('a');
        const b = Sym('b');
        assertEqual(printElement(set(ctx, a, Expr(Plus(), 1, 2))), '3', "set returns the value");
        assertEqual(printElement(setDelayed(ctx, b, Expr(Plus(), 1, 2))), 'Null', "setDelayed returns Null");
        const stored = ctx.getValues('OwnValues', a)[0];
        assert.strictEqual(stored.kind, 'Immediate');
        assertEqual(typeof stored.rhs === 'function' ? 'native' : printElement(stored.rhs), '3', "stored value");
        const delayed = ctx.getValues('OwnValues', b)[0];
        assertEqual(typeof delayed.rhs === 'function' ? 'native' : printElement(delayed.rhs), 'Plus[1, 2]', "stored unevaluated");
        assertEqual(printElement(evaluate(b, ctx)), '3', "b evaluates on use");
    });

    it("chooses the value category from the left-hand side", () => {
        const y = Sym('y');
        setDelayed(ctx, Expr(f, Pattern(x)), Int(1));
        setDelayed(ctx, mkExpr(Expr(f, Pattern(x)), [Pattern(y)]), Int(2));
        setDelayed(ctx, Expr(SYS.N, Expr(g, Pattern(x))), Int(3));
        setDelayed(ctx, Expr(SYS.Format, Expr(g, Pattern(x))), Int(4));
        setDelayed(ctx, Expr(SYS.Default, g), Int(5));
        assert.strictEqual(ctx.getValues('DownValues', f).length, 1);
        assert.strictEqual(ctx.getValues('SubValues', f).length, 1);
        assert.strictEqual(ctx.getValues('NValues', g).length, 1);
        assertEqual(printElement(ctx.getValues('NValues', g)[0].lhs), 'g[Pattern[x, Blank[]]]', "N wrapper dropped");
        assert.strictEqual(ctx.getValues('FormatValues', g).length, 1);
        assert.strictEqual(ctx.getValues('DefaultValues', g).length, 1);
        assert.throws(() => setDelayed(ctx, Int(1), Int(2)), DefinitionError);
    });

    it("moves a Condition on the left-hand side into the rule", () => {
        setDelayed(ctx, HoldPattern(Condition(Expr(f, Pattern(x)), Expr(Greater(), x, 0))), Str('positive'));
        const rule = ctx.getValues('DownValues', f)[0];
        assertEqual(printElement(rule.lhs), 'f[Pattern[x, Blank[]]]', "pattern without the condition");
        assertEqual(printElement(rule.condition ?? SYS.Null), 'Greater[x, 0]', "condition kept");
        assertEqual(printElement(evaluate(Expr(f, 2), ctx)), '"positive"', "condition holds");
        assertEqual(printElement(evaluate(Expr(f, 0), ctx)), 'f[0]', "condition fails");
    });

    it("replaces a definition with the same left-hand side", () => {
        setDelayed(ctx, Expr(f, Pattern(x)), Int(1));
        setDelayed(ctx, Expr(f, Pattern(x)), Int(2));
        assert.strictEqual(ctx.getValues('DownValues', f).length, 1);
        assertEqual(printElement(evaluate(Expr(f, 0), ctx)), '2', "newest definition");
    });

    it("attaches up-assignments to the argument symbols", () => {
        assertEqual(printElement(upSet(ctx, Expr(f, g), Expr(Plus(), 2, 3))), '5', "upSet returns the value");
        assert.strictEqual(ctx.getValues('UpValues', g).length, 1);
        assert.strictEqual(ctx.getValues('DownValues', f).length, 0);
        assertEqual(printElement(evaluate(Expr(f, g), ctx)), '5', "f[g]");

        upSetDelayed(ctx, Expr(f, Expr(Sym('h'), Pattern(x))), x);
        assert.strictEqual(ctx.getValues('UpValues', Sym('h')).length, 1);
        assert.throws(() => upSetDelayed(ctx, Expr(f, 1), Int(0)), DefinitionError);
        assert.throws(() => upSet(ctx, g, Int(0)), DefinitionError);
    });

    it("clears values by category or entirely", () => {
        defineOwnValue(ctx, f, f, Int(1));
        defineDownValue(ctx, f, Expr(f, Pattern(x)), Int(2));
        clearValues(ctx, f, 'OwnValues');
        assertEqual(printElement(evaluate(f, ctx)), 'f', "own value gone");
        assertEqual(printElement(evaluate(Expr(f, 0), ctx)), '2', "down value kept");
        clearValues(ctx, f);
        assertEqual(printElement(evaluate(Expr(f, 0), ctx)), 'f[0]', "everything gone");
    });

    it("refuses to change Protected or Locked symbols", () => {
        setAttributes(ctx, f, [ATTR.Protected]);
        assert.throws(() => defineDownValue(ctx, f, Expr(f, Pattern(x)), Int(1)), ProtectedSymbolError);
        assert.throws(() => setDelayed(ctx, Expr(f, Pattern(x)), Int(1)), ProtectedSymbolError);
        assert.throws(() => clearValues(ctx, f), ProtectedSymbolError);
        check(ctx.hasAttribute(SYS.SetDelayed, ATTR.Protected), "system heads are protected");

        setAttributes(ctx, g, [ATTR.Locked]);
        assert.throws(() => setAttributes(ctx, g, []), ProtectedSymbolError);
        assert.throws(() => clearAttributes(ctx, g), ProtectedSymbolError);
    });

    it("reports protection with the symbol and action", () => {
        setAttributes(ctx, f, [ATTR.Protected]);
        assert.throws(() => clearValues(ctx, f), (error: unknown) => {
            assert.ok(error instanceof ProtectedSymbolError);
            assert.strictEqual(error.symbol.name, 'f');
            assert.strictEqual(error.message, 'Symbol f is protected; cannot clear values');
            return true;
        });
    });
});
