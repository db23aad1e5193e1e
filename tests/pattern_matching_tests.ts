/**
 * @file tests/pattern_matching_tests.ts
 * @description Tests for single-element matching: blanks, names, conditions, alternatives and the other pattern heads.
 */
import { describe, it, beforeEach } from 'node:test';
import assert from 'node:assert';
import { Element, Expr, Int, Real, Str, Sym, mkExpr } from '../src/types';
import { SYS } from '../src/symbols';
import {
    Alternatives, Blank, Condition, Except, HoldPattern, Pattern, PatternTest, Verbatim,
    collectPatternNames, containsPattern
} from '../src/pattern';
import { MatchOptions, NO_MATCH, countMatches, findMatches, match, matches } from '../src/matcher';
import { Bindings } from '../src/bindings';
import { evaluate } from '../src/evaluator';
import { Kernel, resetKernel } from '../src/kernel';
import { ConstructionError } from '../src/errors';
import { printElement } from '../src/utils';
import { Greater, IntegerQ, installTestBuiltins } from './builtins_fixture';
import { assert as check, assertElement, assertEqual } from './utils';

const bound = (bindings: Bindings, name: string): Element => bindings.get(Sym(name)) ?? SYS.Null;

describe("Single-element pattern matching", () => {
    let options: MatchOptions;

    beforeEach(() => {
        resetKernel();
        const kernel = new Kernel();
        installTestBuiltins(kernel.builtins);
        const context = kernel.context;
        options = { context, evaluate: e => evaluate(e, context) };
    });

    it("matches anything with a blank and checks head constraints", () => {
        check(matches(Blank(), Expr(Sym('f'), 1)), "_ matches f[1]");
        check(matches(Blank(SYS.Integer), Int(3)), "_Integer matches 3");
        check(!matches(Blank(SYS.Integer), Real(3)), "_Integer does not match 3.");
        check(matches(Blank(Sym('f')), Expr(Sym('f'), 1, 2)), "_f matches f[1, 2]");
        check(!matches(Blank(SYS.Integer), Str('hello')), "_Integer does not match \"hello\"");
        const bare = match(Blank(), Int(42));
        check(bare.success && bare.bindings.isEmpty(), "_ matches 42 without bindings");
    });

    it("binds named patterns", () => {
        const result = match(Pattern(Sym('x')), Int(3));
        check(result.success, "x_ matches 3");
        assertElement(bound(result.bindings, 'x'), Int(3), "x bound to 3");
    });

    it("requires repeated names to bind equal values", () => {
        const f = Sym('f');
        const pattern = Expr(f, Pattern(Sym('x')), Pattern(Sym('x')));
        check(matches(pattern, Expr(f, 1, 1)), "f[x_, x_] matches f[1, 1]");
        assert.strictEqual(match(pattern, Expr(f, 1, 2)), NO_MATCH);
    });

    it("compares heads and arity literally", () => {
        const pattern = Expr(Sym('f'), Pattern(Sym('x')));
        check(!matches(pattern, Expr(Sym('g'), 1)), "different head");
        check(!matches(pattern, Expr(Sym('f'), 1, 2)), "different arity");
        check(!matches(pattern, Int(1)), "atom against compound pattern");
    });

    it("matches nested structure and pattern heads", () => {
        const f = Sym('f');
        const g = Sym('g');
        const nested = match(Expr(f, Expr(g, Pattern(Sym('x'))), Pattern(Sym('y'))), Expr(f, Expr(g, 1), 2));
        assertEqual(nested.bindings.toString(), '{x -> 1, y -> 2}', "nested bindings");

        const curried = match(mkExpr(Pattern(Sym('h')), [Pattern(Sym('x'))]), Expr(f, 1));
        assertEqual(curried.bindings.toString(), '{h -> f, x -> 1}', "pattern in head position");
    });

    it("tries alternatives in order", () => {
        const result = match(Alternatives(Pattern(Sym('x'), Blank(SYS.Integer)), Pattern(Sym('y'), Blank(SYS.String))), Str('a'));
        assertEqual(result.bindings.toString(), '{y -> "a"}', "second alternative");
        assert.throws(() => Alternatives(Int(1)), ConstructionError);
    });

    it("checks conditions literally without an evaluator", () => {
        check(matches(Condition(Pattern(Sym('x')), SYS.True), Int(1)), "literal True holds");
        check(!matches(Condition(Pattern(Sym('x')), Sym('test')), Int(1)), "anything else fails");
    });

    it("evaluates conditions with the bindings substituted", () => {
        const positive = Condition(Pattern(Sym('x')), Expr(Greater(), Sym('x'), 0));
        check(matches(positive, Int(5), options), "5 > 0");
        check(!matches(positive, Int(-1), options), "-1 is not > 0");
        check(!matches(positive, Sym('a'), options), "Greater[a, 0] stays unevaluated");
    });

    it("applies pattern tests to the matched element", () => {
        const integer = PatternTest(Pattern(Sym('x')), IntegerQ());
        check(matches(integer, Int(3), options), "IntegerQ[3]");
        check(!matches(integer, Str('3'), options), "IntegerQ[\"3\"]");
        check(!matches(integer, Int(3)), "no evaluator, no pattern test");
    });

    it("excludes with Except", () => {
        check(matches(Except(Int(0)), Int(1)), "1 is not 0");
        check(!matches(Except(Int(0)), Int(0)), "0 is excluded");
        check(matches(Except(Int(0), Blank(SYS.Integer)), Int(2)), "2 is a non-zero integer");
        check(!matches(Except(Int(0), Blank(SYS.Integer)), Str('a')), "\"a\" fails the alternative");
    });

    it("matches Verbatim contents literally and sees through HoldPattern", () => {
        check(matches(Verbatim(Blank()), Blank()), "Verbatim[_] matches _");
        check(!matches(Verbatim(Blank()), Int(1)), "Verbatim[_] does not match 1");
        const held = match(HoldPattern(Pattern(Sym('x'))), Int(1));
        assertElement(bound(held.bindings, 'x'), Int(1), "HoldPattern is transparent");
    });

    it("finds and counts matching subexpressions", () => {
        const expr = Expr(Sym('f'), 1, Expr(Sym('g'), 2), Str('a'));
        const found = findMatches(Blank(SYS.Integer), expr);
        assert.deepStrictEqual(found.map(m => printElement(m.element)), ['1', '2']);
        assert.strictEqual(countMatches(Blank(SYS.String), expr), 1);
    });

    it("collects pattern variable names and detects patterns", () => {
        const f = Sym('f');
        const pattern = Expr(f, Pattern(Sym('x')), Expr(Sym('g'), Pattern(Sym('y')), Pattern(Sym('x'))));
        assert.deepStrictEqual(collectPatternNames(pattern).map(s => s.name), ['x', 'y']);
        check(containsPattern(pattern), "pattern detected");
        check(!containsPattern(Expr(f, 1)), "plain expression");
        check(!containsPattern(Expr(f, Expr(Sym('g'), Sym('x')))), "nested plain expression");
    });
});
