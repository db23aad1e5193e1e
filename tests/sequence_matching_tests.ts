/**
 * @file tests/sequence_matching_tests.ts
 * @description Tests for argument-list matching with sequence patterns, optional arguments, Flat and Orderless.
 */
import { describe, it, beforeEach } from 'node:test';
import assert from 'node:assert';
import { Element, Expr, Int, Str, Sym } from '../src/types';
import { ATTR, SYS } from '../src/symbols';
import { Blank, BlankNullSequence, BlankSequence, Optional, Pattern, Repeated, RepeatedNull } from '../src/pattern';
import { match, matchAll, matchSequence, matches } from '../src/matcher';
import { Bindings } from '../src/bindings';
import { EvaluationContext } from '../src/context';
import { defineDefaultValue } from '../src/definitions';
import { setFlag } from '../src/state';
import { resetKernel } from '../src/kernel';
import { printElement } from '../src/utils';
import { assert as check, assertEqual } from './utils';

const show = (bindings: Bindings, name: string): string => printElement(bindings.get(Sym(name)) ?? SYS.Null);
const named = (name: string, inner: Element = Blank()): Element => Pattern(Sym(name), inner);

describe("Sequence patterns", () => {
    let f: Sym;

    beforeEach(() => {
        resetKernel();
        f = Sym('f');
    });

    it("binds a BlankSequence variable to a Sequence of the arguments", () => {
        const result = match(Expr(f, named('x', BlankSequence())), Expr(f, 1, 2, 3));
        assertEqual(show(result.bindings, 'x'), 'Sequence[1, 2, 3]', "x__ takes every argument");
        check(!matches(Expr(f, named('x', BlankSequence())), Expr(f)), "x__ needs at least one argument");
    });

    it("lets BlankNullSequence match nothing", () => {
        const result = match(Expr(f, named('x', BlankNullSequence())), Expr(f));
        check(result.success, "x___ matches f[]");
        assertEqual(show(result.bindings, 'x'), 'Sequence[]', "empty sequence");
    });

    it("prefers the shortest run for earlier sequence patterns", () => {
        const single = match(Expr(f, named('x', BlankSequence()), named('y')), Expr(f, 1, 2, 3));
        assertEqual(single.bindings.toString(), '{x -> Sequence[1, 2], y -> 3}', "x__, y_");

        const two = match(Expr(f, named('x', BlankSequence()), named('y', BlankSequence())), Expr(f, 1, 2, 3));
        assertEqual(two.bindings.toString(), '{x -> Sequence[1], y -> Sequence[2, 3]}', "x__, y__");
    });

    it("enumerates every split with matchAll", () => {
        const all = matchAll(Expr(f, named('x', BlankSequence()), named('y', BlankSequence())), Expr(f, 1, 2, 3));
        assert.deepStrictEqual(all.map(b => b.toString()), [
            '{x -> Sequence[1], y -> Sequence[2, 3]}',
            '{x -> Sequence[1, 2], y -> Sequence[3]}',
        ]);
        assert.strictEqual(matchAll(Expr(f, named('x', BlankSequence()), named('y', BlankSequence())), Expr(f, 1, 2, 3), {}, 1).length, 1);
    });

    it("backtracks until repeated sequence variables agree", () => {
        const result = match(Expr(f, named('x', BlankSequence()), named('x', BlankSequence())), Expr(f, 1, 2, 1, 2));
        assertEqual(show(result.bindings, 'x'), 'Sequence[1, 2]', "x__, x__ against 1, 2, 1, 2");
        check(!matches(Expr(f, named('x', BlankSequence()), named('x', BlankSequence())), Expr(f, 1, 2, 3)), "no equal halves");
    });

    it("binds a named sequence pattern to a Sequence even for one element", () => {
        const result = match(named('x', BlankSequence()), Int(1));
        assertEqual(show(result.bindings, 'x'), 'Sequence[1]', "single element");
    });

    it("matches an argument list directly", () => {
        const result = matchSequence([named('x', BlankNullSequence()), Int(3)], [Int(1), Int(2), Int(3)]);
        assertEqual(show(result.bindings, 'x'), 'Sequence[1, 2]', "x___ followed by a literal");
    });

    it("matches runs with Repeated and RepeatedNull", () => {
        check(matches(Expr(f, Repeated(Int(1))), Expr(f, 1, 1, 1)), "1.. against 1, 1, 1");
        check(!matches(Expr(f, Repeated(Int(1))), Expr(f, 1, 2)), "1.. against 1, 2");
        check(!matches(Expr(f, Repeated(Int(1))), Expr(f)), "1.. needs one element");
        check(matches(Expr(f, RepeatedNull(Int(1))), Expr(f)), "1... matches nothing");
        const result = match(Expr(f, named('x', Repeated(Blank(SYS.Integer)))), Expr(f, 1, 2));
        assertEqual(show(result.bindings, 'x'), 'Sequence[1, 2]', "named Repeated");
    });

    it("fills in explicit Optional defaults", () => {
        const pattern = Expr(f, named('x'), Optional(named('y'), Int(0)));
        assertEqual(match(pattern, Expr(f, 1)).bindings.toString(), '{x -> 1, y -> 0}', "missing argument");
        assertEqual(match(pattern, Expr(f, 1, 2)).bindings.toString(), '{x -> 1, y -> 2}', "present argument");
    });

    it("takes Optional defaults from the head's default values", () => {
        const context = new EvaluationContext();
        defineDefaultValue(context, f, Expr(SYS.Default, f), Int(7));
        defineDefaultValue(context, f, Expr(SYS.Default, f, 3), Int(9));
        const pattern = Expr(f, named('x'), Optional(named('y')), Optional(named('z')));
        const result = match(pattern, Expr(f, 1), Bindings.empty(), { context });
        assertEqual(result.bindings.toString(), '{x -> 1, y -> 7, z -> 9}', "positional default first");
        check(!matches(pattern, Expr(f, 1)), "no context, no default");
    });

    describe("under Orderless and Flat", () => {
        let context: EvaluationContext;

        beforeEach(() => {
            context = new EvaluationContext();
        });

        it("matches Orderless arguments in any order", () => {
            context.setAttributes(f, [ATTR.Orderless]);
            const pattern = Expr(f, named('x', Blank(SYS.String)), named('y', Blank(SYS.Integer)));
            const result = match(pattern, Expr(f, 1, Str('a')), Bindings.empty(), { context });
            assertEqual(result.bindings.toString(), '{x -> "a", y -> 1}', "string and integer swapped");
        });

        it("backtracks into other Orderless choices unless told not to", () => {
            context.setAttributes(f, [ATTR.Orderless]);
            const g = Sym('g');
            const pattern = Expr(f, named('x'), Expr(g, named('x')));
            const expr = Expr(f, Expr(g, 1), 1);
            const result = match(pattern, expr, Bindings.empty(), { context });
            assertEqual(show(result.bindings, 'x'), '1', "second choice for x");

            setFlag('orderlessBacktracking', false);
            check(!matches(pattern, expr, { context }), "eager commitment to the first choice");
        });

        it("picks Orderless sequence members from anywhere", () => {
            context.setAttributes(f, [ATTR.Orderless]);
            const pattern = Expr(f, named('x', BlankSequence(SYS.Integer)), named('s', Blank(SYS.String)));
            const result = match(pattern, Expr(f, 1, Str('a'), 2), Bindings.empty(), { context });
            assertEqual(result.bindings.toString(), '{x -> Sequence[1, 2], s -> "a"}', "integers around a string");
        });

        it("matches a trailing sequence against many Orderless arguments", { timeout: 5000 }, () => {
            context.setAttributes(f, [ATTR.Orderless]);
            const args = Array.from({ length: 30 }, (_, i) => i);
            const result = match(Expr(f, named('a'), named('r', BlankSequence())), Expr(f, ...args), Bindings.empty(), { context });
            assertEqual(show(result.bindings, 'a'), '0', "a takes the first argument");
            assertEqual(show(result.bindings, 'r'), `Sequence[${args.slice(1).join(', ')}]`, "r takes the rest");
        });

        it("skips sequence lengths the later patterns cannot absorb", { timeout: 5000 }, () => {
            context.setAttributes(f, [ATTR.Orderless]);
            const args = Array.from({ length: 30 }, (_, i) => i);
            const pattern = Expr(f, named('r', BlankSequence()), named('y', Blank(SYS.String)));
            const result = match(pattern, Expr(f, ...args, Str('z')), Bindings.empty(), { context });
            assertEqual(show(result.bindings, 'y'), '"z"', "y takes the string");
            check(!matches(pattern, Expr(f, ...args), { context }), "no string to take");
        });

        it("lets a single pattern absorb a run of Flat arguments", () => {
            context.setAttributes(f, [ATTR.Flat]);
            const result = match(Expr(f, named('x'), named('y')), Expr(f, 1, 2, 3), Bindings.empty(), { context });
            assertEqual(result.bindings.toString(), '{x -> 1, y -> f[2, 3]}', "y takes f[2, 3]");
            check(!matches(Expr(f, named('x'), named('y')), Expr(f, 1, 2, 3)), "not Flat without the context");
        });

        it("picks and regroups arguments of a Flat Orderless head", () => {
            context.setAttributes(f, [ATTR.Flat, ATTR.Orderless]);
            const pattern = Expr(f, named('x', Blank(SYS.String)), named('y'));
            const result = match(pattern, Expr(f, 1, Str('s'), 2), Bindings.empty(), { context });
            assertEqual(result.bindings.toString(), '{x -> "s", y -> f[1, 2]}', "x picked from the middle, y takes the rest");
        });
    });
});
