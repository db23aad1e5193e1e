/**
 * @file utils.ts
 * @description FullForm printing of elements and verbose logging.
 */

import type { Atom, Element } from './types';
import { getDebugVerbose } from './state';
import { MAX_STACK_DEPTH } from './constants';

function printReal(value: number): string {
    if (!Number.isFinite(value)) return value > 0 ? 'Infinity' : '-Infinity';
    return Number.isInteger(value) ? `${value}.` : String(value);
}

export function printAtom(atom: Atom): string {
    switch (atom.kind) {
        case 'Integer': return String(atom.value);
        case 'Real': return printReal(atom.value);
        case 'Complex': return `Complex[${printReal(atom.re)}, ${printReal(atom.im)}]`;
        case 'String': return JSON.stringify(atom.value);
        case 'Boolean': return atom.value ? 'True' : 'False';
        case 'Null': return 'Null';
        default:
            const exhaustiveCheck: never = atom;
            throw new Error(`printAtom: Unhandled atom kind: ${JSON.stringify(exhaustiveCheck)}`);
    }
}

/**
 * Prints an element in FullForm, e.g. `f[x, "text", 2.]`.
 * @param element The element to print.
 * @param stackDepth Current nesting depth.
 */
export function printElement(element: Element, stackDepth = 0): string {
    if (stackDepth > MAX_STACK_DEPTH) return '<max_depth_exceeded>';
    switch (element.tag) {
        case 'Symbol': return element.name;
        case 'Atom': return printAtom(element);
        case 'Expr': {
            const head = printElement(element.head, stackDepth + 1);
            const args = element.tail.map(arg => printElement(arg, stackDepth + 1));
            return `${head}[${args.join(', ')}]`;
        }
        default:
            const exhaustiveCheck: never = element;
            throw new Error(`printElement: Unhandled element tag: ${JSON.stringify(exhaustiveCheck)}`);
    }
}

/**
 * Logs messages to the console if verbose debugging is enabled.
 * @param message The primary message to log.
 * @param optionalParams Additional parameters to log.
 */
export function consoleLog(message?: unknown, ...optionalParams: unknown[]): void {
    if (getDebugVerbose()) {
        console.log("[VERBOSE]", message, ...optionalParams);
    }
}
