/**
 * @file constants.ts
 * @description Shared constants: evaluation limits and the attribute vocabulary.
 */

export const DEFAULT_RECURSION_LIMIT = 256;
export const DEFAULT_ITERATION_LIMIT = 1000;
export const DEFAULT_REPLACE_LIMIT = 1000;
export const DEFAULT_FIXED_POINT_LIMIT = 100;

// Guards printing, hashing and equality against pathological nesting.
export const MAX_STACK_DEPTH = 20000;

export const ATTRIBUTE_NAMES = [
    // protection
    'Protected', 'ReadProtected', 'Locked', 'Constant', 'Temporary',
    // argument holding
    'HoldFirst', 'HoldRest', 'HoldAll', 'HoldAllComplete', 'SequenceHold',
    // numeric holding
    'NHoldFirst', 'NHoldRest', 'NHoldAll',
    // structural
    'Flat', 'Orderless', 'OneIdentity', 'Listable',
    'NumericFunction', 'Stub',
] as const;

export type AttributeName = typeof ATTRIBUTE_NAMES[number];
