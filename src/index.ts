export * from './constants';
export * from './errors';
export * from './state';
export * from './symbols';
export * from './types';
export * from './utils';
export * from './structural';
export * from './attributes';
export * from './bindings';
export * from './pattern';
export * from './substitution';
export * from './matcher';
export * from './rules';
export * from './values';
export * from './builtins';
export * from './context';
export * from './transforms';
export * from './evaluator';
export * from './definitions';
export * from './format';
export * from './kernel';
