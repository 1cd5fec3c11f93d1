/**
 * Structural Validator Module
 */

export * from './types';
export * from './rules';
export * from './structural-validator';
