/**
 * LaTeX Pipeline Module
 * Exports the parser, document model and scanning primitives
 */

export * from './types';
export * from './errors';
export * from './tokens';
export * from './span-scanner';
export * from './ParseSession';
export * from './ElementProtector';
export * from './ContentExtractor';
export * from './LaTeXDocument';
export * from './LaTeXParser';
