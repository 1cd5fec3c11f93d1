/**
 * Translation Dispatch Module
 * Exports all translation-related utilities
 */

export * from './types';
export * from './ContextManager';
export * from './CheckpointManager';
export * from './TranslationDispatcher';
