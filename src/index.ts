/**
 * texbridge
 * Structure-preserving LaTeX translation: parse, reconstruct, validate
 */

export * from './latex';
export * from './validator';
export * from './utils/translation';
export { loadConfig, DEFAULT_CONFIG, type AppConfig } from './utils/config';
export { estimateTokens } from './utils/token-counter';
