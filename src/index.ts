/**
 * Ledgerline — artifact-addressed research runtime.
 *
 * Public exports for programmatic use. Importing this module has no side
 * effects; `main.ts` is the runnable entry point.
 */

export { createApp, createAppContext } from './server';
export type { AppContext } from './server';
export * from './domain';
export * from './engine/state-machine';
export * from './engine/verdict';
export * from './engine/refinement-loop';
export * from './storage/artifact-store';
export * from './storage/serialize';
export * from './sandbox/sandbox';
export * from './audit/audit-service';
export * from './audit/sinks';
export * from './llm';
export * from './llm/schemas';
export * from './llm/generation-client';
export * from './llm/adapters/gemini';
export * from './search/search-client';
export * from './search/deep-search';
export * from './analysis/chain';
export * from './analysis/analysis-stepper';
export * from './analysis/chain-compiler';
export * from './visualization/chart-spec';
export * from './visualization/feedback-rules';
export * from './visualization/figure-renderer';
export * from './visualization/chart-refiner';
export * from './writing/self-review';
export * from './writing/reference-index';
export * from './writing/report-writer';
export * from './collection/data-collection';
export * from './runtime/orchestrator';
export * from './pipeline/research-pipeline';
export { loadConfig } from './config';
export type { Config } from './config';
export { logger, createLogger, setLogHandler, resetLogHandler, setLogLevel, parseLogLevel, LogLevel } from './logger';
export type { Logger, LogEntry, LogHandler } from './logger';
