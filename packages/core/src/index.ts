/**
 * @file packages/core/src/index.ts
 * @description Main entry point for @kivotos-codex/core package
 */

// Document-structuring engine
export * from './document';

// Entity records
export * from './entities/field-tables';
export * from './entities/records';

// Parsers
export * from './parsers/markdown';

// Wiki retrieval
export * from './wiki/client';
export * from './wiki/html';

// Shared modules
export * from './shared/config';
export * from './shared/logger';
export * from './shared/paths';
export * from './shared/revisions';

// Workflows
export * from './workflows/build-workflow';
export * from './workflows/collect-workflow';
