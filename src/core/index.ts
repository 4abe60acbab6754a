// Core module exports for eups-depgraph

// Resolver
export { ManifestResolver } from './resolver/manifestResolver';

// Graph
export { renderDot, DEFAULT_TITLE } from './graph/dotRenderer';
export { getTreeStats } from './graph/tree-stats';

// Config
export { ConfigManager, getConfigManager, DEFAULT_CONFIG, DEFAULT_BASE_URL } from './config';
export type { Config, LogLevel } from './config';

// Shared utilities
export * from './shared';
