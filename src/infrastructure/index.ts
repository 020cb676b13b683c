export { loadConfig } from './config.js';
export type { AppConfig, LogLevel } from './config.js';
export { createLogger, componentLogger } from './logger.js';
export type { Component, LoggerOptions } from './logger.js';
export { default as pipelinePlugin } from './pipeline-plugin.js';
export type { Pipeline, PipelinePluginOptions } from './pipeline-plugin.js';
export { ProgressWatcher } from './progress/index.js';
export type { ProgressWatcherOptions } from './progress/index.js';
