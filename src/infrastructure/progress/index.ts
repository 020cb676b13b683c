export { ProgressWatcher } from './progress-watcher.js';
export type { ProgressWatcherOptions } from './progress-watcher.js';
