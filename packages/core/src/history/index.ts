export { HistoryManager, DEFAULT_HISTORY_SIZE } from './HistoryManager';
export type { HistoryManagerOptions, HistoryState } from './HistoryManager';
