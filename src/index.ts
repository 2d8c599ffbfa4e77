export type * from './types/mindmap';

export * from './engine/errors';
export * from './engine/treeIndex';
export * from './engine/mutations';
export * from './engine/annotations';
export { BRANCH_PALETTE, resolveBranchColor } from './engine/branchColors';
export * from './engine/geometry';
export * from './engine/layout';
export * from './engine/selection';
export * from './engine/serialization';
export { createIdFactory, type IdFactory } from './engine/ids';

export { createHistory, type History, type HistoryEntry, type HistoryOptions } from './store/history';
export { createSelectionStore, type SelectionReducer, type SelectionStore, type SelectionStoreState } from './store/selectionStore';
export * from './store/dragStore';
export * from './store/viewportStore';
export * from './store/events';
export * from './store/mindmapStore';

export * from './interaction/hitTest';
export * from './interaction/shortcutPolicy';

export * from './config/config';
export { createLogger, getLogLevel, setLogLevel, setLogSink, type Logger, type LogLevel, type LogSink } from './utils/logger';
