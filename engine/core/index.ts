/**
 * Influence Editor Engine - Core Module Exports
 *
 * This is the main entry point for the headless influence editor.
 */

// Editor Session
export { EditorSession } from './session/EditorSession.js';
export type { EditorSessionOptions, SessionState } from './session/EditorSession.js';
export type { BoundObject, HostCallback, HostSurface } from './session/HostSurface.js';

// Types - export all
export * from './types/index.js';

// List Data
export * from './data/index.js';

// Selection Management
export { ListSelectionModel } from './selection/ListSelectionModel.js';
export type {
  ListSelectionChangeEvent,
  ListSelectionListener,
  ListSelectionMode,
  ListSelectionModelOptions,
  SelectionCommand,
} from './selection/ListSelectionModel.js';

// Filtering
export * from './filtering/index.js';

// Selection Sync
export { SyncContext } from './sync/SyncContext.js';
export { SyncController } from './sync/SyncController.js';
export type { SyncControllerOptions } from './sync/SyncController.js';

// Weight Editing
export { WeightEditOrchestrator, WEIGHT_COLUMN } from './weights/WeightEditOrchestrator.js';
export type {
  WeightEditEvent,
  WeightEditKind,
  WeightEditListener,
  WeightEditOrchestratorOptions,
  WeightEditResult,
} from './weights/WeightEditOrchestrator.js';
export type {
  BlendOptions,
  MirrorOptions,
  SlabOptions,
  VertexWeightFunction,
  WeightSource,
  WeightTools,
} from './weights/WeightSource.js';
export { InMemoryWeightSource, redistribute, WEIGHT_EPSILON } from './weights/InMemoryWeightSource.js';
export type { InMemoryWeightSourceOptions } from './weights/InMemoryWeightSource.js';

// Configuration
export {
  editorConfigSchema,
  resolveEditorConfig,
  MIN_MIRROR_TOLERANCE,
} from './config/EditorConfig.js';
export type { EditorConfig, EditorConfigInput, MirrorAxis, SlabOption } from './config/EditorConfig.js';

// Validation
export {
  parseAmount,
  parseBoolean,
  parsePattern,
  parseRow,
  parseRows,
} from './validation/InputValidation.js';

// Errors
export * from './errors/EditorErrors.js';

// Logging
export { LogManager, logger } from './logging/LogManager.js';
export type { LogCategory, LogEntry, LogLevel, LogManagerOptions } from './logging/LogManager.js';
