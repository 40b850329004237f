/**
 * Influence Editor Engine
 *
 * Headless core of a skin-weight influence editor:
 * - Two sibling influence lists with visibility, one-shot overrides and selection
 * - Cycle-safe selection mirroring between the lists
 * - Glob search over influence names
 * - Atomic set / increment / scale / preset weight edits
 *
 * @example
 * ```typescript
 * import { EditorSession } from '@influence-editor/engine';
 *
 * const session = new EditorSession({ host });
 * session.bind();
 *
 * session.setSearch('Arm');
 * session.applySearch();
 *
 * // Move 25% of the soft-selected weight onto the active influence
 * session.setWeights(0.25);
 * ```
 */

export * from './core/index.js';
