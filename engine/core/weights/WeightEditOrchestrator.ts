/**
 * Weight Edit Orchestrator
 *
 * Turns one user action (set, increment, scale, preset) into a single batch:
 * - Resolve the active influence from the influence list
 * - Resolve the source influences from the weight list
 * - Ask the weight source for a new weight vector per soft-selected vertex
 * - Commit every vertex in one applyWeights() call
 *
 * A batch that fails while computing is never committed. A batch the source
 * rejects leaves the cached snapshot stale so the next read re-invalidates.
 */

import type { ListModel } from '../data/ListModel.js';
import type { FilterEngine } from '../filtering/FilterEngine.js';
import { logger as defaultLogger } from '../logging/LogManager.js';
import type { LogManager } from '../logging/LogManager.js';
import {
  NoActiveInfluenceError,
  NoSelectionError,
  StaleWeightsError,
  WeightCommitError,
} from '../errors/EditorErrors.js';
import { parseAmount, parseBoolean } from '../validation/InputValidation.js';
import { roundWeight } from '../types/index.js';
import type {
  InfluenceId,
  RowId,
  SoftSelection,
  Unsubscribe,
  WeightMap,
  WeightSnapshot,
} from '../types/index.js';
import type { VertexWeightFunction, WeightSource } from './WeightSource.js';

// =============================================================================
// Types
// =============================================================================

export type WeightEditKind = 'set' | 'increment' | 'scale' | 'preset';

export interface WeightEditResult {
  kind: WeightEditKind;
  /** Amount after any pull negation */
  amount: number;
  activeInfluence: InfluenceId;
  sourceInfluences: InfluenceId[];
  vertexCount: number;
}

export type WeightEditEvent =
  | { type: 'invalidated'; vertexWeights: WeightMap }
  | { type: 'committed'; result: WeightEditResult };

export type WeightEditListener = (event: WeightEditEvent) => void;

export interface WeightEditOrchestratorOptions {
  /** Engine of the influence list (active influence) */
  influences: FilterEngine;
  /** Engine of the weight list (source influences) */
  weights: FilterEngine;
  /** Model behind the weight list; column 1 receives displayed weights */
  weightModel: ListModel;
  source: WeightSource;
  precision?: boolean;
  /** @default 3 */
  weightDecimals?: number;
  log?: LogManager;
}

/** Column of the weight list holding the displayed weight. */
export const WEIGHT_COLUMN = 1;

// =============================================================================
// Orchestrator
// =============================================================================

export class WeightEditOrchestrator {
  private influenceEngine: FilterEngine;
  private weightEngine: FilterEngine;
  private weightModel: ListModel;
  private source: WeightSource;
  private precision: boolean;
  private weightDecimals: number;
  private log: LogManager;

  private softSelection: SoftSelection = new Map();
  private vertices: WeightSnapshot = new Map();
  private vertexWeights: WeightMap = new Map();
  private stale: boolean = true;

  private listeners: Set<WeightEditListener> = new Set();
  private detachInfluences: Unsubscribe;

  constructor(options: WeightEditOrchestratorOptions) {
    this.influenceEngine = options.influences;
    this.weightEngine = options.weights;
    this.weightModel = options.weightModel;
    this.source = options.source;
    this.precision = options.precision ?? false;
    this.weightDecimals = options.weightDecimals ?? 3;
    this.log = options.log ?? defaultLogger;

    this.detachInfluences = this.influenceEngine.subscribe((event) => {
      if (event.type === 'selection') {
        this.requestInfluenceChange();
      }
    });
  }

  // ===========================================================================
  // Mode
  // ===========================================================================

  isPrecision(): boolean {
    return this.precision;
  }

  setPrecision(precision: unknown): void {
    this.precision = parseBoolean('setPrecision', precision);
  }

  // ===========================================================================
  // Influence Resolution
  // ===========================================================================

  /**
   * First selected row of the influence list.
   * @throws NoActiveInfluenceError when nothing is selected
   */
  activeInfluence(): InfluenceId {
    const selected = this.influenceEngine.selectedRows();
    if (selected.length === 0) {
      throw new NoActiveInfluenceError();
    }
    return selected[0];
  }

  /**
   * Influences weight is redistributed from.
   *
   * Precision mode: the weight list selection minus the active influence.
   * Otherwise: every accepted weight row that is not selected.
   *
   * @throws NoSelectionError when the weight list has no selection
   */
  sourceInfluences(): InfluenceId[] {
    const selected = this.weightEngine.selectedRows();
    if (selected.length === 0) {
      throw new NoSelectionError();
    }

    let influenceIds: InfluenceId[];
    if (this.precision) {
      const active = this.activeInfluence();
      influenceIds = selected.filter((row) => row !== active);
    } else {
      const excluded = new Set(selected);
      influenceIds = this.weightEngine.activeRows.filter((row) => !excluded.has(row));
    }

    this.log.debug('Weights', 'Source influences', influenceIds);
    return influenceIds;
  }

  // ===========================================================================
  // Invalidation
  // ===========================================================================

  /**
   * Re-read soft selection and weights, refresh the weight list.
   *
   * The displayed vector is the single vertex's weights, or the average of
   * all soft-selected vertices.
   */
  invalidateWeights(): void {
    this.softSelection = this.source.currentSoftSelection();
    const vertexIds = Array.from(this.softSelection.keys());
    this.vertices = this.source.weightsFor(vertexIds);

    if (vertexIds.length === 0) {
      this.vertexWeights = new Map();
    } else if (vertexIds.length === 1) {
      this.vertexWeights = new Map(this.vertices.get(vertexIds[0]) ?? []);
    } else {
      const maps: WeightMap[] = [];
      for (const id of vertexIds) {
        const weights = this.vertices.get(id);
        if (weights) maps.push(weights);
      }
      this.vertexWeights = this.source.averageWeights(maps);
    }

    this.stale = false;

    if (this.vertexWeights.size > 0) {
      this.writeDisplayedWeights();
      this.weightEngine.setVisible(Array.from(this.vertexWeights.keys()));
    } else {
      this.log.debug('Weights', 'No vertex weights supplied to invalidate filter model');
    }

    this.emit({ type: 'invalidated', vertexWeights: this.vertexWeights });
  }

  isStale(): boolean {
    return this.stale;
  }

  getSoftSelection(): SoftSelection {
    return this.softSelection;
  }

  /**
   * Cached weights, re-read first when stale.
   */
  getSnapshot(): WeightSnapshot {
    if (this.stale) {
      this.invalidateWeights();
    }
    return this.vertices;
  }

  getVertexWeights(): WeightMap {
    return this.vertexWeights;
  }

  getDisplayedWeight(row: RowId): number {
    return roundWeight(this.vertexWeights.get(row) ?? 0, this.weightDecimals);
  }

  private writeDisplayedWeights(): void {
    if (this.weightModel.getColumnCount() <= WEIGHT_COLUMN) {
      return;
    }

    const rowCount = this.weightModel.getRowCount();
    for (let row = 0; row < rowCount; row++) {
      this.weightModel.setItem(row, WEIGHT_COLUMN, String(this.getDisplayedWeight(row)));
    }
  }

  // ===========================================================================
  // Edit Operations
  // ===========================================================================

  setWeights(amount: unknown): WeightEditResult {
    return this.runBatch('set', parseAmount('setWeights', amount));
  }

  /**
   * @param pull - Negate the amount
   */
  incrementWeights(amount: unknown, pull: boolean = false): WeightEditResult {
    const value = parseAmount('incrementWeights', amount);
    return this.runBatch('increment', pull ? -value : value);
  }

  /**
   * @param pull - Negate the percent
   */
  scaleWeights(percent: unknown, pull: boolean = false): WeightEditResult {
    const value = parseAmount('scaleWeights', percent);
    return this.runBatch('scale', pull ? -value : value);
  }

  applyPreset(amount: unknown): WeightEditResult {
    return this.runBatch('preset', parseAmount('applyPreset', amount));
  }

  private vertexFunction(kind: WeightEditKind): VertexWeightFunction {
    switch (kind) {
      case 'increment':
        return (existing, active, sources, amount, falloff) =>
          this.source.incrementWeights(existing, active, sources, amount, falloff);
      case 'scale':
        return (existing, active, sources, amount, falloff) =>
          this.source.scaleWeights(existing, active, sources, amount, falloff);
      default:
        return (existing, active, sources, amount, falloff) =>
          this.source.setWeights(existing, active, sources, amount, falloff);
    }
  }

  private runBatch(kind: WeightEditKind, amount: number): WeightEditResult {
    const activeInfluence = this.activeInfluence();
    const sourceInfluences = this.sourceInfluences();

    const snapshot = this.getSnapshot();
    const compute = this.vertexFunction(kind);
    const updates: WeightSnapshot = new Map();

    for (const [vertex, falloff] of this.softSelection) {
      const existing = snapshot.get(vertex);
      if (!existing) {
        throw new StaleWeightsError(vertex);
      }
      updates.set(vertex, compute(existing, activeInfluence, sourceInfluences, amount, falloff));
    }

    try {
      this.source.applyWeights(updates);
    } catch (error) {
      this.stale = true;
      this.log.error('Weights', `${kind} batch rejected by weight source`, error);
      throw new WeightCommitError(updates.size, error);
    }

    const result: WeightEditResult = {
      kind,
      amount,
      activeInfluence,
      sourceInfluences,
      vertexCount: updates.size,
    };
    this.log.info('Weights', `Applied ${kind} to ${updates.size} vertices`, {
      amount,
      active: activeInfluence,
    });

    this.invalidateWeights();
    this.emit({ type: 'committed', result });

    return result;
  }

  // ===========================================================================
  // Host Notification
  // ===========================================================================

  /**
   * Forward the active influence to the host, when it supports it.
   */
  requestInfluenceChange(): void {
    if (!this.source.selectInfluence) {
      return;
    }
    this.source.selectInfluence(this.activeInfluence());
  }

  // ===========================================================================
  // Subscription
  // ===========================================================================

  subscribe = (listener: WeightEditListener): Unsubscribe => {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  };

  dispose(): void {
    this.detachInfluences();
    this.listeners.clear();
  }

  private emit(event: WeightEditEvent): void {
    for (const listener of Array.from(this.listeners)) {
      try {
        listener(event);
      } catch (error) {
        this.log.error('Weights', `${event.type} listener error`, error);
      }
    }
  }
}
