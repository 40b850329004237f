/**
 * Influence Editor Engine - Editor Session
 *
 * Per-window controller owning both lists and their wiring:
 * - Influence list (names) and weight list (names + displayed weights)
 * - SyncController pairing the two FilterEngines
 * - Bind/unbind state machine against a host object
 * - Host callbacks (component selection changed, undo, redo)
 * - Precision mode, search, and pass-through weight tools
 *
 * States: `inactive` (nothing bound) → `bound` → `inactive`.
 * A failed bind logs a BindingFailure and stays `inactive`.
 */

import { resolveEditorConfig } from '../config/EditorConfig.js';
import type { EditorConfig, EditorConfigInput } from '../config/EditorConfig.js';
import { ListModel } from '../data/ListModel.js';
import { BindingFailure, ValidationError } from '../errors/EditorErrors.js';
import { FilterEngine } from '../filtering/FilterEngine.js';
import { searchPattern } from '../filtering/PatternIndex.js';
import { LogManager } from '../logging/LogManager.js';
import { ListSelectionModel } from '../selection/ListSelectionModel.js';
import { SyncController } from '../sync/SyncController.js';
import type { RowId, Unsubscribe } from '../types/index.js';
import { parseBoolean, parseRow } from '../validation/InputValidation.js';
import { WeightEditOrchestrator } from '../weights/WeightEditOrchestrator.js';
import type { WeightEditResult } from '../weights/WeightEditOrchestrator.js';
import type { WeightTools } from '../weights/WeightSource.js';
import type { BoundObject, HostSurface } from './HostSurface.js';

// =============================================================================
// Types
// =============================================================================

export type SessionState = 'inactive' | 'bound';

export interface EditorSessionOptions {
  host: HostSurface;
  config?: EditorConfigInput;
  /** Logger; its level is set from the config */
  log?: LogManager;
}

/** What to refresh after a pass-through tool ran. */
type ToolRefresh = 'weights' | 'influences' | 'none';

function withoutUndefined<T extends object>(patch: T): Partial<T> {
  const result: Partial<T> = {};
  for (const key in patch) {
    const value = patch[key];
    if (value !== undefined) {
      result[key] = value;
    }
  }
  return result;
}

// =============================================================================
// Editor Session
// =============================================================================

export class EditorSession {
  readonly influenceModel: ListModel = new ListModel(1);
  readonly weightModel: ListModel = new ListModel(2);
  readonly influenceView: ListSelectionModel = new ListSelectionModel({ mode: 'single' });
  readonly weightView: ListSelectionModel = new ListSelectionModel({ mode: 'single' });
  readonly influences: FilterEngine;
  readonly weights: FilterEngine;
  readonly sync: SyncController;

  private host: HostSurface;
  private config: EditorConfig;
  private log: LogManager;

  private state: SessionState = 'inactive';
  private bound: BoundObject | null = null;
  private orchestrator: WeightEditOrchestrator | null = null;
  private callbacks: Unsubscribe[] = [];
  private searchText: string = '';

  constructor(options: EditorSessionOptions) {
    this.host = options.host;
    this.config = resolveEditorConfig(options.config);
    this.log = options.log ?? new LogManager();
    this.log.setLevel(this.config.logLevel);

    this.influences = new FilterEngine({
      name: 'influences',
      model: this.influenceModel,
      view: this.influenceView,
      log: this.log,
    });
    this.weights = new FilterEngine({
      name: 'weights',
      model: this.weightModel,
      view: this.weightView,
      log: this.log,
    });
    this.sync = new SyncController(this.influences, this.weights, { log: this.log });

    this.setPrecision(this.config.precision);
  }

  // ===========================================================================
  // State
  // ===========================================================================

  getState(): SessionState {
    return this.state;
  }

  isBound(): boolean {
    return this.state === 'bound';
  }

  getBoundObject(): BoundObject | null {
    return this.bound;
  }

  getOrchestrator(): WeightEditOrchestrator | null {
    return this.orchestrator;
  }

  getConfig(): Readonly<EditorConfig> {
    return this.config;
  }

  /**
   * Merge and re-validate settings. Precision and log level apply immediately.
   * @throws ValidationError without changing any setting
   */
  updateSettings(patch: EditorConfigInput): void {
    const previous = this.config;
    // Keys set to undefined keep their current value
    const next = resolveEditorConfig({ ...previous, ...withoutUndefined(patch) });
    this.config = next;
    this.log.setLevel(next.logLevel);

    if (next.precision !== previous.precision) {
      this.setPrecision(next.precision);
    }
  }

  // ===========================================================================
  // Binding
  // ===========================================================================

  /**
   * Toggle helper for the edit button.
   * @returns the state after the toggle
   */
  setBound(checked: unknown): SessionState {
    if (parseBoolean('setBound', checked)) {
      this.bind();
    } else {
      this.unbind();
    }
    return this.state;
  }

  /**
   * Bind the first host selection.
   * @returns false when binding failed; the session stays inactive
   */
  bind(): boolean {
    if (this.state === 'bound') {
      return true;
    }

    const selection = this.host.activeSelection();
    if (selection.length === 0) {
      this.reportBindingFailure(new BindingFailure('Nothing is selected'));
      return false;
    }

    const node = selection[0];
    let bound: BoundObject | null;
    try {
      bound = this.host.bind(node);
    } catch (error) {
      this.reportBindingFailure(new BindingFailure(`Unable to bind ${node}`, node, error));
      return false;
    }

    if (!bound) {
      this.reportBindingFailure(new BindingFailure(`${node} is not an editable weighted object`, node));
      return false;
    }

    this.bound = bound;
    this.orchestrator = new WeightEditOrchestrator({
      influences: this.influences,
      weights: this.weights,
      weightModel: this.weightModel,
      source: bound.source,
      precision: this.config.precision,
      weightDecimals: this.config.weightDecimals,
      log: this.log,
    });

    const invalidate = () => this.invalidate();
    this.callbacks = [
      this.host.onComponentSelectionChanged(invalidate),
      this.host.onUndo(invalidate),
      this.host.onRedo(invalidate),
    ];
    this.state = 'bound';

    this.invalidateInfluences();
    this.invalidate();

    this.log.info('Session', `Bound ${bound.name}`);
    return true;
  }

  /**
   * Remove host callbacks, release the object and clear both lists.
   */
  unbind(): void {
    if (!this.bound) {
      this.state = 'inactive';
      return;
    }

    for (const remove of this.callbacks) {
      remove();
    }
    this.callbacks = [];

    this.orchestrator?.dispose();
    this.orchestrator = null;

    const name = this.bound.name;
    this.bound.release();
    this.bound = null;
    this.state = 'inactive';

    this.influenceView.clearSelection();
    this.weightView.clearSelection();
    this.influenceModel.setRowCount(0);
    this.weightModel.setRowCount(0);
    for (const engine of [this.influences, this.weights]) {
      engine.setSelectedRows([]);
      engine.setVisible([]);
    }

    this.log.info('Session', `Released ${name}`);
  }

  private reportBindingFailure(failure: BindingFailure): void {
    this.log.warn('Session', failure.message, failure.cause ?? failure.node ?? undefined);
  }

  // ===========================================================================
  // Invalidation
  // ===========================================================================

  /**
   * Re-read weights. Bound to host selection-changed, undo and redo.
   */
  invalidate(): void {
    if (!this.orchestrator) {
      return;
    }
    this.orchestrator.invalidateWeights();
  }

  /**
   * Rebuild both lists from the bound object's influences.
   * Removed influences become null rows.
   */
  invalidateInfluences(): void {
    if (!this.bound) {
      return;
    }

    const influences = this.bound.source.influences();
    const rowCount = influences.lastIndex() + 1;

    this.influenceModel.setRowCount(0);
    this.influenceModel.setRowCount(rowCount);
    this.weightModel.setRowCount(0);
    this.weightModel.setRowCount(rowCount);

    const influenceIds: RowId[] = [];
    for (let id = 0; id < rowCount; id++) {
      const name = influences.get(id) ?? '';
      if (name) {
        influenceIds.push(id);
      } else {
        this.log.debug('Session', `No influence found at ID: ${id}`);
      }

      this.influenceModel.setItem(id, 0, name);
      this.weightModel.setItem(id, 0, name);
      this.weightModel.setItem(id, 1, '0');
    }

    // Rows without weight start hidden so a mirrored selection overrides them
    this.weights.invalidateFilter();
    this.influences.setVisible(influenceIds);
    // Empty request selects the first accepted row
    this.influences.selectRows([]);
  }

  // ===========================================================================
  // Precision & Search
  // ===========================================================================

  get precision(): boolean {
    return this.config.precision;
  }

  /**
   * Precision mode allows multi-select in the weight list and stops the two
   * lists from mirroring each other.
   */
  setPrecision(precision: unknown): void {
    const value = parseBoolean('setPrecision', precision);
    this.config = { ...this.config, precision: value };

    this.weightView.setMode(value ? 'extended' : 'single');
    this.influences.setAutoSelect(!value);
    this.weights.setAutoSelect(!value);
    this.orchestrator?.setPrecision(value);
  }

  getSearch(): string {
    return searchPattern(this.searchText);
  }

  setSearch(text: string): void {
    this.searchText = text;
  }

  /**
   * Show only influences matching the current search.
   * @returns the visible rows
   */
  applySearch(): RowId[] {
    const visible = this.influences.filterByPattern(this.getSearch(), this.config.searchColumn);
    this.influences.setVisible(visible);
    return visible;
  }

  /**
   * Double click on a weight row selects that influence.
   */
  onWeightRowActivated(row: unknown): void {
    const parsed = parseRow('onWeightRowActivated', row);
    this.log.debug('Session', `Weight row activated: ${this.weightModel.getLabel(parsed)}`);
    this.influences.selectRows([parsed]);
  }

  // ===========================================================================
  // Edit Operations
  // ===========================================================================

  setWeights(amount: unknown = this.config.setAmount): WeightEditResult | null {
    return this.orchestrator?.setWeights(amount) ?? null;
  }

  incrementWeights(pull: boolean = false, amount: unknown = this.config.incrementAmount): WeightEditResult | null {
    return this.orchestrator?.incrementWeights(amount, pull) ?? null;
  }

  scaleWeights(pull: boolean = false, percent: unknown = this.config.scalePercent): WeightEditResult | null {
    return this.orchestrator?.scaleWeights(percent, pull) ?? null;
  }

  applyPreset(amount: unknown): WeightEditResult | null {
    return this.orchestrator?.applyPreset(amount) ?? null;
  }

  /**
   * Apply one of the configured presets.
   * @throws ValidationError for an index outside the preset list
   */
  applyPresetAt(index: number): WeightEditResult | null {
    const presets = this.config.presets;
    if (!Number.isInteger(index) || index < 0 || index >= presets.length) {
      throw new ValidationError(`applyPresetAt() expects an index below ${presets.length}`);
    }
    return this.applyPreset(presets[index]);
  }

  // ===========================================================================
  // Pass-through Tools
  // ===========================================================================

  copyWeights(): boolean {
    return this.runTool('copyWeights', (tools) => tools.copyWeights(), 'none');
  }

  pasteWeights(): boolean {
    return this.runTool('pasteWeights', (tools) => tools.pasteWeights());
  }

  pasteAverageWeights(): boolean {
    return this.runTool('pasteAverageWeights', (tools) => tools.pasteAveragedWeights());
  }

  blendVertices(): boolean {
    return this.runTool('blendVertices', (tools) => tools.blendVertices());
  }

  blendBetweenVertices(): boolean {
    const blendByDistance = this.config.blendByDistance;
    return this.runTool('blendBetweenVertices', (tools) =>
      tools.blendBetweenVertices({ blendByDistance })
    );
  }

  blendBetweenTwoVertices(): boolean {
    const blendByDistance = this.config.blendByDistance;
    return this.runTool('blendBetweenTwoVertices', (tools) =>
      tools.blendBetweenTwoVertices({ blendByDistance })
    );
  }

  mirrorWeights(pull: boolean = false): boolean {
    const { mirrorAxis, mirrorTolerance, resetActiveSelection } = this.config;
    return this.runTool('mirrorWeights', (tools) =>
      tools.mirrorVertices(tools.selectedVertices(), {
        pull,
        axis: mirrorAxis,
        tolerance: mirrorTolerance,
        resetActiveSelection,
      })
    );
  }

  slabPasteWeights(): boolean {
    const slabOption = this.config.slabOption;
    return this.runTool('slabPasteWeights', (tools) => tools.slabPasteWeights({ slabOption }));
  }

  /**
   * Select the vertices influenced by the weight list selection.
   */
  selectAffectedVertices(): boolean {
    const rows = this.weights.getSelectedRows();
    return this.runTool(
      'selectAffectedVertices',
      (tools) => tools.setVertexSelection(tools.verticesByInfluence(rows)),
      'none'
    );
  }

  addInfluences(): boolean {
    return this.runTool('addInfluences', (tools) => tools.addInfluences(), 'influences');
  }

  removeInfluences(): boolean {
    return this.runTool('removeInfluences', (tools) => tools.removeInfluences(), 'influences');
  }

  private runTool(
    name: string,
    action: (tools: WeightTools) => void,
    refresh: ToolRefresh = 'weights'
  ): boolean {
    if (!this.bound) {
      this.log.debug('Session', `${name} ignored, nothing bound`);
      return false;
    }

    const tools = this.bound.tools;
    if (!tools) {
      this.log.warn('Session', `${name} is not supported by ${this.bound.name}`);
      return false;
    }

    action(tools);

    if (refresh === 'weights') {
      this.invalidate();
    } else if (refresh === 'influences') {
      this.invalidateInfluences();
      this.invalidate();
    }
    return true;
  }

  // ===========================================================================
  // Teardown
  // ===========================================================================

  dispose(): void {
    this.unbind();
    this.sync.dispose();
    this.influences.dispose();
    this.weights.dispose();
  }
}
