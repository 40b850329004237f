/**
 * Filter Engine
 * Per-list visibility, override and selection state
 *
 * A row is accepted when its label is non-empty and it is either visible,
 * part of the cached selection, or holds a one-shot override for the
 * current pass. Accepted rows land in `activeRows`, everything else in
 * `inactiveRows`; both are rebuilt from scratch on every pass.
 */

import type { ItemSource } from '../data/ListModel.js';
import type { ListSelectionModel } from '../selection/ListSelectionModel.js';
import { logger as defaultLogger } from '../logging/LogManager.js';
import type { LogManager } from '../logging/LogManager.js';
import { rowToRange, uniqueSortedRows } from '../types/index.js';
import type { RowId, Unsubscribe } from '../types/index.js';
import {
  parseBoolean,
  parsePattern,
  parseRow,
  parseRows,
} from '../validation/InputValidation.js';
import { filterRowsByPattern } from './PatternIndex.js';
import { ValidationError } from '../errors/EditorErrors.js';

// =============================================================================
// Types
// =============================================================================

/**
 * Notifications raised by a FilterEngine.
 *
 * - `filter`: a filter pass completed
 * - `selection`: the cached selection changed; downstream state may need a recompute
 * - `match`: the sibling list should mirror this list's selection
 */
export type FilterEngineEvent =
  | {
      type: 'filter';
      activeRows: readonly RowId[];
      inactiveRows: readonly RowId[];
    }
  | {
      type: 'selection';
      rows: readonly RowId[];
    }
  | {
      type: 'match';
      rows: readonly RowId[];
      reason: 'selection' | 'autoSelect';
    };

export type FilterEngineListener = (event: FilterEngineEvent) => void;

export interface FilterEngineOptions {
  /** Name used in log output */
  name?: string;
  /** Source model holding row labels */
  model: ItemSource;
  /** Selection model of the view this engine filters */
  view: ListSelectionModel;
  /** Column holding the label that decides null items @default 0 */
  labelColumn?: number;
  /** @default true */
  autoSelect?: boolean;
  log?: LogManager;
}

// =============================================================================
// Filter Engine
// =============================================================================

export class FilterEngine {
  readonly name: string;

  private model: ItemSource;
  private view: ListSelectionModel;
  private labelColumn: number;
  private log: LogManager;

  private visibleRows: Set<RowId> = new Set();
  private selectedRowCache: RowId[] = [];
  private overrideRows: Set<RowId> = new Set();
  private active: RowId[] = [];
  private inactive: RowId[] = [];
  private activeLookup: Set<RowId> = new Set();
  private inactiveLookup: Set<RowId> = new Set();
  private autoSelectEnabled: boolean;

  private sibling: FilterEngine | null = null;
  private version: number = 0;
  private listeners: Set<FilterEngineListener> = new Set();
  private detachView: Unsubscribe;

  constructor(options: FilterEngineOptions) {
    this.name = options.name ?? 'list';
    this.model = options.model;
    this.view = options.view;
    this.labelColumn = options.labelColumn ?? 0;
    this.autoSelectEnabled = options.autoSelect ?? true;
    this.log = options.log ?? defaultLogger;

    this.detachView = this.view.subscribe((event) => {
      this.onSelectionChanged(event.selected, event.deselected);
    });
  }

  // ===========================================================================
  // Sibling
  // ===========================================================================

  getSibling(): FilterEngine | null {
    return this.sibling;
  }

  /**
   * Back-reference only; pairing is owned by SyncController.
   */
  setSibling(engine: FilterEngine | null): void {
    if (engine === this) {
      throw new ValidationError(`${this.name}: an engine cannot be its own sibling`);
    }
    this.sibling = engine;
  }

  getView(): ListSelectionModel {
    return this.view;
  }

  getModel(): ItemSource {
    return this.model;
  }

  // ===========================================================================
  // Auto Select
  // ===========================================================================

  get autoSelect(): boolean {
    return this.autoSelectEnabled;
  }

  /**
   * Enabling requests a one-time selection match with the sibling.
   */
  setAutoSelect(enabled: unknown): void {
    const value = parseBoolean('setAutoSelect', enabled);
    this.autoSelectEnabled = value;

    if (value) {
      this.emit({ type: 'match', rows: this.selectedRowCache, reason: 'autoSelect' });
    }
  }

  // ===========================================================================
  // Visibility & Overrides
  // ===========================================================================

  /**
   * Rows shown regardless of selection, ascending.
   */
  visible(): RowId[] {
    return uniqueSortedRows(this.visibleRows);
  }

  get numVisible(): number {
    return this.visibleRows.size;
  }

  setVisible(rows: unknown): void {
    const parsed = parseRows('setVisible', rows);
    this.visibleRows = new Set(parsed);
    this.invalidateFilter();
  }

  /**
   * Pending one-shot overrides. Empty right after any filter pass.
   */
  overrides(): RowId[] {
    return uniqueSortedRows(this.overrideRows);
  }

  setOverrides(rows: unknown): void {
    const parsed = parseRows('setOverrides', rows);
    this.overrideRows = new Set(parsed);
    this.invalidateFilter();
  }

  // ===========================================================================
  // Cached Selection
  // ===========================================================================

  selectedRows(): readonly RowId[] {
    return this.selectedRowCache;
  }

  /**
   * Update the cached selection. Emits nothing and does not re-filter.
   */
  setSelectedRows(rows: unknown): void {
    this.selectedRowCache = parseRows('setSelectedRows', rows);
  }

  // ===========================================================================
  // Filter Pass
  // ===========================================================================

  get activeRows(): readonly RowId[] {
    return this.active;
  }

  get inactiveRows(): readonly RowId[] {
    return this.inactive;
  }

  get numActiveRows(): number {
    return this.active.length;
  }

  get numInactiveRows(): number {
    return this.inactive.length;
  }

  /**
   * Run a full filter pass.
   *
   * Overrides are snapshotted and cleared before any row is tested, so each
   * one affects this pass only.
   */
  invalidateFilter(): void {
    const overrides = this.overrideRows;
    this.overrideRows = new Set();

    const selected = new Set(this.selectedRowCache);
    const active: RowId[] = [];
    const inactive: RowId[] = [];
    const rowCount = this.model.getRowCount();

    for (let row = 0; row < rowCount; row++) {
      if (this.isItemNull(row)) {
        inactive.push(row);
      } else if (this.visibleRows.has(row) || selected.has(row) || overrides.has(row)) {
        active.push(row);
      } else {
        inactive.push(row);
      }
    }

    this.active = active;
    this.inactive = inactive;
    this.activeLookup = new Set(active);
    this.inactiveLookup = new Set(inactive);
    this.version++;

    this.log.debug('Filter', `${this.name}: filter pass`, {
      active: active.length,
      inactive: inactive.length,
      overrides: overrides.size,
    });

    this.emit({ type: 'filter', activeRows: active, inactiveRows: inactive });
  }

  isItemNull(row: RowId): boolean {
    return this.model.getLabel(row, this.labelColumn) === '';
  }

  isRowHidden(row: RowId): boolean {
    return this.inactiveLookup.has(row);
  }

  isRowAccepted(row: RowId): boolean {
    return this.activeLookup.has(row);
  }

  /**
   * True when the row passes the current filter and is selected in the view.
   */
  isRowSelected(row: unknown): boolean {
    const parsed = parseRow('isRowSelected', row);
    return this.isRowAccepted(parsed) && this.view.isSelected(parsed);
  }

  // ===========================================================================
  // Pattern Filtering
  // ===========================================================================

  /**
   * Rows whose label matches the glob pattern. Does not change any state.
   */
  filterByPattern(pattern: unknown, column: number = this.labelColumn): RowId[] {
    const parsed = parsePattern('filterByPattern', pattern);
    return filterRowsByPattern(this.model, parsed, column);
  }

  /**
   * Rows whose label equals any of the given texts.
   */
  getRowsByText(texts: string | readonly string[], column: number = this.labelColumn): RowId[] {
    const wanted = new Set(typeof texts === 'string' ? [texts] : texts);
    const rows: RowId[] = [];
    const rowCount = this.model.getRowCount();

    for (let row = 0; row < rowCount; row++) {
      if (wanted.has(this.model.getLabel(row, column))) {
        rows.push(row);
      }
    }
    return rows;
  }

  // ===========================================================================
  // Selection
  // ===========================================================================

  /**
   * Selected rows as reported by the view, ascending.
   */
  getSelectedRows(): RowId[] {
    return uniqueSortedRows(this.view.getSelectedRows());
  }

  getSelectedItems(column: number = this.labelColumn): string[] {
    return this.getSelectedRows().map((row) => this.model.getLabel(row, column));
  }

  /**
   * Replace the view selection.
   *
   * Hidden rows get a one-shot override first so they are revealed. With no
   * rows the first active row is selected instead; with no active rows this
   * is a no-op.
   */
  selectRows(rows: unknown): void {
    const requested = parseRows('selectRows', rows);
    const columnCount = this.model.getColumnCount();

    const hidden = requested.filter((row) => this.isRowHidden(row));
    if (hidden.length > 0) {
      this.setOverrides(hidden);
    }

    this.log.debug('Filter', `${this.name}: selecting rows`, requested);

    if (requested.length > 0) {
      // Rows the filter rejects cannot be selected through the view
      const ranges = requested
        .filter((row) => this.isRowAccepted(row))
        .map((row) => rowToRange(row, columnCount));

      if (ranges.length === 0) {
        this.log.debug('Filter', `${this.name}: no requested row passes the filter`, requested);
        return;
      }

      this.view.select(ranges, 'clearAndSelect');
      this.view.scrollTo(requested[0]);
    } else if (this.active.length > 0) {
      this.view.select([rowToRange(this.active[0], columnCount)], 'clearAndSelect');
      this.view.scrollToTop();
    } else {
      this.log.debug('Filter', `${this.name}: unable to perform selection change request`);
    }
  }

  /**
   * Entry point bound to the view's selection signal.
   *
   * An empty view selection leaves the cached selection alone, so transient
   * clears do not wipe it.
   */
  onSelectionChanged(_selected: readonly RowId[], _deselected: readonly RowId[]): void {
    const rows = this.getSelectedRows();
    if (rows.length === 0) {
      this.log.debug('Filter', `${this.name}: view selection is empty`);
      return;
    }

    this.selectedRowCache = rows;
    this.invalidateFilter();

    if (this.autoSelectEnabled) {
      this.emit({ type: 'match', rows, reason: 'selection' });
    } else {
      this.log.debug('Filter', `${this.name}: selection update is not required`);
    }

    this.emit({ type: 'selection', rows });
  }

  // ===========================================================================
  // Subscription
  // ===========================================================================

  /**
   * Subscribe to engine events
   * @returns Unsubscribe function
   */
  subscribe = (listener: FilterEngineListener): Unsubscribe => {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  };

  /**
   * Version number bumped on every filter pass
   */
  getSnapshot = (): number => {
    return this.version;
  };

  /**
   * Detach from the view. The engine stops reacting to selection changes.
   */
  dispose(): void {
    this.detachView();
    this.listeners.clear();
    this.sibling = null;
  }

  private emit(event: FilterEngineEvent): void {
    for (const listener of Array.from(this.listeners)) {
      try {
        listener(event);
      } catch (error) {
        this.log.error('Filter', `${this.name}: ${event.type} listener error`, error);
      }
    }
  }
}
