/**
 * Influence Editor Engine - List Selection Model
 *
 * Headless stand-in for a list widget's selection model:
 * - Ordered row selection built from full-width row ranges
 * - Select / deselect / clear-and-select commands
 * - Single or extended selection for user clicks
 * - Scroll position tracking (scrollTo / scrollToTop)
 * - Synchronous change notification, like a native selection signal
 *
 * Listeners run before `select()` returns, so a listener that changes another
 * list's selection re-enters synchronously. Callers break cycles themselves.
 */

import { logger } from '../logging/LogManager.js';
import { rangesToRows, uniqueSortedRows } from '../types/index.js';
import type { RowId, RowRange, Unsubscribe } from '../types/index.js';

// =============================================================================
// Types
// =============================================================================

export type SelectionCommand = 'clearAndSelect' | 'select' | 'deselect';

/**
 * How user clicks combine. Programmatic `select()` is never restricted.
 */
export type ListSelectionMode = 'single' | 'extended';

export interface ListSelectionChangeEvent {
  /** Rows that became selected */
  selected: RowId[];
  /** Rows that were deselected */
  deselected: RowId[];
}

export type ListSelectionListener = (event: ListSelectionChangeEvent) => void;

export interface ListSelectionModelOptions {
  mode?: ListSelectionMode;
}

// =============================================================================
// List Selection Model
// =============================================================================

export class ListSelectionModel {
  private rows: RowId[] = [];
  private scrollRow: RowId | null = null;
  private mode: ListSelectionMode;
  private listeners: Set<ListSelectionListener> = new Set();

  constructor(options: ListSelectionModelOptions = {}) {
    this.mode = options.mode ?? 'single';
  }

  // ===========================================================================
  // Queries
  // ===========================================================================

  /**
   * Selected rows in ascending order.
   */
  getSelectedRows(): readonly RowId[] {
    return this.rows;
  }

  isSelected(row: RowId): boolean {
    return this.rows.includes(row);
  }

  hasSelection(): boolean {
    return this.rows.length > 0;
  }

  getMode(): ListSelectionMode {
    return this.mode;
  }

  setMode(mode: ListSelectionMode): void {
    this.mode = mode;
  }

  /**
   * Row last scrolled to, `null` when scrolled to the top.
   */
  getScrollRow(): RowId | null {
    return this.scrollRow;
  }

  // ===========================================================================
  // Programmatic Selection
  // ===========================================================================

  /**
   * Apply a merged range selection.
   */
  select(ranges: readonly RowRange[], command: SelectionCommand): void {
    const rows = rangesToRows(ranges);

    switch (command) {
      case 'clearAndSelect':
        this.setRows(rows);
        break;
      case 'select':
        this.setRows(uniqueSortedRows([...this.rows, ...rows]));
        break;
      case 'deselect': {
        const removed = new Set(rows);
        this.setRows(this.rows.filter((row) => !removed.has(row)));
        break;
      }
    }
  }

  clearSelection(): void {
    this.setRows([]);
  }

  scrollTo(row: RowId): void {
    this.scrollRow = row;
  }

  scrollToTop(): void {
    this.scrollRow = null;
  }

  // ===========================================================================
  // User Interaction
  // ===========================================================================

  /**
   * Plain click: replace the selection with one row.
   */
  click(row: RowId): void {
    this.setRows([row]);
  }

  /**
   * Ctrl+Click: toggle one row. Behaves as a plain click in single mode.
   */
  toggle(row: RowId): void {
    if (this.mode === 'single') {
      this.click(row);
      return;
    }

    if (this.isSelected(row)) {
      this.setRows(this.rows.filter((r) => r !== row));
    } else {
      this.setRows(uniqueSortedRows([...this.rows, row]));
    }
  }

  // ===========================================================================
  // Subscription
  // ===========================================================================

  subscribe(listener: ListSelectionListener): Unsubscribe {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  // ===========================================================================
  // Internal State Management
  // ===========================================================================

  /**
   * All selection changes flow through here. No notification when unchanged.
   */
  private setRows(next: RowId[]): void {
    const previous = this.rows;
    if (rowsEqual(previous, next)) {
      return;
    }

    this.rows = next;

    const before = new Set(previous);
    const after = new Set(next);
    const event: ListSelectionChangeEvent = {
      selected: next.filter((row) => !before.has(row)),
      deselected: previous.filter((row) => !after.has(row)),
    };

    for (const listener of Array.from(this.listeners)) {
      try {
        listener(event);
      } catch (error) {
        logger.error('Filter', 'Selection listener error', error);
      }
    }
  }
}

function rowsEqual(a: readonly RowId[], b: readonly RowId[]): boolean {
  if (a.length !== b.length) return false;
  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i]) return false;
  }
  return true;
}
