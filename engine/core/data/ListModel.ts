/**
 * List Model
 * Row/column label storage backing one list view
 */

import type { RowId } from '../types/index.js';

/**
 * Read access used by filtering and pattern matching
 */
export interface ItemSource {
  getRowCount(): number;
  getColumnCount(): number;
  /**
   * Label at position, `''` for missing cells
   */
  getLabel(row: RowId, column?: number): string;
}

/**
 * Dense string table. Rows past the end read as empty, which the filter
 * treats as null items.
 */
export class ListModel implements ItemSource {
  private rows: string[][] = [];
  private readonly columnCount: number;

  constructor(columnCount: number = 1) {
    if (!Number.isInteger(columnCount) || columnCount < 1) {
      throw new Error(`Invalid column count: ${columnCount}`);
    }
    this.columnCount = columnCount;
  }

  getRowCount(): number {
    return this.rows.length;
  }

  getColumnCount(): number {
    return this.columnCount;
  }

  /**
   * Grow or shrink the table. New rows start empty.
   */
  setRowCount(count: number): void {
    if (!Number.isInteger(count) || count < 0) {
      throw new Error(`Invalid row count: ${count}`);
    }

    if (count < this.rows.length) {
      this.rows.length = count;
      return;
    }

    while (this.rows.length < count) {
      this.rows.push(new Array<string>(this.columnCount).fill(''));
    }
  }

  setItem(row: RowId, column: number, text: string): void {
    if (row < 0 || row >= this.rows.length) {
      throw new Error(`Invalid row: ${row}`);
    }
    if (column < 0 || column >= this.columnCount) {
      throw new Error(`Invalid column: ${column}`);
    }
    this.rows[row][column] = text;
  }

  getLabel(row: RowId, column: number = 0): string {
    return this.rows[row]?.[column] ?? '';
  }

  /**
   * Rows whose label in `column` equals `text` exactly.
   */
  findRows(text: string, column: number = 0): RowId[] {
    const found: RowId[] = [];
    for (let row = 0; row < this.rows.length; row++) {
      if (this.rows[row][column] === text) {
        found.push(row);
      }
    }
    return found;
  }

  clear(): void {
    this.rows = [];
  }
}
