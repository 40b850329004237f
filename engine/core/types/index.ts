/**
 * Influence Editor Engine - Core Type Definitions
 */

// ============================================================================
// Rows & Ranges
// ============================================================================

/** Zero-based row index, stable for one invalidation cycle. */
export type RowId = number;

/**
 * Full-width row span used when building a view selection.
 * A single row is `startRow === endRow`.
 */
export interface RowRange {
  startRow: RowId;
  endRow: RowId;
  startCol: number;
  endCol: number;
}

/** Removes a previously registered listener or callback. */
export type Unsubscribe = () => void;

// ============================================================================
// Weights
// ============================================================================

export type VertexId = number;
export type InfluenceId = number;

/** Influence id → weight for a single vertex. */
export type WeightMap = Map<InfluenceId, number>;

/** Vertex id → falloff strength in [0, 1]. */
export type SoftSelection = Map<VertexId, number>;

/** Vertex id → weights, the working copy read at invalidation time. */
export type WeightSnapshot = Map<VertexId, WeightMap>;

/**
 * Indexable influence collection as exposed by a bound object.
 * Gaps (removed influences) return `null`.
 */
export interface InfluenceCollection {
  get(id: InfluenceId): string | null;
  lastIndex(): number;
}

// ============================================================================
// Helpers
// ============================================================================

/**
 * Sort and deduplicate row ids.
 */
export function uniqueSortedRows(rows: Iterable<RowId>): RowId[] {
  return Array.from(new Set(rows)).sort((a, b) => a - b);
}

/**
 * Create a row range spanning every column of a list.
 */
export function rowToRange(row: RowId, columnCount: number): RowRange {
  return {
    startRow: row,
    endRow: row,
    startCol: 0,
    endCol: Math.max(0, columnCount - 1),
  };
}

/**
 * Merge row ranges into the ordered set of rows they cover.
 */
export function rangesToRows(ranges: readonly RowRange[]): RowId[] {
  const rows = new Set<RowId>();
  for (const range of ranges) {
    const start = Math.min(range.startRow, range.endRow);
    const end = Math.max(range.startRow, range.endRow);
    for (let row = start; row <= end; row++) {
      rows.add(row);
    }
  }
  return uniqueSortedRows(rows);
}

/**
 * Round a weight for display.
 */
export function roundWeight(weight: number, decimals: number): number {
  const factor = Math.pow(10, decimals);
  return Math.round(weight * factor) / factor;
}
