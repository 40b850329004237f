/**
 * Weight source capabilities consumed by the editor.
 *
 * The host owns the weighted object; the editor only reads snapshots, asks for
 * per-vertex results, and commits whole batches.
 */

import type {
  InfluenceCollection,
  InfluenceId,
  SoftSelection,
  VertexId,
  WeightMap,
  WeightSnapshot,
} from '../types/index.js';
import type { MirrorAxis, SlabOption } from '../config/EditorConfig.js';

/**
 * Pure per-vertex edit. Must not touch the weight source's stored weights.
 */
export type VertexWeightFunction = (
  existing: WeightMap,
  active: InfluenceId,
  sources: readonly InfluenceId[],
  amount: number,
  falloff: number
) => WeightMap;

export interface WeightSource {
  currentSoftSelection(): SoftSelection;
  weightsFor(vertexIds: readonly VertexId[]): WeightSnapshot;
  averageWeights(maps: readonly WeightMap[]): WeightMap;

  setWeights: VertexWeightFunction;
  incrementWeights: VertexWeightFunction;
  scaleWeights: VertexWeightFunction;

  /**
   * Commit a batch. Either every vertex is written or, on throw, none is.
   */
  applyWeights(updates: WeightSnapshot): void;

  influences(): InfluenceCollection;

  /** Make an influence the host's active paint target. */
  selectInfluence?(id: InfluenceId): void;
}

// =============================================================================
// Geometric Tools
// =============================================================================

export interface BlendOptions {
  blendByDistance: boolean;
}

export interface MirrorOptions {
  pull: boolean;
  axis: MirrorAxis;
  tolerance: number;
  resetActiveSelection: boolean;
}

export interface SlabOptions {
  slabOption: SlabOption;
}

/**
 * Host-side operations the editor triggers but never computes.
 */
export interface WeightTools {
  copyWeights(): void;
  pasteWeights(): void;
  pasteAveragedWeights(): void;
  blendVertices(): void;
  blendBetweenVertices(options: BlendOptions): void;
  blendBetweenTwoVertices(options: BlendOptions): void;
  mirrorVertices(vertices: readonly VertexId[], options: MirrorOptions): void;
  slabPasteWeights(options: SlabOptions): void;
  selectedVertices(): VertexId[];
  verticesByInfluence(influenceIds: readonly InfluenceId[]): VertexId[];
  setVertexSelection(vertices: readonly VertexId[]): void;
  addInfluences(): void;
  removeInfluences(): void;
}
