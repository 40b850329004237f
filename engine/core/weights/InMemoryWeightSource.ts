/**
 * In-Memory Weight Source
 *
 * Reference WeightSource keeping weights in maps. Used for headless editing
 * and as the stand-in host in tests.
 *
 * Redistribution: the active influence moves toward its target value and the
 * difference is taken from (or given to) the source influences in proportion
 * to their current weights. When the sources hold no weight, weight given
 * back is split evenly. The active influence never gains more than the
 * sources can give.
 */

import type {
  InfluenceCollection,
  InfluenceId,
  SoftSelection,
  VertexId,
  WeightMap,
  WeightSnapshot,
} from '../types/index.js';
import type { WeightSource } from './WeightSource.js';

/** Weights at or below this are dropped from results. */
export const WEIGHT_EPSILON = 1e-9;

export interface InMemoryWeightSourceOptions {
  /** Influence names by id; `null` marks a removed influence */
  influences: ReadonlyArray<string | null>;
  weights?: WeightSnapshot;
  softSelection?: SoftSelection;
}

function clamp01(value: number): number {
  return Math.min(1, Math.max(0, value));
}

function copyWeights(weights: WeightMap): WeightMap {
  return new Map(weights);
}

/**
 * Move `active` to `target` and rebalance `sources`.
 */
export function redistribute(
  existing: WeightMap,
  active: InfluenceId,
  sources: readonly InfluenceId[],
  target: number
): WeightMap {
  const result = copyWeights(existing);
  const current = existing.get(active) ?? 0;
  const pool = sources.filter((id) => id !== active);
  const available = pool.reduce((sum, id) => sum + (existing.get(id) ?? 0), 0);

  let delta = clamp01(target) - current;

  if (delta > 0) {
    delta = Math.min(delta, available);
    if (delta > 0) {
      for (const id of pool) {
        const weight = existing.get(id) ?? 0;
        result.set(id, weight - delta * (weight / available));
      }
    }
  } else if (delta < 0) {
    const released = -delta;
    if (pool.length === 0) {
      delta = 0;
    } else if (available > 0) {
      for (const id of pool) {
        const weight = existing.get(id) ?? 0;
        result.set(id, weight + released * (weight / available));
      }
    } else {
      const share = released / pool.length;
      for (const id of pool) {
        result.set(id, share);
      }
    }
  }

  result.set(active, current + delta);

  for (const [id, weight] of result) {
    if (weight <= WEIGHT_EPSILON) {
      result.delete(id);
    }
  }

  return result;
}

export class InMemoryWeightSource implements WeightSource {
  private names: Array<string | null>;
  private weights: WeightSnapshot;
  private softSelection: SoftSelection;
  private activeInfluence: InfluenceId | null = null;
  private commits: number = 0;

  constructor(options: InMemoryWeightSourceOptions) {
    this.names = [...options.influences];
    this.weights = new Map();
    for (const [vertex, weights] of options.weights ?? []) {
      this.weights.set(vertex, copyWeights(weights));
    }
    this.softSelection = new Map(options.softSelection ?? []);
  }

  // ===========================================================================
  // Host-side state
  // ===========================================================================

  setSoftSelection(selection: SoftSelection): void {
    this.softSelection = new Map(selection);
  }

  getWeights(vertex: VertexId): WeightMap | undefined {
    const weights = this.weights.get(vertex);
    return weights ? copyWeights(weights) : undefined;
  }

  getSelectedInfluence(): InfluenceId | null {
    return this.activeInfluence;
  }

  getCommitCount(): number {
    return this.commits;
  }

  addInfluence(name: string): InfluenceId {
    this.names.push(name);
    return this.names.length - 1;
  }

  removeInfluence(id: InfluenceId): void {
    if (id >= 0 && id < this.names.length) {
      this.names[id] = null;
    }
  }

  // ===========================================================================
  // WeightSource
  // ===========================================================================

  currentSoftSelection(): SoftSelection {
    return new Map(this.softSelection);
  }

  weightsFor(vertexIds: readonly VertexId[]): WeightSnapshot {
    const snapshot: WeightSnapshot = new Map();
    for (const vertex of vertexIds) {
      const weights = this.weights.get(vertex);
      if (weights) {
        snapshot.set(vertex, copyWeights(weights));
      }
    }
    return snapshot;
  }

  /**
   * Mean weight per influence, normalized to sum to 1.
   */
  averageWeights(maps: readonly WeightMap[]): WeightMap {
    const sums: WeightMap = new Map();
    if (maps.length === 0) {
      return sums;
    }

    for (const weights of maps) {
      for (const [id, weight] of weights) {
        sums.set(id, (sums.get(id) ?? 0) + weight);
      }
    }

    let total = 0;
    for (const weight of sums.values()) {
      total += weight;
    }
    if (total <= 0) {
      return new Map();
    }

    const average: WeightMap = new Map();
    for (const [id, weight] of sums) {
      average.set(id, weight / total);
    }
    return average;
  }

  setWeights(
    existing: WeightMap,
    active: InfluenceId,
    sources: readonly InfluenceId[],
    amount: number,
    falloff: number
  ): WeightMap {
    const current = existing.get(active) ?? 0;
    return redistribute(existing, active, sources, current + (amount - current) * falloff);
  }

  incrementWeights(
    existing: WeightMap,
    active: InfluenceId,
    sources: readonly InfluenceId[],
    amount: number,
    falloff: number
  ): WeightMap {
    const current = existing.get(active) ?? 0;
    return redistribute(existing, active, sources, current + amount * falloff);
  }

  scaleWeights(
    existing: WeightMap,
    active: InfluenceId,
    sources: readonly InfluenceId[],
    percent: number,
    falloff: number
  ): WeightMap {
    const current = existing.get(active) ?? 0;
    return redistribute(existing, active, sources, current + current * percent * falloff);
  }

  /**
   * Validate the whole batch, then write it. Nothing is written on error.
   */
  applyWeights(updates: WeightSnapshot): void {
    for (const [vertex, weights] of updates) {
      if (!this.weights.has(vertex)) {
        throw new Error(`Unknown vertex ${vertex}`);
      }
      for (const [id, weight] of weights) {
        if (!Number.isFinite(weight) || weight < 0) {
          throw new Error(`Invalid weight ${weight} for influence ${id} on vertex ${vertex}`);
        }
        if (this.names[id] == null) {
          throw new Error(`Unknown influence ${id} on vertex ${vertex}`);
        }
      }
    }

    for (const [vertex, weights] of updates) {
      this.weights.set(vertex, copyWeights(weights));
    }
    this.commits++;
  }

  influences(): InfluenceCollection {
    const names = [...this.names];
    return {
      get: (id: InfluenceId) => names[id] ?? null,
      lastIndex: () => names.length - 1,
    };
  }

  selectInfluence(id: InfluenceId): void {
    this.activeInfluence = id;
  }
}
