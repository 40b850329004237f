/**
 * In-Memory Weight Source Tests
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { InMemoryWeightSource, redistribute } from './InMemoryWeightSource';
import type { WeightMap } from '../types';

function weights(entries: Array<[number, number]>): WeightMap {
  return new Map(entries);
}

describe('redistribute', () => {
  it('should take weight from sources in proportion', () => {
    const result = redistribute(weights([[0, 0.5], [1, 0.25], [2, 0.25]]), 0, [1, 2], 1);

    expect(result).toEqual(weights([[0, 1]]));
  });

  it('should cap the gain at what the sources hold', () => {
    const result = redistribute(weights([[0, 0.25], [1, 0.125], [2, 0.625]]), 0, [1], 1);

    expect(result).toEqual(weights([[0, 0.375], [2, 0.625]]));
  });

  it('should give released weight back in proportion', () => {
    const result = redistribute(weights([[0, 0.5], [1, 0.25], [2, 0.25]]), 0, [1, 2], 0);

    expect(result).toEqual(weights([[1, 0.5], [2, 0.5]]));
  });

  it('should split released weight evenly when sources hold none', () => {
    const result = redistribute(weights([[0, 1]]), 0, [1, 2], 0.5);

    expect(result).toEqual(weights([[0, 0.5], [1, 0.25], [2, 0.25]]));
  });

  it('should keep the active weight when there is nowhere to release it', () => {
    const result = redistribute(weights([[0, 1]]), 0, [], 0.5);

    expect(result).toEqual(weights([[0, 1]]));
  });

  it('should ignore the active influence in the source list', () => {
    const result = redistribute(weights([[0, 0.5], [1, 0.5]]), 0, [0, 1], 1);

    expect(result).toEqual(weights([[0, 1]]));
  });

  it('should clamp the target to [0, 1]', () => {
    const result = redistribute(weights([[0, 0.5], [1, 0.5]]), 0, [1], 3);

    expect(result).toEqual(weights([[0, 1]]));
  });

  it('should not modify the input', () => {
    const existing = weights([[0, 0.5], [1, 0.5]]);
    redistribute(existing, 0, [1], 1);

    expect(existing).toEqual(weights([[0, 0.5], [1, 0.5]]));
  });
});

describe('InMemoryWeightSource', () => {
  let source: InMemoryWeightSource;

  beforeEach(() => {
    source = new InMemoryWeightSource({
      influences: ['Hips', 'Spine', null, 'Head'],
      weights: new Map([
        [0, weights([[0, 0.5], [1, 0.5]])],
        [1, weights([[1, 1]])],
      ]),
      softSelection: new Map([[0, 1]]),
    });
  });

  describe('per-vertex functions', () => {
    const existing = weights([[0, 0.5], [1, 0.5]]);

    it('setWeights should scale the move by falloff', () => {
      expect(source.setWeights(existing, 0, [1], 1, 0.5)).toEqual(weights([[0, 0.75], [1, 0.25]]));
      expect(source.setWeights(existing, 0, [1], 1, 1)).toEqual(weights([[0, 1]]));
      expect(source.setWeights(existing, 0, [1], 1, 0)).toEqual(existing);
    });

    it('incrementWeights should add the amount', () => {
      expect(source.incrementWeights(existing, 0, [1], 0.25, 1)).toEqual(weights([[0, 0.75], [1, 0.25]]));
      expect(source.incrementWeights(existing, 0, [1], -0.25, 1)).toEqual(weights([[0, 0.25], [1, 0.75]]));
    });

    it('scaleWeights should grow the current weight by a percentage', () => {
      expect(source.scaleWeights(existing, 0, [1], 0.5, 1)).toEqual(weights([[0, 0.75], [1, 0.25]]));
      expect(source.scaleWeights(existing, 0, [1], -0.5, 1)).toEqual(weights([[0, 0.25], [1, 0.75]]));
    });
  });

  describe('reads', () => {
    it('should return copies of the soft selection and weights', () => {
      const selection = source.currentSoftSelection();
      selection.set(5, 1);
      const snapshot = source.weightsFor([0]);
      snapshot.get(0)?.set(0, 0);

      expect(source.currentSoftSelection()).toEqual(new Map([[0, 1]]));
      expect(source.getWeights(0)).toEqual(weights([[0, 0.5], [1, 0.5]]));
    });

    it('should skip unknown vertices', () => {
      expect(Array.from(source.weightsFor([1, 9]).keys())).toEqual([1]);
    });

    it('should average and normalize weight maps', () => {
      const average = source.averageWeights([weights([[0, 1]]), weights([[0, 0.5], [1, 0.5]])]);

      expect(average).toEqual(weights([[0, 0.75], [1, 0.25]]));
    });

    it('should average nothing to an empty map', () => {
      expect(source.averageWeights([]).size).toBe(0);
      expect(source.averageWeights([weights([[0, 0]])]).size).toBe(0);
    });
  });

  describe('applyWeights', () => {
    it('should write the whole batch', () => {
      source.applyWeights(
        new Map([
          [0, weights([[0, 1]])],
          [1, weights([[3, 1]])],
        ])
      );

      expect(source.getWeights(0)).toEqual(weights([[0, 1]]));
      expect(source.getWeights(1)).toEqual(weights([[3, 1]]));
      expect(source.getCommitCount()).toBe(1);
    });

    it('should write nothing when any vertex is unknown', () => {
      const batch = new Map([
        [0, weights([[0, 1]])],
        [7, weights([[0, 1]])],
      ]);

      expect(() => source.applyWeights(batch)).toThrow('Unknown vertex 7');
      expect(source.getWeights(0)).toEqual(weights([[0, 0.5], [1, 0.5]]));
      expect(source.getCommitCount()).toBe(0);
    });

    it('should reject removed influences and invalid weights', () => {
      expect(() => source.applyWeights(new Map([[0, weights([[2, 1]])]]))).toThrow(
        'Unknown influence 2 on vertex 0'
      );
      expect(() => source.applyWeights(new Map([[0, weights([[0, -0.5]])]]))).toThrow(
        'Invalid weight -0.5 for influence 0 on vertex 0'
      );
      expect(() => source.applyWeights(new Map([[0, weights([[0, Number.NaN]])]]))).toThrow(
        'Invalid weight NaN for influence 0 on vertex 0'
      );
    });
  });

  describe('influences', () => {
    it('should expose names with gaps', () => {
      const influences = source.influences();

      expect(influences.get(1)).toBe('Spine');
      expect(influences.get(2)).toBeNull();
      expect(influences.get(8)).toBeNull();
      expect(influences.lastIndex()).toBe(3);
    });

    it('should add and remove influences', () => {
      const id = source.addInfluence('Neck');
      source.removeInfluence(0);

      expect(id).toBe(4);
      expect(source.influences().get(4)).toBe('Neck');
      expect(source.influences().get(0)).toBeNull();
    });

    it('should record the selected influence', () => {
      expect(source.getSelectedInfluence()).toBeNull();
      source.selectInfluence(3);
      expect(source.getSelectedInfluence()).toBe(3);
    });
  });
});
