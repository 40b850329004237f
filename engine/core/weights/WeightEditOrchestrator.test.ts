/**
 * Weight Edit Orchestrator Tests
 * Influence resolution, invalidation and atomic batch edits
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { WeightEditOrchestrator, WEIGHT_COLUMN } from './WeightEditOrchestrator';
import type { WeightEditEvent } from './WeightEditOrchestrator';
import { InMemoryWeightSource } from './InMemoryWeightSource';
import { FilterEngine } from '../filtering/FilterEngine';
import { ListModel } from '../data/ListModel';
import { ListSelectionModel } from '../selection/ListSelectionModel';
import { LogManager } from '../logging/LogManager';
import {
  NoActiveInfluenceError,
  NoSelectionError,
  StaleWeightsError,
  ValidationError,
  WeightCommitError,
} from '../errors/EditorErrors';
import type { SoftSelection, WeightMap } from '../types';

// ===========================================================================
// Fixture
// ===========================================================================

const NAMES = ['Hips', 'Spine', 'Neck', 'Head'];

interface Fixture {
  source: InMemoryWeightSource;
  influences: FilterEngine;
  weights: FilterEngine;
  weightModel: ListModel;
  orchestrator: WeightEditOrchestrator;
  log: LogManager;
}

function weights(entries: Array<[number, number]>): WeightMap {
  return new Map(entries);
}

function createModel(columns: number): ListModel {
  const model = new ListModel(columns);
  model.setRowCount(NAMES.length);
  NAMES.forEach((name, row) => model.setItem(row, 0, name));
  return model;
}

function createFixture(softSelection: SoftSelection, precision: boolean = false): Fixture {
  const log = new LogManager({ silent: true });
  const source = new InMemoryWeightSource({
    influences: NAMES,
    weights: new Map([
      [0, weights([[0, 0.5], [1, 0.5]])],
      [1, weights([[1, 1]])],
      [2, weights([[0, 0.25], [2, 0.75]])],
    ]),
    softSelection,
  });

  const influences = new FilterEngine({
    name: 'influences',
    model: createModel(1),
    view: new ListSelectionModel(),
    log,
  });
  const weightModel = createModel(2);
  const weightEngine = new FilterEngine({
    name: 'weights',
    model: weightModel,
    view: new ListSelectionModel(),
    log,
  });

  const orchestrator = new WeightEditOrchestrator({
    influences,
    weights: weightEngine,
    weightModel,
    source,
    precision,
    log,
  });

  return { source, influences, weights: weightEngine, weightModel, orchestrator, log };
}

// ===========================================================================
// Influence Resolution
// ===========================================================================

describe('WeightEditOrchestrator - Influence Resolution', () => {
  it('should use the first influence list selection as active', () => {
    const { influences, orchestrator } = createFixture(new Map());
    influences.setSelectedRows([2, 3]);

    expect(orchestrator.activeInfluence()).toBe(2);
  });

  it('should raise when no influence is selected', () => {
    const { orchestrator } = createFixture(new Map());

    expect(() => orchestrator.activeInfluence()).toThrow(NoActiveInfluenceError);
  });

  it('should use every other active weight row outside precision mode', () => {
    const { weights: engine, orchestrator } = createFixture(new Map());
    engine.setVisible([0, 1, 2, 3]);
    engine.setSelectedRows([1]);

    expect(orchestrator.sourceInfluences()).toEqual([0, 2, 3]);
  });

  it('should use the selection minus the active influence in precision mode', () => {
    const { influences, weights: engine, orchestrator } = createFixture(new Map(), true);
    influences.setSelectedRows([1]);
    engine.setSelectedRows([0, 1]);

    expect(orchestrator.sourceInfluences()).toEqual([0]);
    expect(engine.selectedRows()).toEqual([0, 1]);
  });

  it('should raise when the weight list has no selection', () => {
    const { weights: engine, orchestrator } = createFixture(new Map());
    engine.setVisible([0, 1]);

    expect(() => orchestrator.sourceInfluences()).toThrow(NoSelectionError);
  });

  it('should switch precision mode', () => {
    const { orchestrator } = createFixture(new Map());

    orchestrator.setPrecision(true);

    expect(orchestrator.isPrecision()).toBe(true);
    expect(() => orchestrator.setPrecision('on')).toThrow(ValidationError);
  });
});

// ===========================================================================
// Invalidation
// ===========================================================================

describe('WeightEditOrchestrator - Invalidation', () => {
  it('should display the weights of a single vertex', () => {
    const { weights: engine, weightModel, orchestrator } = createFixture(new Map([[0, 1]]));
    const events: WeightEditEvent[] = [];
    orchestrator.subscribe((event) => events.push(event));

    orchestrator.invalidateWeights();

    expect(orchestrator.getVertexWeights()).toEqual(weights([[0, 0.5], [1, 0.5]]));
    expect(engine.visible()).toEqual([0, 1]);
    expect(weightModel.getLabel(0, WEIGHT_COLUMN)).toBe('0.5');
    expect(weightModel.getLabel(3, WEIGHT_COLUMN)).toBe('0');
    expect(orchestrator.isStale()).toBe(false);
    expect(events.map((event) => event.type)).toEqual(['invalidated']);
  });

  it('should display the normalized average of several vertices', () => {
    const { weights: engine, weightModel, orchestrator } = createFixture(
      new Map([
        [0, 1],
        [2, 1],
      ])
    );

    orchestrator.invalidateWeights();

    expect(orchestrator.getVertexWeights()).toEqual(weights([[0, 0.375], [1, 0.25], [2, 0.375]]));
    expect(engine.visible()).toEqual([0, 1, 2]);
    expect(weightModel.getLabel(2, WEIGHT_COLUMN)).toBe('0.375');
    expect(orchestrator.getDisplayedWeight(1)).toBe(0.25);
  });

  it('should leave the lists alone without a soft selection', () => {
    const { weights: engine, weightModel, orchestrator } = createFixture(new Map());
    engine.setVisible([3]);

    orchestrator.invalidateWeights();

    expect(orchestrator.getVertexWeights().size).toBe(0);
    expect(engine.visible()).toEqual([3]);
    expect(weightModel.getLabel(0, WEIGHT_COLUMN)).toBe('');
  });

  it('should read the source once until marked stale', () => {
    const { source, orchestrator } = createFixture(new Map([[1, 1]]));
    const read = vi.spyOn(source, 'weightsFor');

    orchestrator.getSnapshot();
    orchestrator.getSnapshot();

    expect(read).toHaveBeenCalledTimes(1);
    expect(orchestrator.getSoftSelection()).toEqual(new Map([[1, 1]]));
  });
});

// ===========================================================================
// Batch Edits
// ===========================================================================

describe('WeightEditOrchestrator - Batch Edits', () => {
  let fixture: Fixture;

  function prepare(softSelection: SoftSelection): void {
    fixture = createFixture(softSelection);
    fixture.orchestrator.invalidateWeights();
    fixture.influences.setSelectedRows([0]);
    fixture.weights.setSelectedRows([0]);
  }

  beforeEach(() => {
    prepare(new Map([[0, 1]]));
  });

  it('should commit a set in one applyWeights call', () => {
    const apply = vi.spyOn(fixture.source, 'applyWeights');

    const result = fixture.orchestrator.setWeights(1);

    expect(apply).toHaveBeenCalledTimes(1);
    expect(apply).toHaveBeenCalledWith(new Map([[0, weights([[0, 1]])]]));
    expect(result).toEqual({
      kind: 'set',
      amount: 1,
      activeInfluence: 0,
      sourceInfluences: [1],
      vertexCount: 1,
    });
    expect(fixture.source.getWeights(0)).toEqual(weights([[0, 1]]));
  });

  it('should re-invalidate after a commit', () => {
    const events: WeightEditEvent[] = [];
    fixture.orchestrator.subscribe((event) => events.push(event));

    fixture.orchestrator.setWeights(1);

    expect(fixture.orchestrator.getVertexWeights()).toEqual(weights([[0, 1]]));
    expect(fixture.weights.visible()).toEqual([0]);
    expect(fixture.weightModel.getLabel(1, WEIGHT_COLUMN)).toBe('0');
    expect(events.map((event) => event.type)).toEqual(['invalidated', 'committed']);
  });

  it('should scale the edit by falloff', () => {
    prepare(new Map([[0, 0.5]]));

    fixture.orchestrator.setWeights(1);

    expect(fixture.source.getWeights(0)).toEqual(weights([[0, 0.75], [1, 0.25]]));
  });

  it('should negate an increment when pulling', () => {
    const result = fixture.orchestrator.incrementWeights(0.25, true);

    expect(result.amount).toBe(-0.25);
    expect(result.kind).toBe('increment');
    expect(fixture.source.getWeights(0)).toEqual(weights([[0, 0.25], [1, 0.75]]));
  });

  it('should scale the active weight', () => {
    fixture.orchestrator.scaleWeights(0.5);

    expect(fixture.source.getWeights(0)).toEqual(weights([[0, 0.75], [1, 0.25]]));
  });

  it('should apply a preset as a set', () => {
    const result = fixture.orchestrator.applyPreset(0);

    expect(result.kind).toBe('preset');
    expect(fixture.source.getWeights(0)).toEqual(weights([[1, 1]]));
  });

  it('should reject an invalid amount before reading anything', () => {
    const apply = vi.spyOn(fixture.source, 'applyWeights');

    expect(() => fixture.orchestrator.setWeights('0.5')).toThrow(ValidationError);
    expect(() => fixture.orchestrator.scaleWeights(Number.NaN)).toThrow(ValidationError);
    expect(apply).not.toHaveBeenCalled();
  });

  it('should abort without an active influence', () => {
    const apply = vi.spyOn(fixture.source, 'applyWeights');
    fixture.influences.setSelectedRows([]);

    expect(() => fixture.orchestrator.setWeights(1)).toThrow(NoActiveInfluenceError);
    expect(apply).not.toHaveBeenCalled();
  });

  it('should abort without a weight list selection', () => {
    const apply = vi.spyOn(fixture.source, 'applyWeights');
    fixture.weights.setSelectedRows([]);

    expect(() => fixture.orchestrator.incrementWeights(0.1)).toThrow(NoSelectionError);
    expect(apply).not.toHaveBeenCalled();
  });

  it('should apply nothing when one vertex fails to compute', () => {
    prepare(
      new Map([
        [0, 1],
        [1, 1],
        [2, 1],
      ])
    );
    const apply = vi.spyOn(fixture.source, 'applyWeights');
    let calls = 0;
    vi.spyOn(fixture.source, 'setWeights').mockImplementation((existing) => {
      calls++;
      if (calls === 2) {
        throw new Error('vertex 1 failed');
      }
      return new Map(existing);
    });

    expect(() => fixture.orchestrator.setWeights(1)).toThrow('vertex 1 failed');
    expect(apply).not.toHaveBeenCalled();
    expect(fixture.source.getCommitCount()).toBe(0);
  });

  it('should raise for a soft-selected vertex without cached weights', () => {
    prepare(
      new Map([
        [0, 1],
        [9, 1],
      ])
    );
    const apply = vi.spyOn(fixture.source, 'applyWeights');

    expect(() => fixture.orchestrator.setWeights(1)).toThrow(StaleWeightsError);
    expect(apply).not.toHaveBeenCalled();
  });

  it('should mark the snapshot stale when the source rejects the batch', () => {
    const cause = new Error('locked');
    vi.spyOn(fixture.source, 'applyWeights').mockImplementationOnce(() => {
      throw cause;
    });
    const before = fixture.orchestrator.getVertexWeights();

    let thrown: unknown;
    try {
      fixture.orchestrator.setWeights(1);
    } catch (error) {
      thrown = error;
    }

    expect(thrown).toBeInstanceOf(WeightCommitError);
    expect(thrown instanceof WeightCommitError && thrown.cause).toBe(cause);
    expect(fixture.orchestrator.isStale()).toBe(true);
    expect(fixture.orchestrator.getVertexWeights()).toBe(before);
    expect(fixture.log.getEntries().map((entry) => entry.m)).toContain('set batch rejected by weight source');
  });

  it('should re-read the source on the next snapshot after a rejection', () => {
    vi.spyOn(fixture.source, 'applyWeights').mockImplementationOnce(() => {
      throw new Error('locked');
    });
    expect(() => fixture.orchestrator.setWeights(1)).toThrow(WeightCommitError);
    const read = vi.spyOn(fixture.source, 'weightsFor');

    fixture.orchestrator.setWeights(1);

    expect(read).toHaveBeenCalledTimes(2);
    expect(fixture.source.getWeights(0)).toEqual(weights([[0, 1]]));
  });
});

// ===========================================================================
// Host Notification
// ===========================================================================

describe('WeightEditOrchestrator - Host Notification', () => {
  it('should forward influence selection to the source', () => {
    const { source, influences } = createFixture(new Map());
    influences.setVisible([0, 1, 2, 3]);

    influences.getView().click(2);

    expect(source.getSelectedInfluence()).toBe(2);
  });

  it('should stop forwarding after dispose', () => {
    const { source, influences, orchestrator } = createFixture(new Map());
    influences.setVisible([0, 1, 2, 3]);

    orchestrator.dispose();
    influences.getView().click(1);

    expect(source.getSelectedInfluence()).toBeNull();
  });
});
