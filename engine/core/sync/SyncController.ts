/**
 * Sync Controller
 * Keeps the selections of two sibling FilterEngines consistent
 *
 * Each engine raises a `match` event when its own selection changes with
 * auto-select on (or when auto-select is switched on). The controller answers
 * by pushing the initiator's cached selection into the sibling. The sibling's
 * view then fires its own selection signal, which would push straight back;
 * the shared SyncContext turns that nested push into a no-op.
 */

import type { FilterEngine } from '../filtering/FilterEngine.js';
import { logger as defaultLogger } from '../logging/LogManager.js';
import type { LogManager } from '../logging/LogManager.js';
import type { Unsubscribe } from '../types/index.js';
import { SyncContext } from './SyncContext.js';

export interface SyncControllerOptions {
  /** Shared pending-flag holder @default a new context per pair */
  context?: SyncContext;
  log?: LogManager;
}

export class SyncController {
  readonly first: FilterEngine;
  readonly second: FilterEngine;
  readonly context: SyncContext;

  private log: LogManager;
  private subscriptions: Unsubscribe[];

  constructor(first: FilterEngine, second: FilterEngine, options: SyncControllerOptions = {}) {
    if (first === second) {
      throw new Error('SyncController requires two distinct engines');
    }

    this.first = first;
    this.second = second;
    this.context = options.context ?? new SyncContext();
    this.log = options.log ?? defaultLogger;

    first.setSibling(second);
    second.setSibling(first);

    this.subscriptions = [first, second].map((engine) =>
      engine.subscribe((event) => {
        if (event.type === 'match') {
          this.matchSelection(engine);
        }
      })
    );
  }

  /**
   * Push the initiator's cached selection into its sibling.
   * @returns false when skipped because a push is already in flight
   */
  matchSelection(initiator: FilterEngine): boolean {
    const sibling = this.siblingOf(initiator);

    if (this.context.isPending()) {
      this.log.debug('Sync', `${initiator.name}: push skipped, sync already pending`);
      return false;
    }

    const rows = initiator.selectedRows();
    this.log.debug('Sync', `${initiator.name} -> ${sibling.name}`, rows);

    return this.context.run(() => {
      sibling.selectRows(rows);
    });
  }

  siblingOf(engine: FilterEngine): FilterEngine {
    if (engine === this.first) return this.second;
    if (engine === this.second) return this.first;
    throw new Error(`${engine.name} is not part of this pair`);
  }

  /**
   * Stop listening and unlink the engines.
   */
  dispose(): void {
    for (const unsubscribe of this.subscriptions) {
      unsubscribe();
    }
    this.subscriptions = [];

    if (this.first.getSibling() === this.second) this.first.setSibling(null);
    if (this.second.getSibling() === this.first) this.second.setSibling(null);
  }
}
