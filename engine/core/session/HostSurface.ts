/**
 * Host scene/selection surface consumed by an editor session.
 */

import type { Unsubscribe } from '../types/index.js';
import type { WeightSource, WeightTools } from '../weights/WeightSource.js';

/**
 * An editable weighted object bound to the editor.
 */
export interface BoundObject {
  /** Host node name, for logging */
  name: string;
  source: WeightSource;
  /** Geometric and clipboard tools, when the host offers them */
  tools?: WeightTools;
  /** Detach from the host object */
  release(): void;
}

export type HostCallback = () => void;

export interface HostSurface {
  /** Names of the currently selected host nodes */
  activeSelection(): string[];
  /**
   * Bind a node for editing.
   * @returns null when the node is not an editable weighted object
   */
  bind(node: string): BoundObject | null;
  onComponentSelectionChanged(callback: HostCallback): Unsubscribe;
  onUndo(callback: HostCallback): Unsubscribe;
  onRedo(callback: HostCallback): Unsubscribe;
}
