/**
 * Influence Editor Engine - Data Module Exports
 */

export { ListModel } from './ListModel.js';
export type { ItemSource } from './ListModel.js';
