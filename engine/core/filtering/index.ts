/**
 * Filtering Subsystem
 * Export all filtering-related types and classes
 */

export * from './PatternIndex.js';
export * from './FilterEngine.js';
