/**
 * Classification exports
 */

export * from './color-rules.js';
export * from './waypoint-classifier.js';
