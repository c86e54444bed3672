/**
 * Monitoring Module
 * Exports metrics rendering
 */

export * from './metrics.js';
