/**
 * Infrastructure Module
 * =====================
 */

export * from './metrics.js';
