/**
 * @scriptwrap/types - Type definitions for the scriptwrap binding generator
 */

// Type graph document (rustdoc JSON)
export * from './graph.js';

// Binding configuration
export * from './config.js';
