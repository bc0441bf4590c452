/**
 * Provider Types
 *
 * Central export for all provider-related types.
 */

export * from './capabilities.js';
