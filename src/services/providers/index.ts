/**
 * Provider Framework
 *
 * Central export for all provider-related components.
 */

// Core Components
export * from './BaseProvider.js';
export * from './CapabilityInspector.js';
export * from './ProviderRouter.js';
export * from './ProviderDispatcher.js';
export * from './ProviderRegistry.js';
export * from './contracts.js';

// Orchestration
export * from './mixed/MixedProvider.js';
export * from './mixed/MixedMetadataProvider.js';

// Utilities
export * from './utils/index.js';

// Types
export * from '../../types/providers/index.js';
