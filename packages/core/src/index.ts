/**
 * Strata Core Package
 * Datanode membership with Vue reactivity for state management
 * @module @strata/core
 */

// Export reactive stores
export * from './stores';

// Export models
export * from './models';

// Export services
export * from './services';

// Export persistence
export * from './persistence';

// Export Vue reactivity utilities for consumers
export {
  computed,
  isRef,
  type ComputedRef,
} from '@vue/reactivity';
