// ============================================================================
// SHARED MODULE EXPORTS
// ============================================================================

// Export all types
export * from './types/index';

// Export error handling utilities using neverthrow
export * from './utils/errorHandler';

// Export daily schedule utilities
export * from './utils/dateUtils';

// Export option symbol parsing utilities
export * from './src/utils/optionSymbolParser';
