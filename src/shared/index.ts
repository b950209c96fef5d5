/**
 * Shared layer - re-exports all shared utilities
 */

// API utilities
export * from './api';

// Library utilities
export * from './lib';

// Configuration
export * from './config';
