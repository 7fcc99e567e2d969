/**
 * @qwalk/shared
 * Shared types, constants, and utilities for quantum-walk result processing
 */

export * from './types/index.js';
export * from './constants/index.js';
export * from './utils/index.js';
