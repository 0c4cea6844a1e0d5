/**
 * Utils Module
 *
 * Re-exports all utility functions for easy importing.
 */

export * from './colors';
export * from './logger';
