/**
 * Core Fusion System
 *
 * Public API barrel file.
 *
 * @example
 * ```typescript
 * import { fuseRuns, readRun, writeRunFile } from '@/core';
 * import type { FusionSettings, Run } from '@/core';
 * ```
 */

export * from './fusion';
