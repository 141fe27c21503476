/**
 * Remap - constructor-driven object mapping
 *
 * This file re-exports all packages for convenience. Import from an individual
 * package to depend on less:
 *
 * @example
 * import { ObjectMapper } from '@remap/mapper';
 * import { Logger } from '@remap/logging';
 */

export * from '@remap/mapper';
export * from '@remap/logging';
export * from '@remap/config';
