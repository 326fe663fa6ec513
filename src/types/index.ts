/**
 * @fileoverview Central export for shared type definitions.
 *
 * ```typescript
 * import { Finding, Fix, ReviewInput } from './types';
 * ```
 *
 * @module types
 */

export * from './review';
