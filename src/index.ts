/**
 * dynaquery
 *
 * Schema-driven access to DynamoDB tables: a condition algebra, an update
 * compiler and a query dispatcher that picks the cheapest store operation
 * for each lookup.
 *
 * @module dynaquery
 */

// ============================================================================
// Client
// ============================================================================

export { DynaQueryClient, type DynaQueryClientOptions } from './client/index.js';
export { Table, type TableOptions } from './table/index.js';

// ============================================================================
// Configuration
// ============================================================================

export * from './config/index.js';

// ============================================================================
// Error Handling
// ============================================================================

export * from './error/index.js';

// ============================================================================
// Schema
// ============================================================================

export * from './types/index.js';
export * from './attributes/index.js';
export * from './schema/index.js';

// ============================================================================
// Conditions and Updates
// ============================================================================

export * from './conditions/index.js';
export * from './updates/index.js';

// ============================================================================
// Query Dispatch
// ============================================================================

export * from './query/index.js';
export * from './iterator/index.js';

// ============================================================================
// Transport
// ============================================================================

export * from './transport/index.js';
export * from './operations/index.js';
export * from './batch/index.js';

// ============================================================================
// Observability
// ============================================================================

export * from './observability/index.js';
