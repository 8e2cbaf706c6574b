/**
 * Update algebra and compiler.
 */

export type { Update, SetUpdate, RemoveUpdate, AddUpdate, ListExtendUpdate } from './update.js';
export { PlaceholderSequence, defaultPlaceholderSequence } from './placeholder.js';
export { compileUpdates, type CompiledUpdate, type CompileOptions } from './compiler.js';
