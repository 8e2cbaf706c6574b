/**
 * Single-request store operations over the document client.
 */

export { getItem } from './get.js';
export { putItem } from './put.js';
export { deleteItem } from './delete.js';
export { updateItem } from './update.js';
export { queryPage } from './query.js';
export { scanPage } from './scan.js';
