export { Schema, keyAttributes, isKeyAttribute, type KeySpec } from './schema.js';
