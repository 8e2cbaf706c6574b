export { Table, type TableOptions } from './table.js';
