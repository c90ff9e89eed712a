export { applyFilter } from './filter.js';
export { missingColumns, isBlank } from './columns.js';
