export type { Row, ReadResult } from './record.js';
export type { FilterOperator, FilterCondition, FilterOptions } from './filter.js';
export type { SourceSchema } from './schema.js';
