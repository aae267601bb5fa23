export { SequelizeSchemaStore } from './SequelizeSchemaStore.js';
export type { SequelizeSchemaStoreOptions } from './SequelizeSchemaStore.js';
export { toStoredColumns, toTableColumn } from './mappers/ColumnMapper.js';
export { importTableAttributes } from './models/ImportTableAttributes.js';
