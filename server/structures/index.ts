export { createStructureEngine, StructureEngine, type StructureEngineOptions } from './engine';
export { SchemaRegistry, type DropHandler, type UpdateOptions } from './schemaRegistry';
export { RecordStore, type CreateOptions } from './recordStore';
export { RecordValidator } from './recordValidator';
export { TableSynchronizer, type MigrationPlan } from './tableSynchronizer';
export { ChangeNotifier, Subscription, toTransportMessage, type SubscribeOptions } from './changeNotifier';
export { parseSchema, validateStructureName } from './schemaParser';
export { mapType, mapTypeToken, project, projectionColumns, columnNameFor, tableNameFor } from './typeMapper';
