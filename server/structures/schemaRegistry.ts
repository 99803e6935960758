/**
 * 结构注册表
 *
 * 结构定义的唯一来源：定义 / 更新 / 删除 / vacuum 都在同一个存储事务内
 * 完成物理迁移与注册表写入，并在结构锁（独占）下执行。
 * 内存缓存只在事务提交后更新，读操作（get / list）同步返回。
 */

import type {
  JsonObject,
  MigrationEntry,
  MigrationKind,
  MigrationSummary,
  ObjectFieldSpec,
  StructureDefinition,
  ValidationResult,
} from '../../shared/structureTypes';
import type { EngineConfig } from '../core/config-schema';
import { AlreadyExistsError, ConcurrencyError, DataIntegrityError, NotFoundError } from '../core/errors';
import { createModuleLogger } from '../core/logger';
import type { KeyedLock } from '../lib/concurrency/keyedLock';
import type { PhysicalStore, StoreTransaction, StructureRow } from '../storage/physicalStore';
import type { RecordValidator } from './recordValidator';
import { parseSchema, validateStructureName } from './schemaParser';
import { emptySummary, type TableSynchronizer } from './tableSynchronizer';
import { tableNameFor } from './typeMapper';

const log = createModuleLogger('schema-registry');

/** drop 时在同一事务内清理结构数据 */
export type DropHandler = (tx: StoreTransaction, definition: StructureDefinition) => Promise<void>;

export interface SchemaRegistryDeps {
  store: PhysicalStore;
  lock: KeyedLock;
  synchronizer: TableSynchronizer;
  validator: RecordValidator;
  config: Pick<EngineConfig, 'tablePrefix' | 'maxDepth'>;
  now?: () => Date;
}

export interface UpdateOptions {
  /** 调用方认为当前所处的版本；缺省取调用时缓存中的版本 */
  expectedVersion?: number;
}

function toDefinition(row: StructureRow, schema: JsonObject, fields: ObjectFieldSpec): StructureDefinition {
  return {
    name: row.name,
    tableName: row.tableName,
    schema,
    fields,
    version: row.version,
    deprecatedColumns: [...row.meta.deprecatedColumns],
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
  };
}

export class SchemaRegistry {
  private readonly cache = new Map<string, StructureDefinition>();
  private readonly dropListeners: Array<(name: string) => void> = [];
  private dropHandler: DropHandler | null = null;
  private readonly now: () => Date;

  constructor(private readonly deps: SchemaRegistryDeps) {
    this.now = deps.now ?? (() => new Date());
  }

  /** 从存储加载全部定义 */
  async load(): Promise<void> {
    const rows = await this.deps.store.transaction(tx => tx.listStructures());
    this.cache.clear();
    for (const row of rows) {
      this.cache.set(row.name, this.hydrate(row));
    }
    log.info({ structures: rows.length }, 'Registry loaded');
  }

  setDropHandler(handler: DropHandler): void {
    this.dropHandler = handler;
  }

  /** 结构被删除并提交后回调 */
  onDropped(listener: (name: string) => void): void {
    this.dropListeners.push(listener);
  }

  has(name: string): boolean {
    return this.cache.has(name);
  }

  get(name: string): StructureDefinition {
    const definition = this.cache.get(name);
    if (!definition) throw new NotFoundError('structure', name);
    return definition;
  }

  list(): StructureDefinition[] {
    return [...this.cache.values()].sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
  }

  // ============================================
  // define
  // ============================================

  async define(name: string, schemaDoc: unknown): Promise<StructureDefinition> {
    validateStructureName(name);
    const { schema, fields } = parseSchema(schemaDoc, { maxDepth: this.deps.config.maxDepth });
    const tableName = tableNameFor(this.deps.config.tablePrefix, name);

    return this.deps.lock.withExclusive(name, () => this.deps.store.transaction(async tx => {
      if (await tx.findStructure(name)) throw new AlreadyExistsError('structure', name);
      const owner = (await tx.listStructures()).find(r => r.tableName === tableName);
      if (owner) throw new AlreadyExistsError('table', tableName, { structure: owner.name });

      const existing = await tx.describeTable(tableName);
      if (existing) {
        log.warn({ structure: name, table: tableName }, 'Adopting existing table without registry entry');
      }
      const plan = this.deps.synchronizer.plan(name, tableName, fields, existing, []);
      await this.deps.synchronizer.apply(tx, plan);

      const now = this.now();
      const row: StructureRow = {
        name,
        tableName,
        schemaJson: JSON.stringify(schema),
        version: 1,
        meta: { deprecatedColumns: plan.deprecatedColumns },
        createdAt: now,
        updatedAt: now,
      };
      await tx.insertStructure(row);
      await tx.appendMigration(this.migration(name, 1, 'create', plan.summary, now));

      const definition = toDefinition(row, schema, fields);
      tx.afterCommit(() => {
        this.cache.set(name, definition);
        log.info({ structure: name, table: tableName, ...plan.summary }, 'Structure defined');
      });
      return definition;
    }));
  }

  // ============================================
  // update
  // ============================================

  async update(name: string, schemaDoc: unknown, options: UpdateOptions = {}): Promise<StructureDefinition> {
    const baseVersion = options.expectedVersion ?? this.get(name).version;
    const { schema, fields } = parseSchema(schemaDoc, { maxDepth: this.deps.config.maxDepth });

    return this.deps.lock.withExclusive(name, () => this.deps.store.transaction(async tx => {
      const current = await tx.findStructure(name);
      if (!current) throw new NotFoundError('structure', name);
      if (current.version !== baseVersion) {
        throw new ConcurrencyError(
          `Structure '${name}' is at version ${current.version}, update was based on version ${baseVersion}`,
          { structure: name, expectedVersion: baseVersion, actualVersion: current.version },
        );
      }

      const plan = await this.deps.synchronizer.synchronize(
        tx, name, current.tableName, fields, current.meta.deprecatedColumns,
      );

      const now = this.now();
      const row: StructureRow = {
        ...current,
        schemaJson: JSON.stringify(schema),
        version: current.version + 1,
        meta: { deprecatedColumns: plan.deprecatedColumns },
        updatedAt: now,
      };
      await tx.updateStructure(row);
      await tx.appendMigration(this.migration(name, row.version, 'update', plan.summary, now));

      const definition = toDefinition(row, schema, fields);
      tx.afterCommit(() => {
        this.cache.set(name, definition);
        log.info({ structure: name, version: row.version, ...plan.summary }, 'Structure updated');
      });
      return definition;
    }));
  }

  // ============================================
  // drop / vacuum
  // ============================================

  async drop(name: string): Promise<void> {
    await this.deps.lock.withExclusive(name, () => this.deps.store.transaction(async tx => {
      const row = await tx.findStructure(name);
      if (!row) throw new NotFoundError('structure', name);
      const definition = this.cache.get(name) ?? this.hydrate(row);

      const summary = emptySummary();
      summary.dropped = ((await tx.describeTable(row.tableName)) ?? []).map(c => c.name);
      await tx.deleteStructure(name);
      await tx.appendMigration(this.migration(name, row.version, 'drop', summary, this.now()));

      if (this.dropHandler) await this.dropHandler(tx, definition);
      else await tx.dropTable(row.tableName);

      tx.afterCommit(() => {
        this.cache.delete(name);
        log.info({ structure: name, table: row.tableName }, 'Structure dropped');
        for (const listener of this.dropListeners) listener(name);
      });
    }));
  }

  /** 删除 deprecated 列；版本号不变。返回被删除的列 */
  async vacuum(name: string): Promise<string[]> {
    return this.deps.lock.withExclusive(name, () => this.deps.store.transaction(async tx => {
      const row = await tx.findStructure(name);
      if (!row) throw new NotFoundError('structure', name);
      if (row.meta.deprecatedColumns.length === 0) return [];

      const dropped = await this.deps.synchronizer.vacuum(tx, row.tableName, row.meta.deprecatedColumns);
      const now = this.now();
      const next: StructureRow = { ...row, meta: { deprecatedColumns: [] }, updatedAt: now };
      await tx.updateStructure(next);
      const summary = emptySummary();
      summary.dropped = dropped;
      await tx.appendMigration(this.migration(name, row.version, 'vacuum', summary, now));

      const previous = this.cache.get(name) ?? this.hydrate(row);
      tx.afterCommit(() => {
        this.cache.set(name, { ...previous, deprecatedColumns: [], updatedAt: now });
        log.info({ structure: name, dropped }, 'Structure vacuumed');
      });
      return dropped;
    }));
  }

  // ============================================
  // 辅助查询
  // ============================================

  async history(name: string): Promise<MigrationEntry[]> {
    const entries = await this.deps.store.transaction(tx => tx.listMigrations(name));
    if (entries.length === 0 && !this.has(name)) throw new NotFoundError('structure', name);
    return entries;
  }

  /** 不写入的试运行校验 */
  validateDocument(name: string, document: unknown): ValidationResult {
    return this.deps.validator.check(this.get(name).fields, document);
  }

  private hydrate(row: StructureRow): StructureDefinition {
    try {
      const { schema, fields } = parseSchema(JSON.parse(row.schemaJson), { maxDepth: this.deps.config.maxDepth });
      return toDefinition(row, schema, fields);
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new DataIntegrityError(`Stored schema of '${row.name}' cannot be loaded: ${reason}`, { structure: row.name });
    }
  }

  private migration(
    structureName: string,
    version: number,
    kind: MigrationKind,
    summary: MigrationSummary,
    appliedAt: Date,
  ): MigrationEntry {
    return { structureName, version, kind, summary, appliedAt };
  }
}
