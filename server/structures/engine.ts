/**
 * 结构引擎装配
 *
 * 使用方式：
 *   const engine = await createStructureEngine({ storage: 'memory', maxDepth: 6 });
 *   await engine.registry.define('menu', schema);
 *   const item = await engine.records.create('menu', { label: 'File' });
 *   for await (const event of engine.subscribe('menu')) { ... }
 *   await engine.shutdown();
 */

import { parseEngineConfig, type EngineConfig } from '../core/config-schema';
import { createModuleLogger } from '../core/logger';
import { KeyedLock } from '../lib/concurrency/keyedLock';
import { createPhysicalStore } from '../storage';
import type { PhysicalStore } from '../storage/physicalStore';
import { ChangeNotifier, type SubscribeOptions, type Subscription } from './changeNotifier';
import { RecordStore } from './recordStore';
import { RecordValidator } from './recordValidator';
import { SchemaRegistry } from './schemaRegistry';
import { TableSynchronizer } from './tableSynchronizer';

const log = createModuleLogger('structure-engine');

export interface StructureEngineOptions extends Partial<EngineConfig> {
  /** 注入现成的物理存储；缺省按 storage 创建 */
  store?: PhysicalStore;
  now?: () => Date;
}

export class StructureEngine {
  readonly registry: SchemaRegistry;
  readonly records: RecordStore;
  readonly notifier: ChangeNotifier;
  readonly validator: RecordValidator;
  readonly lock: KeyedLock;
  private started = false;

  constructor(readonly config: EngineConfig, readonly store: PhysicalStore, now?: () => Date) {
    this.lock = new KeyedLock({ timeoutMs: config.lockTimeoutMs, name: 'structures' });
    this.validator = new RecordValidator({ maxDepth: config.maxDepth });
    this.notifier = new ChangeNotifier({ bufferSize: config.subscriberBufferSize });
    this.registry = new SchemaRegistry({
      store,
      lock: this.lock,
      synchronizer: new TableSynchronizer(),
      validator: this.validator,
      config,
      now,
    });
    this.records = new RecordStore({
      store,
      registry: this.registry,
      validator: this.validator,
      notifier: this.notifier,
      lock: this.lock,
      config,
      now,
    });
    this.registry.setDropHandler((tx, definition) => this.records.dropStructureData(tx, definition));
    this.registry.onDropped(name => this.notifier.closeStructure(name));
  }

  async init(): Promise<void> {
    if (this.started) return;
    await this.store.init();
    await this.registry.load();
    this.started = true;
    log.info({ storage: this.store.kind, structures: this.registry.list().length }, 'Structure engine started');
  }

  /** 订阅已定义结构的变更事件 */
  subscribe(structureName: string, options: SubscribeOptions = {}): Subscription {
    this.registry.get(structureName);
    return this.notifier.subscribe(structureName, options);
  }

  async shutdown(): Promise<void> {
    this.notifier.closeAll();
    await this.store.close();
    this.started = false;
    log.info('Structure engine stopped');
  }
}

export async function createStructureEngine(options: StructureEngineOptions = {}): Promise<StructureEngine> {
  const { store, now, ...overrides } = options;
  const config = parseEngineConfig(overrides);
  const engine = new StructureEngine(config, store ?? await createPhysicalStore(config.storage), now);
  await engine.init();
  return engine;
}
