/**
 * 物理存储工厂
 * mysql 后端按需动态加载，memory 模式下不会初始化 mysql2
 */

import type { EngineConfig } from '../core/config-schema';
import { createModuleLogger } from '../core/logger';
import { MemoryPhysicalStore } from './memory/memoryStore';
import type { PhysicalStore } from './physicalStore';

const log = createModuleLogger('storage');

export async function createPhysicalStore(kind: EngineConfig['storage']): Promise<PhysicalStore> {
  if (kind === 'mysql') {
    const [{ MysqlPhysicalStore }, { getPool, resetDb }] = await Promise.all([
      import('./mysql/mysqlStore'),
      import('../lib/db'),
    ]);
    log.info('Using MySQL physical store');
    return new MysqlPhysicalStore({ pool: getPool(), onClose: resetDb });
  }
  log.info('Using in-memory physical store');
  return new MemoryPhysicalStore();
}

export { MemoryPhysicalStore, MemoryTransaction } from './memory/memoryStore';
export { RESERVED_COLUMNS, formatPhysicalType } from './physicalStore';
export type * from './physicalStore';
