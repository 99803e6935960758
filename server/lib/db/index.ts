import { drizzle, type MySql2Database } from "drizzle-orm/mysql2";
import { createPool as createMysqlPool, type Pool, type PoolOptions } from 'mysql2/promise';
import { config } from '../../core/config';
import { createModuleLogger } from '../../core/logger';
const log = createModuleLogger('db');

// ============================================================================
// 数据库连接池配置
// ============================================================================
// 连接池参数说明：
//   connectionLimit — 最大连接数（MYSQL_POOL_SIZE）
//   waitForConnections: true — 连接池满时等待而非报错
//   queueLimit — 等待队列上限，超过则报错（背压保护）
//   idleTimeout — 空闲连接释放时间
//   enableKeepAlive: true — TCP keepalive 防止连接被中间件断开
//   timezone: 'Z' — DATETIME 列一律按 UTC 读写
// ============================================================================

let _pool: Pool | null = null;
let _healthCheckTimer: ReturnType<typeof setInterval> | null = null;

export type MysqlSettings = typeof config.mysql;

export function buildPoolOptions(settings: MysqlSettings = config.mysql): PoolOptions {
  // 解析 URL 而不使用 uri 参数，避免 mysql2 的 uri 解析覆盖 charset 配置
  const url = new URL(settings.url);

  return {
    host: url.hostname,
    port: parseInt(url.port || '3306', 10),
    user: decodeURIComponent(url.username),
    password: decodeURIComponent(url.password),
    database: url.pathname.replace(/^\//, ''),
    connectionLimit: settings.poolSize,
    waitForConnections: true,
    queueLimit: settings.queueLimit,
    idleTimeout: settings.idleTimeoutMs,
    enableKeepAlive: true,
    keepAliveInitialDelay: 30_000,
    charset: 'utf8mb4',
    timezone: 'Z',
    ssl: settings.ssl ? {} : undefined,
  };
}

/** 懒加载连接池 */
export function getPool(): Pool {
  if (!_pool) {
    const options = buildPoolOptions();
    _pool = createMysqlPool(options);
    startPoolHealthCheck(_pool);
    log.info({
      host: options.host,
      database: options.database,
      connectionLimit: options.connectionLimit,
    }, '[Database] Connection pool initialized');
  }
  return _pool;
}

/** 注册表查询用的 drizzle 实例 */
export function getDb(): MySql2Database {
  return drizzle(getPool());
}

/**
 * 连接池定期健康检查
 * 每 30 秒 ping 一次，检测死连接
 */
function startPoolHealthCheck(pool: Pool): void {
  if (_healthCheckTimer) clearInterval(_healthCheckTimer);
  _healthCheckTimer = setInterval(() => {
    pool.getConnection()
      .then(async conn => {
        try {
          await conn.ping();
        } finally {
          conn.release();
        }
      })
      .catch((err: unknown) => {
        log.warn({ error: err instanceof Error ? err.message : String(err) }, '[Database] Pool health check failed, connections may be stale');
      });
  }, 30_000);
  // 不阻塞进程退出
  _healthCheckTimer.unref();
}

/**
 * 关闭连接池并清除缓存实例
 */
export async function resetDb(): Promise<void> {
  if (_healthCheckTimer) {
    clearInterval(_healthCheckTimer);
    _healthCheckTimer = null;
  }
  if (_pool) {
    const pool = _pool;
    _pool = null;
    await pool.end();
    log.info('[Database] Connection pool closed');
  }
}
