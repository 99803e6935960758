/**
 * Structura — 统一配置中心
 * 存储后端、连接池、引擎参数的唯一来源
 *
 * 使用方式：
 *   import { config } from '../core/config';
 *   const maxDepth = config.engine.maxDepth;
 *   const mysqlUrl = config.mysql.url;
 *
 * 环境变量优先级：
 *   环境变量 > 默认值
 *
 * 零依赖原则：本文件仅依赖 process.env，不导入任何其他模块
 */

// ============================================
// 辅助函数
// ============================================

function env(key: string, defaultValue: string): string {
  return process.env[key] || defaultValue;
}

function envInt(key: string, defaultValue: number): number {
  const v = process.env[key];
  return v ? parseInt(v, 10) : defaultValue;
}

function envBool(key: string, defaultValue: boolean): boolean {
  const v = process.env[key];
  if (!v) return defaultValue;
  return v === 'true' || v === '1' || v === 'yes';
}

function envChoice<T extends string>(key: string, choices: readonly T[], defaultValue: T): T {
  const v = process.env[key];
  const match = choices.find(c => c === v);
  return match ?? defaultValue;
}

// ============================================
// 配置结构
// ============================================

export const config = {

  // ──────────────────────────────────────────
  // 应用基础
  // ──────────────────────────────────────────

  app: {
    name: env('APP_NAME', 'Structura'),
    version: env('APP_VERSION', '1.0.0'),
    env: envChoice('NODE_ENV', ['development', 'production', 'test'] as const, 'development'),
    logLevel: envChoice('LOG_LEVEL', ['trace', 'debug', 'info', 'warn', 'error'] as const, 'info'),
  },

  // ──────────────────────────────────────────
  // 数据库
  // ──────────────────────────────────────────

  /** MySQL 主数据库（STRUCTURE_STORAGE=mysql 时使用） */
  mysql: {
    host: env('MYSQL_HOST', 'localhost'),
    port: envInt('MYSQL_PORT', 3306),
    user: env('MYSQL_USER', 'root'),
    password: env('MYSQL_PASSWORD', ''),
    database: env('MYSQL_DATABASE', 'structura'),
    get url(): string {
      return env('DATABASE_URL', `mysql://${config.mysql.user}:${config.mysql.password}@${config.mysql.host}:${config.mysql.port}/${config.mysql.database}`);
    },
    poolSize: envInt('MYSQL_POOL_SIZE', 10),
    queueLimit: envInt('DB_POOL_QUEUE_LIMIT', 200),
    idleTimeoutMs: envInt('DB_POOL_IDLE_TIMEOUT', 30000),
    ssl: envBool('MYSQL_SSL', false),
  },

  // ──────────────────────────────────────────
  // 结构引擎
  // ──────────────────────────────────────────

  engine: {
    /** 物理存储后端：memory（进程内）| mysql */
    storage: envChoice('STRUCTURE_STORAGE', ['memory', 'mysql'] as const, 'memory'),
    /** 每个结构物理表的表名前缀 */
    tablePrefix: env('STRUCTURE_TABLE_PREFIX', 'st_'),
    /** schema 与文档共用的最大嵌套深度 */
    maxDepth: envInt('STRUCTURE_MAX_DEPTH', 10),
    /** 等待结构锁的超时（毫秒） */
    lockTimeoutMs: envInt('STRUCTURE_LOCK_TIMEOUT_MS', 5000),
    /** 每个订阅者的事件缓冲上限，超出丢弃最旧事件 */
    subscriberBufferSize: envInt('STRUCTURE_SUBSCRIBER_BUFFER', 256),
    defaultPageSize: envInt('STRUCTURE_DEFAULT_PAGE_SIZE', 50),
    maxPageSize: envInt('STRUCTURE_MAX_PAGE_SIZE', 500),
    /** stream() 每次拉取的行数 */
    streamPageSize: envInt('STRUCTURE_STREAM_PAGE_SIZE', 100),
  },
};

export type AppConfig = typeof config;
export type EngineSettings = typeof config.engine;

/** 配置摘要（密码掩码，用于启动日志） */
export function getConfigSummary(): Record<string, unknown> {
  return {
    app: { name: config.app.name, version: config.app.version, env: config.app.env },
    storage: config.engine.storage,
    mysql: config.engine.storage === 'mysql'
      ? { host: config.mysql.host, port: config.mysql.port, database: config.mysql.database, password: config.mysql.password ? '***' : '' }
      : undefined,
    engine: { ...config.engine },
  };
}
