/**
 * ============================================================================
 * 配置验证 Schema — Zod 强类型验证
 * ============================================================================
 *
 * 用途：
 *   1. 启动时验证所有环境变量的类型和范围
 *   2. 生产环境强制必填字段（MYSQL_PASSWORD 等）
 *   3. 合并并校验 createStructureEngine() 传入的引擎参数覆盖
 *
 * 使用方式：
 *   import { validateConfigWithSchema, parseEngineConfig } from './config-schema';
 *   const result = validateConfigWithSchema(config);
 *   const engineConfig = parseEngineConfig({ maxDepth: 4 });
 *
 * ============================================================================
 */

import { z } from 'zod';
import { config, type AppConfig } from './config';
import { ConfigurationError } from './errors';
import { createModuleLogger } from './logger';

const log = createModuleLogger('config-validator');

// ============================================================
// Schema 定义
// ============================================================

/** 端口号范围验证 */
const portSchema = z.number().int().min(1).max(65535);

const appSchema = z.object({
  name: z.string().min(1),
  version: z.string().regex(/^\d+\.\d+\.\d+/, 'must be semver format (e.g., 1.0.0)'),
  env: z.enum(['development', 'production', 'test']),
  logLevel: z.enum(['trace', 'debug', 'info', 'warn', 'error']),
});

const mysqlSchema = z.object({
  host: z.string().min(1),
  port: portSchema,
  user: z.string().min(1),
  password: z.string(),
  database: z.string().min(1),
  url: z.string().regex(/^mysql:\/\//, 'must be a mysql:// URL'),
  poolSize: z.number().int().min(1).max(200),
  queueLimit: z.number().int().min(0),
  idleTimeoutMs: z.number().int().min(1000),
  ssl: z.boolean(),
});

/** 引擎参数 */
export const engineSchema = z.object({
  storage: z.enum(['memory', 'mysql']),
  tablePrefix: z.string().regex(/^[a-z][a-z0-9_]{0,15}$/, 'must be lowercase letters, digits or _ (max 16)'),
  maxDepth: z.number().int().min(1).max(64),
  lockTimeoutMs: z.number().int().min(1),
  subscriberBufferSize: z.number().int().min(1),
  defaultPageSize: z.number().int().min(1),
  maxPageSize: z.number().int().min(1),
  streamPageSize: z.number().int().min(1),
}).refine(e => e.defaultPageSize <= e.maxPageSize, {
  message: 'defaultPageSize must not exceed maxPageSize',
  path: ['defaultPageSize'],
});

export type EngineConfig = z.infer<typeof engineSchema>;

const configSchema = z.object({
  app: appSchema,
  mysql: mysqlSchema,
  engine: engineSchema,
});

function formatIssues(error: z.ZodError, prefix = ''): string[] {
  return error.issues.map(issue => `${prefix}${issue.path.join('.')}: ${issue.message}`);
}

// ============================================================
// 生产环境额外验证
// ============================================================

function validateProductionConstraints(cfg: AppConfig): string[] {
  const errors: string[] = [];

  if (cfg.engine.storage === 'mysql' && !cfg.mysql.password) {
    errors.push('[CRITICAL] mysql.password: must be set in production');
  }

  if (cfg.engine.storage === 'memory') {
    errors.push('[CRITICAL] engine.storage: memory backend loses all data on restart');
  }

  return errors;
}

// ============================================================
// 公开 API
// ============================================================

export interface ConfigValidationResult {
  success: boolean;
  errors: string[];
  warnings: string[];
}

/**
 * 使用 Zod Schema 验证配置
 *
 * @param cfg - config 对象（来自 config.ts）
 */
export function validateConfigWithSchema(cfg: AppConfig = config): ConfigValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];

  // 第一层：Zod schema 验证（类型 + 范围）
  const result = configSchema.safeParse(cfg);
  if (!result.success) {
    errors.push(...formatIssues(result.error));
  }

  // 第二层：生产环境业务规则验证
  if (cfg.app.env === 'production') {
    errors.push(...validateProductionConstraints(cfg));
  }

  // 第三层：开发环境警告
  if (cfg.app.env === 'development' && cfg.engine.storage === 'mysql' && cfg.mysql.password === '') {
    warnings.push('mysql.password: empty (acceptable in development with Docker)');
  }

  const success = errors.length === 0;

  if (errors.length > 0) {
    log.warn({ errors }, `Configuration validation found ${errors.length} error(s)`);
  }

  if (warnings.length > 0) {
    log.warn({ warnings }, `Configuration warnings (${warnings.length})`);
  }

  return { success, errors, warnings };
}

/**
 * 合并环境配置与调用方覆盖，校验后返回引擎参数
 * 不合法时抛出 ConfigurationError
 */
export function parseEngineConfig(overrides: Partial<EngineConfig> = {}): EngineConfig {
  const result = engineSchema.safeParse({ ...config.engine, ...overrides });
  if (!result.success) {
    throw new ConfigurationError(formatIssues(result.error, 'engine.'));
  }
  return result.data;
}
