/**
 * Structura — 统一错误体系
 * 分层错误类 + 错误码 + 自动 HTTP 状态码映射
 *
 * 使用方式：
 *   import { NotFoundError, ValidationError } from '../core/errors';
 *   throw new NotFoundError('structure', name);
 *   throw new ValidationError([{ field: 'label', rule: 'required', message: 'label is required' }]);
 */

import type { SchemaIssue, Violation } from '../../shared/structureTypes';

// ============================================
// 错误码枚举
// ============================================

export enum ErrorCode {
  // 通用错误 (1xxx)
  UNKNOWN = 1000,
  INTERNAL = 1001,
  CONFIGURATION = 1002,

  // 验证错误 (2xxx)
  VALIDATION = 2000,
  SCHEMA_INVALID = 2001,
  UNSUPPORTED_TYPE = 2002,
  DEPTH_EXCEEDED = 2003,
  UNFILTERABLE_FIELD = 2004,

  // 资源错误 (4xxx)
  NOT_FOUND = 4000,
  ALREADY_EXISTS = 4001,
  CONFLICT = 4002,

  // 并发错误 (5xxx)
  CONCURRENCY = 5000,

  // 数据错误 (8xxx)
  DATA_INTEGRITY = 8000,
  INCOMPATIBLE_MIGRATION = 8001,
}

// 错误码到 HTTP 状态码的映射
const ERROR_HTTP_STATUS: Record<number, number> = {
  [ErrorCode.UNKNOWN]: 500,
  [ErrorCode.INTERNAL]: 500,
  [ErrorCode.CONFIGURATION]: 500,
  [ErrorCode.VALIDATION]: 400,
  [ErrorCode.SCHEMA_INVALID]: 400,
  [ErrorCode.UNSUPPORTED_TYPE]: 400,
  [ErrorCode.DEPTH_EXCEEDED]: 400,
  [ErrorCode.UNFILTERABLE_FIELD]: 400,
  [ErrorCode.NOT_FOUND]: 404,
  [ErrorCode.ALREADY_EXISTS]: 409,
  [ErrorCode.CONFLICT]: 409,
  [ErrorCode.CONCURRENCY]: 409,
  [ErrorCode.DATA_INTEGRITY]: 500,
  [ErrorCode.INCOMPATIBLE_MIGRATION]: 409,
};

// ============================================
// 基础错误类
// ============================================

export class EngineError extends Error {
  public readonly code: ErrorCode;
  public readonly httpStatus: number;
  public readonly context: Record<string, unknown>;
  public readonly timestamp: string;
  public readonly isOperational: boolean;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.UNKNOWN,
    context: Record<string, unknown> = {},
    isOperational = true,
  ) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.httpStatus = ERROR_HTTP_STATUS[code] || 500;
    this.context = context;
    this.timestamp = new Date().toISOString();
    this.isOperational = isOperational;
    Error.captureStackTrace(this, this.constructor);
  }

  /** 序列化为 API 响应格式 */
  toJSON(): Record<string, unknown> {
    return {
      error: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
      timestamp: this.timestamp,
    };
  }
}

// ============================================
// 具体错误类
// ============================================

/** schema 文档不合法，携带全部问题 */
export class SchemaError extends EngineError {
  public readonly issues: SchemaIssue[];

  constructor(issues: SchemaIssue[], context: Record<string, unknown> = {}) {
    const head = issues[0];
    const summary = head ? `${head.path || '<root>'}: ${head.message}` : 'invalid schema';
    const more = issues.length > 1 ? ` (+${issues.length - 1} more)` : '';
    super(`Invalid schema: ${summary}${more}`, ErrorCode.SCHEMA_INVALID, { ...context, issues });
    this.issues = issues;
  }
}

/** 文档校验失败，携带全部违规项 */
export class ValidationError extends EngineError {
  public readonly violations: Violation[];

  constructor(violations: Violation[], context: Record<string, unknown> = {}) {
    const fields = [...new Set(violations.map(v => v.field))].join(', ');
    super(`Validation failed: ${fields || 'document'}`, ErrorCode.VALIDATION, { ...context, violations });
    this.violations = violations;
  }
}

/** 资源未找到 */
export class NotFoundError extends EngineError {
  constructor(resource: string, id?: string | number, context: Record<string, unknown> = {}) {
    const msg = id !== undefined ? `${resource} '${id}' not found` : `${resource} not found`;
    super(msg, ErrorCode.NOT_FOUND, { resource, id, ...context });
  }
}

/** 资源已存在 */
export class AlreadyExistsError extends EngineError {
  constructor(resource: string, identifier: string, context: Record<string, unknown> = {}) {
    super(`${resource} '${identifier}' already exists`, ErrorCode.ALREADY_EXISTS, { resource, identifier, ...context });
  }
}

export interface MigrationConflict {
  field: string;
  column: string;
  from: string;
  to: string;
}

/** 非拓宽的列类型变更 */
export class IncompatibleMigrationError extends EngineError {
  public readonly conflicts: MigrationConflict[];

  constructor(structure: string, conflicts: MigrationConflict[]) {
    const detail = conflicts.map(c => `${c.field} (${c.from} -> ${c.to})`).join(', ');
    super(`Incompatible migration for '${structure}': ${detail}`, ErrorCode.INCOMPATIBLE_MIGRATION, { structure, conflicts });
    this.conflicts = conflicts;
  }
}

/** schema 或文档嵌套超过上限 */
export class DepthExceededError extends EngineError {
  constructor(path: string, maxDepth: number, context: Record<string, unknown> = {}) {
    super(`Nesting at '${path || '<root>'}' exceeds max depth ${maxDepth}`, ErrorCode.DEPTH_EXCEEDED, { path, maxDepth, ...context });
  }
}

/** 过滤/排序字段没有投影列 */
export class UnfilterableFieldError extends EngineError {
  constructor(structure: string, field: string, reason: string) {
    super(`Field '${field}' of '${structure}' cannot be filtered or sorted: ${reason}`, ErrorCode.UNFILTERABLE_FIELD, { structure, field });
  }
}

/** 无法识别的字段类型 */
export class UnsupportedTypeError extends EngineError {
  constructor(type: string, context: Record<string, unknown> = {}) {
    super(`Unsupported field type '${type}'`, ErrorCode.UNSUPPORTED_TYPE, { type, ...context });
  }
}

/** 锁等待超时、版本冲突、瞬时存储冲突重试耗尽 */
export class ConcurrencyError extends EngineError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, ErrorCode.CONCURRENCY, context);
  }
}

/** 配置不合法 */
export class ConfigurationError extends EngineError {
  constructor(errors: string[]) {
    super(`Invalid configuration: ${errors.join('; ')}`, ErrorCode.CONFIGURATION, { errors }, false);
  }
}

/** 数据完整性错误 */
export class DataIntegrityError extends EngineError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, ErrorCode.DATA_INTEGRITY, context, false); // 非运营性错误
  }
}

// ============================================
// 错误处理工具
// ============================================

/** 判断是否为 EngineError */
export function isEngineError(err: unknown): err is EngineError {
  return err instanceof EngineError;
}

/** 判断是否为可恢复的运营性错误 */
export function isOperationalError(err: unknown): boolean {
  if (isEngineError(err)) return err.isOperational;
  return false;
}

/** 将未知错误包装为 EngineError */
export function wrapError(err: unknown, context: Record<string, unknown> = {}): EngineError {
  if (isEngineError(err)) return err;

  if (err instanceof Error) {
    return new EngineError(err.message, ErrorCode.INTERNAL, {
      originalName: err.name,
      stack: err.stack,
      ...context,
    });
  }

  return new EngineError(String(err), ErrorCode.UNKNOWN, context);
}
