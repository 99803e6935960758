/**
 * 记录校验器
 *
 * 按字段规格递归校验文档并输出规范化副本：
 * - 收集全部违规项，不在第一个错误处停止
 * - 缺失的可选字段填入默认值的拷贝
 * - $ref 指回根对象；值的嵌套深度受 maxDepth 限制
 */

import { z } from 'zod';
import type {
  ArrayFieldSpec,
  FieldSpec,
  JsonObject,
  JsonValue,
  NumericFieldSpec,
  ObjectFieldSpec,
  StringFieldSpec,
  StringFormat,
  StructureDefinition,
  ValidationResult,
  Violation,
} from '../../shared/structureTypes';
import { DepthExceededError, ValidationError } from '../core/errors';
import { canonicalJson, isPlainObject, toJsonValue } from './json';

const MULTIPLE_OF_EPSILON = 1e-9;

const FORMAT_SCHEMAS: Record<StringFormat, z.ZodString> = {
  email: z.string().email(),
  uri: z.string().url(),
  uuid: z.string().uuid(),
  date: z.string().date(),
  'date-time': z.string().datetime({ offset: true }),
};

function joinPath(path: string, key: string): string {
  return path ? `${path}.${key}` : key;
}

function describe(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  return typeof value;
}

interface Walk {
  root: ObjectFieldSpec;
  violations: Violation[];
}

export interface RecordValidatorOptions {
  maxDepth: number;
}

export class RecordValidator {
  private readonly maxDepth: number;
  private readonly patterns = new Map<string, RegExp>();

  constructor(options: RecordValidatorOptions) {
    this.maxDepth = options.maxDepth;
  }

  /** 校验并返回规范化文档；有违规抛 ValidationError */
  validate(definition: StructureDefinition, candidate: unknown): JsonObject {
    const result = this.check(definition.fields, candidate);
    if (!result.valid || !result.document) {
      throw new ValidationError(result.violations, { structure: definition.name });
    }
    return result.document;
  }

  /** 试运行校验，不抛 ValidationError */
  check(fields: ObjectFieldSpec, candidate: unknown): ValidationResult {
    const walk: Walk = { root: fields, violations: [] };
    const document = this.visitObject(fields, candidate, '', 0, walk);
    if (walk.violations.length > 0 || document === undefined) {
      return { valid: false, violations: walk.violations };
    }
    return { valid: true, violations: [], document };
  }

  /** 校验单个值（schema 默认值检查用） */
  validateValue(root: ObjectFieldSpec, spec: FieldSpec, value: unknown, path: string): Violation[] {
    const walk: Walk = { root, violations: [] };
    this.visit(spec, value, path, 1, walk);
    return walk.violations;
  }

  private visit(spec: FieldSpec, value: unknown, path: string, depth: number, walk: Walk): JsonValue | undefined {
    switch (spec.type) {
      case 'ref': return this.visitObject(walk.root, value, path, depth, walk);
      case 'object': return this.visitObject(spec, value, path, depth, walk);
      case 'array': return this.visitArray(spec, value, path, depth, walk);
      case 'string': return this.visitString(spec, value, path, walk);
      case 'number':
      case 'integer': return this.visitNumber(spec, value, path, walk);
      case 'boolean':
        if (typeof value !== 'boolean') {
          this.typeViolation(path, 'boolean', value, walk);
          return undefined;
        }
        return value;
    }
  }

  private visitObject(spec: ObjectFieldSpec, value: unknown, path: string, depth: number, walk: Walk): JsonObject | undefined {
    if (!isPlainObject(value)) {
      this.typeViolation(path, 'object', value, walk);
      return undefined;
    }
    if (depth > this.maxDepth) throw new DepthExceededError(path, this.maxDepth);

    const entries: Array<[string, JsonValue]> = [];
    let ok = true;

    for (const [key, child] of spec.properties) {
      const childPath = joinPath(path, key);
      if (!Object.hasOwn(value, key)) {
        if (child.type !== 'ref' && child.default !== undefined) {
          entries.push([key, structuredClone(child.default)]);
        } else if (spec.required.includes(key)) {
          walk.violations.push({ field: childPath, rule: 'required', message: `${childPath} is required` });
          ok = false;
        }
        continue;
      }
      const normalized = this.visit(child, value[key], childPath, depth + 1, walk);
      if (normalized === undefined) ok = false;
      else entries.push([key, normalized]);
    }

    for (const [key, extra] of Object.entries(value)) {
      if (spec.properties.has(key)) continue;
      const childPath = joinPath(path, key);
      if (!spec.additionalProperties) {
        walk.violations.push({ field: childPath, rule: 'additionalProperties', message: `${childPath} is not a declared field` });
        ok = false;
        continue;
      }
      const converted = toJsonValue(extra);
      if (converted === undefined) {
        this.typeViolation(childPath, 'a JSON value', extra, walk);
        ok = false;
      } else {
        entries.push([key, converted]);
      }
    }

    if (!ok) return undefined;
    const out: JsonObject = {};
    for (const [key, item] of entries) {
      Object.defineProperty(out, key, { value: item, enumerable: true, writable: true, configurable: true });
    }
    return out;
  }

  private visitArray(spec: ArrayFieldSpec, value: unknown, path: string, depth: number, walk: Walk): JsonValue[] | undefined {
    if (!Array.isArray(value)) {
      this.typeViolation(path, 'array', value, walk);
      return undefined;
    }
    if (depth > this.maxDepth) throw new DepthExceededError(path, this.maxDepth);

    const before = walk.violations.length;
    if (spec.minItems !== undefined && value.length < spec.minItems) {
      walk.violations.push({ field: path, rule: 'minItems', message: `${path} must contain at least ${spec.minItems} item(s)` });
    }
    if (spec.maxItems !== undefined && value.length > spec.maxItems) {
      walk.violations.push({ field: path, rule: 'maxItems', message: `${path} must contain at most ${spec.maxItems} item(s)` });
    }

    const out: JsonValue[] = [];
    value.forEach((item, i) => {
      const normalized = this.visit(spec.items, item, `${path}[${i}]`, depth + 1, walk);
      if (normalized !== undefined) out.push(normalized);
    });

    if (spec.uniqueItems && out.length === value.length) {
      const seen = new Set<string>();
      for (const item of out) {
        const key = canonicalJson(item);
        if (seen.has(key)) {
          walk.violations.push({ field: path, rule: 'uniqueItems', message: `${path} must not contain duplicate items` });
          break;
        }
        seen.add(key);
      }
    }

    return walk.violations.length === before ? out : undefined;
  }

  private visitString(spec: StringFieldSpec, value: unknown, path: string, walk: Walk): string | undefined {
    if (typeof value !== 'string') {
      this.typeViolation(path, 'string', value, walk);
      return undefined;
    }
    const before = walk.violations.length;
    const length = [...value].length;
    if (spec.minLength !== undefined && length < spec.minLength) {
      walk.violations.push({ field: path, rule: 'minLength', message: `${path} must be at least ${spec.minLength} character(s)` });
    }
    if (spec.maxLength !== undefined && length > spec.maxLength) {
      walk.violations.push({ field: path, rule: 'maxLength', message: `${path} must be at most ${spec.maxLength} character(s)` });
    }
    if (spec.pattern !== undefined && !this.compile(spec.pattern).test(value)) {
      walk.violations.push({ field: path, rule: 'pattern', message: `${path} must match ${spec.pattern}` });
    }
    if (spec.format !== undefined && !FORMAT_SCHEMAS[spec.format].safeParse(value).success) {
      walk.violations.push({ field: path, rule: 'format', message: `${path} must be a valid ${spec.format}` });
    }
    if (spec.enum !== undefined && !spec.enum.includes(value)) {
      walk.violations.push({ field: path, rule: 'enum', message: `${path} must be one of ${spec.enum.join(', ')}` });
    }
    return walk.violations.length === before ? value : undefined;
  }

  private visitNumber(spec: NumericFieldSpec, value: unknown, path: string, walk: Walk): number | undefined {
    if (typeof value !== 'number' || !Number.isFinite(value) || (spec.type === 'integer' && !Number.isInteger(value))) {
      this.typeViolation(path, spec.type === 'integer' ? 'integer' : 'number', value, walk);
      return undefined;
    }
    const before = walk.violations.length;
    const push = (rule: string, message: string) => walk.violations.push({ field: path, rule, message: `${path} ${message}` });

    if (spec.minimum !== undefined && value < spec.minimum) push('minimum', `must be >= ${spec.minimum}`);
    if (spec.maximum !== undefined && value > spec.maximum) push('maximum', `must be <= ${spec.maximum}`);
    if (spec.exclusiveMinimum !== undefined && value <= spec.exclusiveMinimum) push('exclusiveMinimum', `must be > ${spec.exclusiveMinimum}`);
    if (spec.exclusiveMaximum !== undefined && value >= spec.exclusiveMaximum) push('exclusiveMaximum', `must be < ${spec.exclusiveMaximum}`);
    if (spec.multipleOf !== undefined) {
      const quotient = value / spec.multipleOf;
      if (Math.abs(quotient - Math.round(quotient)) > MULTIPLE_OF_EPSILON) push('multipleOf', `must be a multiple of ${spec.multipleOf}`);
    }
    if (spec.enum !== undefined && !spec.enum.includes(value)) push('enum', `must be one of ${spec.enum.join(', ')}`);

    return walk.violations.length === before ? value : undefined;
  }

  private typeViolation(path: string, expected: string, value: unknown, walk: Walk): void {
    const field = path || 'document';
    walk.violations.push({
      field: path,
      rule: 'type',
      message: `${field} must be ${expected === 'a JSON value' ? expected : `of type ${expected}`}, got ${describe(value)}`,
    });
  }

  private compile(pattern: string): RegExp {
    let re = this.patterns.get(pattern);
    if (!re) {
      re = new RegExp(pattern, 'u');
      this.patterns.set(pattern, re);
    }
    return re;
  }
}
