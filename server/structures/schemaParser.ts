/**
 * Schema 文档解析
 *
 * 将 JSON Schema 子集编译为 FieldSpec 树，收集全部问题后一次性抛出 SchemaError。
 * 关键字形状由 zod strict 对象检查，语义规则（区间、重名、保留名、
 * 自引用位置、默认值）在此逐项检查。
 */

import { z } from 'zod';
import {
  STRING_FORMATS,
  type FieldSpec,
  type JsonObject,
  type JsonValue,
  type ObjectFieldSpec,
  type SchemaIssue,
} from '../../shared/structureTypes';
import { DepthExceededError, SchemaError, UnsupportedTypeError, ValidationError } from '../core/errors';
import { isPlainObject, toJsonObject } from './json';
import { RecordValidator } from './recordValidator';
import { mapTypeToken, normalizeName } from './typeMapper';

export const STRUCTURE_NAME_PATTERN = /^[A-Za-z][A-Za-z0-9_-]{0,47}$/;
export const FIELD_NAME_PATTERN = /^[A-Za-z_][A-Za-z0-9_-]*$/;
export const MAX_FIELD_NAME_LENGTH = 60;
export const RESERVED_FIELD_NAMES: readonly string[] = ['id', 'parent_id', 'document', 'created_at', 'updated_at'];

// ============================================
// 关键字形状
// ============================================

const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([z.string(), z.number(), z.boolean(), z.null(), z.array(jsonValueSchema), z.record(jsonValueSchema)]),
);

const count = z.number().int().min(0);
const bound = z.number().finite();

const common = {
  title: z.string().optional(),
  description: z.string().optional(),
  examples: z.array(jsonValueSchema).optional(),
  $comment: z.string().optional(),
  default: jsonValueSchema.optional(),
  index: z.boolean().optional(),
};

const rootKeywords = {
  $schema: z.string().optional(),
  $id: z.string().optional(),
};

const stringKeywords = z.object({
  type: z.literal('string'),
  ...common,
  minLength: count.optional(),
  maxLength: count.optional(),
  pattern: z.string().optional(),
  format: z.enum(STRING_FORMATS).optional(),
  enum: z.array(z.string()).min(1).optional(),
}).strict();

const numericKeywords = z.object({
  type: z.enum(['number', 'integer']),
  ...common,
  minimum: bound.optional(),
  maximum: bound.optional(),
  exclusiveMinimum: bound.optional(),
  exclusiveMaximum: bound.optional(),
  multipleOf: bound.positive().optional(),
  enum: z.array(bound).min(1).optional(),
}).strict();

const booleanKeywords = z.object({
  type: z.literal('boolean'),
  ...common,
}).strict();

const arrayKeywords = z.object({
  type: z.literal('array'),
  ...common,
  items: z.unknown(),
  minItems: count.optional(),
  maxItems: count.optional(),
  uniqueItems: z.boolean().optional(),
}).strict();

const objectKeywords = z.object({
  type: z.literal('object'),
  ...common,
  properties: z.record(z.unknown()).optional(),
  required: z.array(z.string()).optional(),
  additionalProperties: z.boolean().optional(),
}).strict();

const rootObjectKeywords = objectKeywords.extend(rootKeywords).strict();

// ============================================
// 解析上下文
// ============================================

interface ParseContext {
  maxDepth: number;
  issues: SchemaIssue[];
}

function joinPath(path: string, key: string): string {
  return path ? `${path}.${key}` : key;
}

function zodIssues(error: z.ZodError, path: string): SchemaIssue[] {
  return error.issues.map(issue => ({
    path: issue.path.length > 0 ? joinPath(path, issue.path.join('.')) : path,
    rule: 'keyword',
    message: issue.message,
  }));
}

function duplicates<T>(values: T[]): T[] {
  const seen = new Set<T>();
  const dup = new Set<T>();
  for (const v of values) {
    if (seen.has(v)) dup.add(v);
    seen.add(v);
  }
  return [...dup];
}

function checkRange(ctx: ParseContext, path: string, lower: number | undefined, upper: number | undefined, label: string, strict: boolean): void {
  if (lower === undefined || upper === undefined) return;
  if (strict ? lower >= upper : lower > upper) {
    ctx.issues.push({ path, rule: 'range', message: `${label} is an empty range (${lower} .. ${upper})` });
  }
}

// ============================================
// 字段解析
// ============================================

function parseField(raw: unknown, path: string, depth: number, ctx: ParseContext, isRoot: boolean): FieldSpec | null {
  if (!isPlainObject(raw)) {
    ctx.issues.push({ path, rule: 'keyword', message: 'field schema must be an object' });
    return null;
  }

  if ('$ref' in raw) {
    const keys = Object.keys(raw);
    if (keys.length !== 1 || raw.$ref !== '#') {
      ctx.issues.push({ path, rule: 'ref', message: 'self-reference must be exactly {"$ref": "#"}' });
      return null;
    }
    if (depth > ctx.maxDepth) {
      ctx.issues.push({ path, rule: 'ref', message: `self-reference sits below max depth ${ctx.maxDepth}` });
      return null;
    }
    return { type: 'ref' };
  }

  const token = raw.type;
  if (typeof token !== 'string') {
    ctx.issues.push({ path, rule: 'type', message: 'type is required and must be a string' });
    return null;
  }
  try {
    mapTypeToken(token);
  } catch (err) {
    if (err instanceof UnsupportedTypeError) {
      ctx.issues.push({ path, rule: 'type', message: `unsupported type '${token}'` });
      return null;
    }
    throw err;
  }

  if (isRoot && token !== 'object') {
    ctx.issues.push({ path, rule: 'root', message: 'root schema must be of type object' });
    return null;
  }
  if ((token === 'object' || token === 'array') && depth > ctx.maxDepth) {
    throw new DepthExceededError(path, ctx.maxDepth);
  }

  switch (token) {
    case 'string': return parseString(raw, path, ctx);
    case 'number':
    case 'integer': return parseNumeric(raw, path, ctx);
    case 'boolean': {
      const parsed = booleanKeywords.safeParse(raw);
      if (!parsed.success) {
        ctx.issues.push(...zodIssues(parsed.error, path));
        return null;
      }
      const { title, description, default: def, index } = parsed.data;
      return { type: 'boolean', title, description, default: def, index: index ?? false };
    }
    case 'array': return parseArray(raw, path, depth, ctx);
    default: return parseObject(raw, path, depth, ctx, isRoot);
  }
}

function parseString(raw: Record<string, unknown>, path: string, ctx: ParseContext): FieldSpec | null {
  const parsed = stringKeywords.safeParse(raw);
  if (!parsed.success) {
    ctx.issues.push(...zodIssues(parsed.error, path));
    return null;
  }
  const { title, description, default: def, index, minLength, maxLength, pattern, format } = parsed.data;
  const values = parsed.data.enum;

  if (pattern !== undefined) {
    try {
      new RegExp(pattern, 'u');
    } catch (err) {
      ctx.issues.push({ path, rule: 'pattern', message: `invalid pattern: ${err instanceof Error ? err.message : String(err)}` });
    }
  }
  checkRange(ctx, path, minLength, maxLength, 'minLength..maxLength', false);
  if (values) {
    for (const dup of duplicates(values)) {
      ctx.issues.push({ path, rule: 'enum', message: `enum repeats '${dup}'` });
    }
  }
  return { type: 'string', title, description, default: def, index: index ?? false, minLength, maxLength, pattern, format, enum: values };
}

function parseNumeric(raw: Record<string, unknown>, path: string, ctx: ParseContext): FieldSpec | null {
  const parsed = numericKeywords.safeParse(raw);
  if (!parsed.success) {
    ctx.issues.push(...zodIssues(parsed.error, path));
    return null;
  }
  const { type, title, description, default: def, index, minimum, maximum, exclusiveMinimum, exclusiveMaximum, multipleOf } = parsed.data;
  const values = parsed.data.enum;

  checkRange(ctx, path, minimum, maximum, 'minimum..maximum', false);
  checkRange(ctx, path, exclusiveMinimum, exclusiveMaximum, 'exclusiveMinimum..exclusiveMaximum', true);
  checkRange(ctx, path, minimum, exclusiveMaximum, 'minimum..exclusiveMaximum', true);
  checkRange(ctx, path, exclusiveMinimum, maximum, 'exclusiveMinimum..maximum', true);
  if (values) {
    for (const dup of duplicates(values)) {
      ctx.issues.push({ path, rule: 'enum', message: `enum repeats ${dup}` });
    }
    if (type === 'integer' && values.some(v => !Number.isInteger(v))) {
      ctx.issues.push({ path, rule: 'enum', message: 'integer enum must only contain integers' });
    }
  }
  return { type, title, description, default: def, index: index ?? false, minimum, maximum, exclusiveMinimum, exclusiveMaximum, multipleOf, enum: values };
}

function parseArray(raw: Record<string, unknown>, path: string, depth: number, ctx: ParseContext): FieldSpec | null {
  const parsed = arrayKeywords.safeParse(raw);
  if (!parsed.success) {
    ctx.issues.push(...zodIssues(parsed.error, path));
    return null;
  }
  const { title, description, default: def, index, items, minItems, maxItems, uniqueItems } = parsed.data;
  if (items === undefined) {
    ctx.issues.push({ path, rule: 'keyword', message: 'array requires items' });
    return null;
  }
  checkRange(ctx, path, minItems, maxItems, 'minItems..maxItems', false);
  const itemSpec = parseField(items, `${path}[]`, depth + 1, ctx, false);
  if (!itemSpec) return null;
  return { type: 'array', title, description, default: def, index: index ?? false, items: itemSpec, minItems, maxItems, uniqueItems: uniqueItems ?? false };
}

function parseObject(raw: Record<string, unknown>, path: string, depth: number, ctx: ParseContext, isRoot: boolean): ObjectFieldSpec | null {
  const parsed = (isRoot ? rootObjectKeywords : objectKeywords).safeParse(raw);
  if (!parsed.success) {
    ctx.issues.push(...zodIssues(parsed.error, path));
    return null;
  }
  const { title, description, default: def, index, additionalProperties } = parsed.data;
  // 取原始对象：zod 重建记录时会丢掉 __proto__ 这类键
  const rawProperties: Record<string, unknown> = isPlainObject(raw.properties) ? raw.properties : {};
  const required = parsed.data.required ?? [];

  const properties = new Map<string, FieldSpec>();
  const storageNames = new Map<string, string>();

  for (const [name, child] of Object.entries(rawProperties)) {
    const childPath = joinPath(path, name);
    if (!FIELD_NAME_PATTERN.test(name) || name.length > MAX_FIELD_NAME_LENGTH) {
      ctx.issues.push({ path: childPath, rule: 'name', message: `field name must match ${FIELD_NAME_PATTERN} and be at most ${MAX_FIELD_NAME_LENGTH} characters` });
      continue;
    }
    if (name === '__proto__' || (isRoot && RESERVED_FIELD_NAMES.includes(name))) {
      ctx.issues.push({ path: childPath, rule: 'reserved', message: `'${name}' is a reserved field name` });
      continue;
    }
    const storage = normalizeName(name);
    const clash = storageNames.get(storage);
    if (clash !== undefined) {
      ctx.issues.push({ path: childPath, rule: 'duplicate', message: `'${name}' collides with '${clash}'` });
      continue;
    }
    storageNames.set(storage, name);

    const spec = parseField(child, childPath, depth + 1, ctx, false);
    if (!spec) continue;
    if (spec.type !== 'ref' && spec.index && (!isRoot || spec.type === 'array' || spec.type === 'object')) {
      ctx.issues.push({ path: childPath, rule: 'index', message: 'index is only supported on root scalar fields' });
    }
    properties.set(name, spec);
  }

  for (const dup of duplicates(required)) {
    ctx.issues.push({ path, rule: 'duplicate', message: `required lists '${dup}' more than once` });
  }
  for (const name of new Set(required)) {
    if (!Object.hasOwn(rawProperties, name)) {
      ctx.issues.push({ path: joinPath(path, name), rule: 'required', message: `required field '${name}' is not declared` });
    }
  }

  return {
    type: 'object',
    title,
    description,
    default: def,
    index: index ?? false,
    properties,
    required: [...new Set(required)],
    additionalProperties: additionalProperties ?? false,
  };
}

// ============================================
// 结构性检查
// ============================================

/** 只经必填对象属性即可从根到达的 $ref 会无限展开 */
function checkRecursion(spec: ObjectFieldSpec, path: string, ctx: ParseContext, seen: Set<ObjectFieldSpec>): void {
  if (seen.has(spec)) return;
  seen.add(spec);
  for (const name of spec.required) {
    const child = spec.properties.get(name);
    if (!child) continue;
    const childPath = joinPath(path, name);
    if (child.type === 'ref') {
      ctx.issues.push({ path: childPath, rule: 'recursion', message: 'required self-reference can never terminate' });
    } else if (child.type === 'object') {
      checkRecursion(child, childPath, ctx, seen);
    }
  }
}

function checkDefaults(root: ObjectFieldSpec, spec: FieldSpec, path: string, ctx: ParseContext, validator: RecordValidator): void {
  if (spec.type === 'ref') return;
  if (spec.default !== undefined) {
    for (const v of validator.validateValue(root, spec, spec.default, path)) {
      ctx.issues.push({ path, rule: 'default', message: `default does not satisfy the field: ${v.message}` });
    }
  }
  if (spec.type === 'array') checkDefaults(root, spec.items, `${path}[]`, ctx, validator);
  if (spec.type === 'object') {
    for (const [name, child] of spec.properties) checkDefaults(root, child, joinPath(path, name), ctx, validator);
  }
}

// ============================================
// 公开 API
// ============================================

export interface ParsedSchema {
  /** 原始文档的 JSON 拷贝 */
  schema: JsonObject;
  fields: ObjectFieldSpec;
}

export interface ParseSchemaOptions {
  maxDepth: number;
}

export function parseSchema(document: unknown, options: ParseSchemaOptions): ParsedSchema {
  const ctx: ParseContext = { maxDepth: options.maxDepth, issues: [] };
  const schema = toJsonObject(document);
  if (!schema) {
    throw new SchemaError([{ path: '', rule: 'root', message: 'schema must be a JSON object' }]);
  }

  const root = parseField(schema, '', 0, ctx, true);
  if (!root || root.type !== 'object' || ctx.issues.length > 0) {
    throw new SchemaError(ctx.issues.length > 0 ? ctx.issues : [{ path: '', rule: 'root', message: 'root schema must be of type object' }]);
  }

  checkRecursion(root, '', ctx, new Set());
  if (ctx.issues.length === 0) {
    const validator = new RecordValidator({ maxDepth: options.maxDepth });
    for (const [name, child] of root.properties) checkDefaults(root, child, name, ctx, validator);
  }
  if (ctx.issues.length > 0) throw new SchemaError(ctx.issues);

  return { schema, fields: root };
}

export function validateStructureName(name: unknown): string {
  if (typeof name !== 'string' || !STRUCTURE_NAME_PATTERN.test(name)) {
    throw new ValidationError([{
      field: 'name',
      rule: 'name',
      message: `structure name must match ${STRUCTURE_NAME_PATTERN}`,
    }]);
  }
  return name;
}
