/**
 * 结构引擎共享类型定义
 * 结构定义、字段规格、记录、变更事件、查询参数
 *
 * 服务端与传输层共用，不依赖任何运行时模块
 */

// ============================================
// JSON 值
// ============================================

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | JsonObject;
export interface JsonObject {
  [key: string]: JsonValue;
}

// ============================================
// 字段规格（tagged union）
// ============================================

export const FIELD_TYPES = ['string', 'number', 'integer', 'boolean', 'array', 'object'] as const;
export type FieldType = (typeof FIELD_TYPES)[number];
export type ScalarFieldType = 'string' | 'number' | 'integer' | 'boolean';

export const STRING_FORMATS = ['email', 'uri', 'uuid', 'date', 'date-time'] as const;
export type StringFormat = (typeof STRING_FORMATS)[number];

interface FieldSpecBase {
  title?: string;
  description?: string;
  default?: JsonValue;
  /** 根级标量字段：为投影列建立二级索引 */
  index: boolean;
}

export interface StringFieldSpec extends FieldSpecBase {
  type: 'string';
  minLength?: number;
  maxLength?: number;
  pattern?: string;
  format?: StringFormat;
  enum?: string[];
}

export interface NumericFieldSpec extends FieldSpecBase {
  type: 'number' | 'integer';
  minimum?: number;
  maximum?: number;
  exclusiveMinimum?: number;
  exclusiveMaximum?: number;
  multipleOf?: number;
  enum?: number[];
}

export interface BooleanFieldSpec extends FieldSpecBase {
  type: 'boolean';
}

export interface ArrayFieldSpec extends FieldSpecBase {
  type: 'array';
  items: FieldSpec;
  minItems?: number;
  maxItems?: number;
  uniqueItems: boolean;
}

export interface ObjectFieldSpec extends FieldSpecBase {
  type: 'object';
  properties: Map<string, FieldSpec>;
  required: string[];
  additionalProperties: boolean;
}

/** 递归标记 {"$ref": "#"}，指回结构根对象 */
export interface RootReference {
  type: 'ref';
}

export type ScalarFieldSpec = StringFieldSpec | NumericFieldSpec | BooleanFieldSpec;
export type FieldSpec = ScalarFieldSpec | ArrayFieldSpec | ObjectFieldSpec | RootReference;

export function isScalarSpec(spec: FieldSpec): spec is ScalarFieldSpec {
  return spec.type === 'string' || spec.type === 'number' || spec.type === 'integer' || spec.type === 'boolean';
}

// ============================================
// 结构定义
// ============================================

export interface StructureMeta {
  /** 已从 schema 中移除、但物理上保留的投影列 */
  deprecatedColumns: string[];
}

export interface StructureDefinition {
  name: string;
  tableName: string;
  /** 提交时的原始 schema 文档 */
  schema: JsonObject;
  /** 编译后的根对象规格 */
  fields: ObjectFieldSpec;
  version: number;
  deprecatedColumns: string[];
  createdAt: Date;
  updatedAt: Date;
}

export type MigrationKind = 'create' | 'update' | 'vacuum' | 'drop';

export interface MigrationSummary {
  added: string[];
  widened: string[];
  deprecated: string[];
  restored: string[];
  dropped: string[];
  indexed: string[];
}

export interface MigrationEntry {
  structureName: string;
  version: number;
  kind: MigrationKind;
  summary: MigrationSummary;
  appliedAt: Date;
}

// ============================================
// 记录
// ============================================

export interface StructureRecord {
  id: number;
  parentId: number | null;
  document: JsonObject;
  createdAt: Date;
  updatedAt: Date;
}

/** 扁平视图：{ id, parent_id, ...document } */
export type FlatRecord = JsonObject & { id: number; parent_id: number | null };

export function flattenRecord(record: StructureRecord): FlatRecord {
  return { ...record.document, id: record.id, parent_id: record.parentId };
}

// ============================================
// 查询
// ============================================

export const FILTER_OPERATORS = ['eq', 'ne', 'gt', 'gte', 'lt', 'lte', 'in', 'contains', 'isNull', 'notNull'] as const;
export type FilterOperator = (typeof FILTER_OPERATORS)[number];

export interface FilterCondition {
  field: string;
  operator: FilterOperator;
  value?: unknown;
}

export type SortOrder = 'asc' | 'desc';

export interface ListQuery {
  limit?: number;
  offset?: number;
  sortField?: string;
  sortOrder?: SortOrder;
  filter?: FilterCondition[];
}

export interface FieldStats {
  field: string;
  totalCount: number;
  nonNullCount: number;
  nullCount: number;
  min: string | number | boolean | null;
  max: string | number | boolean | null;
  avg: number | null;
}

// ============================================
// 校验
// ============================================

export interface Violation {
  field: string;
  rule: string;
  message: string;
}

export interface SchemaIssue {
  path: string;
  rule: string;
  message: string;
}

export interface ValidationResult {
  valid: boolean;
  violations: Violation[];
  document?: JsonObject;
}

// ============================================
// 变更事件
// ============================================

export type ChangeKind = 'created' | 'updated' | 'deleted';

export interface ChangeEvent {
  structureName: string;
  kind: ChangeKind;
  recordId: number;
  payload: FlatRecord;
  timestamp: Date;
}

/** 实时传输层转发的消息格式 */
export interface TransportMessage {
  type: ChangeKind;
  structure: string;
  data: FlatRecord;
}
