/**
 * 字段规格 → 物理列类型映射
 *
 * 只有根对象的标量字段拥有投影列；数组、嵌套对象、自引用只存在于 document 列。
 */

import {
  FIELD_TYPES,
  type FieldType,
  type FieldSpec,
  type JsonObject,
  type ObjectFieldSpec,
  type ScalarFieldSpec,
} from '../../shared/structureTypes';
import { UnsupportedTypeError } from '../core/errors';
import type { CellValue, ColumnDefinition, PhysicalType } from '../storage/physicalStore';

/** MySQL utf8mb4 下 VARCHAR 的最大字符数 */
export const MAX_VARCHAR_LENGTH = 16383;

export function isFieldType(token: string): token is FieldType {
  return FIELD_TYPES.some(t => t === token);
}

export function mapTypeToken(token: string, constraints: { maxLength?: number } = {}): PhysicalType | null {
  if (!isFieldType(token)) throw new UnsupportedTypeError(token);
  switch (token) {
    case 'string':
      return constraints.maxLength !== undefined && constraints.maxLength <= MAX_VARCHAR_LENGTH
        ? { kind: 'varchar', length: Math.max(1, constraints.maxLength) }
        : { kind: 'text' };
    case 'number': return { kind: 'double' };
    case 'integer': return { kind: 'bigint' };
    case 'boolean': return { kind: 'boolean' };
    case 'array':
    case 'object':
      return null;
  }
}

export function mapType(spec: FieldSpec): PhysicalType | null {
  if (spec.type === 'ref') return null;
  return mapTypeToken(spec.type, spec.type === 'string' ? { maxLength: spec.maxLength } : {});
}

// ============================================
// 命名
// ============================================

export function normalizeName(name: string): string {
  return name.toLowerCase().replace(/-/g, '_');
}

export function columnNameFor(field: string): string {
  return `f_${normalizeName(field)}`;
}

export function tableNameFor(prefix: string, structureName: string): string {
  return `${prefix}${normalizeName(structureName)}`;
}

// ============================================
// 投影
// ============================================

export interface ProjectedField {
  field: string;
  column: string;
  spec: ScalarFieldSpec;
  type: PhysicalType;
  indexed: boolean;
}

export function projectedFields(fields: ObjectFieldSpec): ProjectedField[] {
  const out: ProjectedField[] = [];
  for (const [field, spec] of fields.properties) {
    if (spec.type !== 'string' && spec.type !== 'number' && spec.type !== 'integer' && spec.type !== 'boolean') continue;
    const type = mapType(spec);
    if (!type) continue;
    out.push({ field, column: columnNameFor(field), spec, type, indexed: spec.index });
  }
  return out;
}

export function projectionColumns(fields: ObjectFieldSpec): ColumnDefinition[] {
  return projectedFields(fields).map(p => ({ name: p.column, type: p.type, indexed: p.indexed }));
}

export function findProjectedField(fields: ObjectFieldSpec, field: string): ProjectedField | undefined {
  return projectedFields(fields).find(p => p.field === field);
}

function cellFor(spec: ScalarFieldSpec, value: JsonObject[string] | undefined): CellValue {
  if (value === undefined || value === null) return null;
  switch (spec.type) {
    case 'string': return typeof value === 'string' ? value : null;
    case 'number':
    case 'integer': return typeof value === 'number' ? value : null;
    case 'boolean': return typeof value === 'boolean' ? value : null;
  }
}

/** 从规范化文档推导投影列的值 */
export function project(fields: ObjectFieldSpec, document: JsonObject): Record<string, CellValue> {
  const cells: Record<string, CellValue> = {};
  for (const p of projectedFields(fields)) {
    cells[p.column] = cellFor(p.spec, Object.hasOwn(document, p.field) ? document[p.field] : undefined);
  }
  return cells;
}

// ============================================
// 类型拓宽
// ============================================

export type TypeChange = 'same' | 'widen' | 'keep' | 'incompatible';

/**
 * 已持久化列类型 → 新映射类型
 * widen：bigint → double，boolean → bigint | double，varchar(n) → varchar(m ≥ n) | text
 * keep：新长度更短的 varchar 或 text → varchar，长度约束只由校验器执行，沿用现有列
 */
export function compareTypes(from: PhysicalType, to: PhysicalType): TypeChange {
  if (from.kind === 'varchar' && to.kind === 'varchar') {
    if (to.length === from.length) return 'same';
    return to.length > from.length ? 'widen' : 'keep';
  }
  if (from.kind === to.kind) return 'same';
  if (from.kind === 'varchar' && to.kind === 'text') return 'widen';
  if (from.kind === 'text' && to.kind === 'varchar') return 'keep';
  if (from.kind === 'bigint' && to.kind === 'double') return 'widen';
  if (from.kind === 'boolean' && (to.kind === 'bigint' || to.kind === 'double')) return 'widen';
  return 'incompatible';
}
