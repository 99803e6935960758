import { int, index, json, longtext, mysqlEnum, mysqlTable, timestamp, varchar } from "drizzle-orm/mysql-core";
import type { MigrationSummary, StructureMeta } from "../shared/structureTypes";

// ============ 结构注册表 ============

/**
 * 结构定义表 - 每个结构一行，对应一张 st_ 前缀的物理表
 */
export const structureDefinitions = mysqlTable("structure_definitions", {
  name: varchar("name", { length: 48 }).primaryKey(),
  tableName: varchar("table_name", { length: 64 }).notNull().unique("uq_sd_table"),
  /** 提交时的原始 schema 文档（JSON 文本） */
  schemaJson: longtext("schema_json").notNull(),
  version: int("version").notNull(),
  meta: json("meta").$type<StructureMeta>().notNull(),
  createdAt: timestamp("created_at", { fsp: 3 }).defaultNow().notNull(),
  updatedAt: timestamp("updated_at", { fsp: 3 }).defaultNow().onUpdateNow().notNull(),
});

export type StructureDefinitionRow = typeof structureDefinitions.$inferSelect;
export type InsertStructureDefinition = typeof structureDefinitions.$inferInsert;

/**
 * 迁移历史表 - 每次 create/update/vacuum/drop 追加一行
 */
export const structureMigrations = mysqlTable("structure_migrations", {
  id: int("id").autoincrement().primaryKey(),
  structureName: varchar("structure_name", { length: 48 }).notNull(),
  version: int("version").notNull(),
  kind: mysqlEnum("kind", ["create", "update", "vacuum", "drop"]).notNull(),
  summary: json("summary").$type<MigrationSummary>().notNull(),
  appliedAt: timestamp("applied_at", { fsp: 3 }).defaultNow().notNull(),
}, (table) => [
  index("idx_sm_structure").on(table.structureName),
]);

export type StructureMigrationRow = typeof structureMigrations.$inferSelect;
export type InsertStructureMigration = typeof structureMigrations.$inferInsert;
