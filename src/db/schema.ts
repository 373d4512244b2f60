import { text, integer, sqliteTable } from "drizzle-orm/sqlite-core";
import { sql } from "drizzle-orm";

// One row per indexed file; id follows enumeration order
export const filesTable = sqliteTable("files", {
  id: integer("id").primaryKey(),
  path: text("path").notNull().unique(),
});

// Names in file-appearance order, `position` counting from 0 per file
export const namesTable = sqliteTable("names", {
  id: integer("id").primaryKey(),
  fileId: integer("fileId").notNull(),
  position: integer("position").notNull(),
  name: text("name").notNull(),
});

export const metadataTable = sqliteTable("metadata", {
  key: text("key").primaryKey(),
  value: text("value").notNull(),
});

export const createTableStatements = [
  sql`CREATE TABLE files (
    id INTEGER PRIMARY KEY,
    path TEXT NOT NULL UNIQUE
  )`,
  sql`CREATE TABLE names (
    id INTEGER PRIMARY KEY,
    fileId INTEGER NOT NULL REFERENCES files(id),
    position INTEGER NOT NULL,
    name TEXT NOT NULL
  )`,
  sql`CREATE INDEX names_file_position_idx ON names (fileId, position)`,
  sql`CREATE TABLE metadata (
    key TEXT PRIMARY KEY,
    value TEXT NOT NULL
  )`,
];
