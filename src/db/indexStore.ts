import { createClient, type Client } from "@libsql/client";
import { drizzle, type LibSQLDatabase } from "drizzle-orm/libsql";
import { asc } from "drizzle-orm";
import { promises as fs } from "fs";
import path from "path";
import { randomUUID } from "crypto";
import { pathToFileURL } from "url";
import { z } from "zod";
import { logger } from "../logger.js";
import {
  IndexCorruptError,
  IndexNotFoundError,
  IndexWriteError,
  errorMessage,
  isErrnoException,
  toError,
} from "../lib/errors.js";
import { DEFAULT_MARKER } from "../lib/extractor.js";
import {
  createTableStatements,
  filesTable,
  metadataTable,
  namesTable,
} from "./schema.js";
import { countNames, toEntries } from "../types/entities.js";
import type { FunctionIndex, IndexMetadata } from "../types/entities.js";

export const INDEX_FORMAT_VERSION = 1;

// Rows per INSERT, well below SQLite's bound-parameter limit
const INSERT_BATCH_SIZE = 500;

const metadataSchema = z.object({
  formatVersion: z.coerce.number().int(),
  root: z.string(),
  marker: z.string(),
  extension: z.string(),
  builtAt: z.string(),
  fileCount: z.coerce.number().int().nonnegative(),
  nameCount: z.coerce.number().int().nonnegative(),
});

export interface IndexSource {
  root: string;
  marker: string;
  extension: string;
}

function chunk<T>(items: T[], size: number): T[][] {
  const chunks: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    chunks.push(items.slice(i, i + size));
  }
  return chunks;
}

function openDatabase(location: string): {
  client: Client;
  db: LibSQLDatabase;
} {
  // Escapes "#", "?" and "%" so they stay part of the file name
  const client = createClient({ url: pathToFileURL(location).href });
  return { client, db: drizzle(client) };
}

function closeQuietly(client: Client, location: string): void {
  try {
    client.close();
  } catch (error) {
    logger.debug(
      { location, error: errorMessage(error) },
      "Failed to close index database",
    );
  }
}

async function writeIndex(
  db: LibSQLDatabase,
  index: FunctionIndex,
  metadata: IndexMetadata,
): Promise<void> {
  for (const statement of createTableStatements) {
    await db.run(statement);
  }

  const fileRows: { id: number; path: string }[] = [];
  const nameRows: { fileId: number; position: number; name: string }[] = [];
  for (const { filePath, names } of toEntries(index)) {
    const fileId = fileRows.length + 1;
    fileRows.push({ id: fileId, path: filePath });
    names.forEach((name, position) => {
      nameRows.push({ fileId, position, name });
    });
  }

  await db.transaction(async (tx) => {
    for (const rows of chunk(fileRows, INSERT_BATCH_SIZE)) {
      await tx.insert(filesTable).values(rows);
    }
    for (const rows of chunk(nameRows, INSERT_BATCH_SIZE)) {
      await tx.insert(namesTable).values(rows);
    }
    await tx.insert(metadataTable).values(
      Object.entries(metadata).map(([key, value]) => ({
        key,
        value: String(value),
      })),
    );
  });
}

/**
 * Persists the index as a SQLite file. The data is written to a temporary
 * file next to `location` and renamed over it, so readers see either the
 * previous index or the complete new one.
 */
export async function saveIndex(
  index: FunctionIndex,
  location: string,
  source: Partial<IndexSource> = {},
): Promise<IndexMetadata> {
  const target = path.resolve(location);
  const tempPath = `${target}.${process.pid}.${randomUUID()}.tmp`;

  const metadata: IndexMetadata = {
    formatVersion: INDEX_FORMAT_VERSION,
    root: source.root ?? "",
    marker: source.marker ?? DEFAULT_MARKER,
    extension: source.extension ?? "",
    builtAt: new Date().toISOString(),
    fileCount: index.size,
    nameCount: countNames(index),
  };

  try {
    await fs.mkdir(path.dirname(target), { recursive: true });

    const { client, db } = openDatabase(tempPath);
    try {
      await writeIndex(db, index, metadata);
    } finally {
      closeQuietly(client, tempPath);
    }

    await fs.rename(tempPath, target);
  } catch (error) {
    await fs.rm(tempPath, { force: true }).catch((cleanupError: unknown) => {
      logger.warn(
        { tempPath, error: errorMessage(cleanupError) },
        "Failed to remove temporary index file",
      );
    });
    throw new IndexWriteError(
      `Failed to write index to ${target}: ${errorMessage(error)}`,
      target,
      toError(error),
    );
  }

  logger.info(
    { location: target, files: metadata.fileCount, names: metadata.nameCount },
    "Index saved",
  );
  return metadata;
}

async function assertIndexFile(location: string): Promise<void> {
  try {
    const stats = await fs.stat(location);
    if (!stats.isFile()) {
      throw new IndexCorruptError(
        `Index location is not a file: ${location}`,
        location,
      );
    }
  } catch (error) {
    if (isErrnoException(error) && error.code === "ENOENT") {
      throw new IndexNotFoundError(location);
    }
    if (error instanceof IndexCorruptError) throw error;
    throw new IndexCorruptError(
      `Failed to access index ${location}: ${errorMessage(error)}`,
      location,
      toError(error),
    );
  }
}

async function readMetadata(
  db: LibSQLDatabase,
  location: string,
): Promise<IndexMetadata> {
  const rows = await db.select().from(metadataTable);
  const parsed = metadataSchema.safeParse(
    Object.fromEntries(rows.map((row) => [row.key, row.value])),
  );
  if (!parsed.success) {
    throw new IndexCorruptError(
      `Index metadata is invalid in ${location}: ${parsed.error.message}`,
      location,
    );
  }
  if (parsed.data.formatVersion !== INDEX_FORMAT_VERSION) {
    throw new IndexCorruptError(
      `Unsupported index format version ${parsed.data.formatVersion} in ${location}`,
      location,
    );
  }
  return parsed.data;
}

async function readIndex(
  db: LibSQLDatabase,
  location: string,
): Promise<FunctionIndex> {
  await readMetadata(db, location);

  const files = await db.select().from(filesTable).orderBy(asc(filesTable.id));
  const names = await db
    .select()
    .from(namesTable)
    .orderBy(asc(namesTable.fileId), asc(namesTable.position));

  const index: FunctionIndex = new Map();
  const byId = new Map<number, string[]>();
  for (const file of files) {
    const list: string[] = [];
    index.set(file.path, list);
    byId.set(file.id, list);
  }

  for (const row of names) {
    const list = byId.get(row.fileId);
    if (!list) {
      throw new IndexCorruptError(
        `Name "${row.name}" references unknown file id ${row.fileId} in ${location}`,
        location,
      );
    }
    list.push(row.name);
  }

  return index;
}

async function withIndexDatabase<T>(
  location: string,
  read: (db: LibSQLDatabase, target: string) => Promise<T>,
): Promise<T> {
  const target = path.resolve(location);
  await assertIndexFile(target);

  let client: Client | undefined;
  try {
    const opened = openDatabase(target);
    client = opened.client;
    return await read(opened.db, target);
  } catch (error) {
    if (error instanceof IndexCorruptError) throw error;
    throw new IndexCorruptError(
      `Failed to read index ${target}: ${errorMessage(error)}`,
      target,
      toError(error),
    );
  } finally {
    if (client) closeQuietly(client, target);
  }
}

/**
 * Loads a persisted index. Throws `IndexNotFoundError` when nothing exists at
 * `location` and `IndexCorruptError` when the file is not a readable index.
 */
export async function loadIndex(location: string): Promise<FunctionIndex> {
  const index = await withIndexDatabase(location, readIndex);
  logger.debug(
    { location: path.resolve(location), files: index.size },
    "Index loaded",
  );
  return index;
}

export async function readIndexMetadata(
  location: string,
): Promise<IndexMetadata> {
  return withIndexDatabase(location, readMetadata);
}
