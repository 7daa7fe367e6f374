/**
 * SQLite connection handling for the relational store and the vector index.
 * Pass ':memory:' for an in-process database (used by the tests).
 */

import Database from 'better-sqlite3';
import * as fs from 'fs';
import * as path from 'path';
import { StoreUnavailableError, errorMessage } from '../errors';
import { debugLogger } from '../utils/debug-logger';

export type SqliteDatabase = Database.Database;

export function openDatabase(filePath: string, schema: string): SqliteDatabase {
  try {
    if (filePath !== ':memory:') {
      fs.mkdirSync(path.dirname(path.resolve(filePath)), { recursive: true });
    }

    const db = new Database(filePath);
    db.pragma('foreign_keys = ON');
    if (filePath !== ':memory:') {
      db.pragma('journal_mode = WAL');
    }
    db.exec(schema);

    debugLogger.info('DB', 'Database opened', { filePath });
    return db;
  } catch (error) {
    throw new StoreUnavailableError(`Cannot open database at ${filePath}: ${errorMessage(error)}`, { cause: error });
  }
}

export function toMillis(date: Date | null | undefined): number | null {
  return date ? date.getTime() : null;
}

export function fromMillis(value: number | null): Date | null {
  return value === null ? null : new Date(value);
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function parseJsonObject(text: string): Record<string, unknown> {
  try {
    const parsed: unknown = JSON.parse(text);
    return isRecord(parsed) ? parsed : {};
  } catch {
    return {};
  }
}

/**
 * SQLite caps bound parameters per statement; chunk long IN lists.
 */
export const MAX_IN_PARAMS = 500;

export function placeholders(count: number): string {
  return Array.from({ length: count }, () => '?').join(', ');
}
