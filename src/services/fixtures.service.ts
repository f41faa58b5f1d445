import { existsSync, statSync } from 'fs';
import { readdir, readFile } from 'fs/promises';
import path from 'path';
import type { ConnectionSettings, MysqlClientService } from './mysql-client.service.js';

export type FixtureStage = 'create' | 'insert';

export interface FixtureDirectories {
  root: string;
  create: string;
  insert: string;
}

export interface BatchResult {
  stage: FixtureStage;
  status: 'applied' | 'skipped' | 'failed';
  files: string[];
  error?: string;
}

/**
 * Where create/ and insert/ may live, in lookup order
 */
export const FIXTURE_ROOTS = ['.', 'sql', path.join('fixtures', 'sql')];

function isDirectory(dirPath: string): boolean {
  return existsSync(dirPath) && statSync(dirPath).isDirectory();
}

/**
 * Find the first root under `cwd` that has both a create/ and an insert/ directory
 */
export function findFixtureDirectories(cwd: string): FixtureDirectories | null {
  for (const root of FIXTURE_ROOTS) {
    const rootPath = path.resolve(cwd, root);
    const create = path.join(rootPath, 'create');
    const insert = path.join(rootPath, 'insert');
    if (isDirectory(create) && isDirectory(insert)) {
      return { root: rootPath, create, insert };
    }
  }
  return null;
}

/**
 * SQL files in a directory, sorted by name
 */
export async function listSqlFiles(dir: string): Promise<string[]> {
  const entries = await readdir(dir, { withFileTypes: true });
  return entries
    .filter((entry) => entry.isFile() && /\.sql$/i.test(entry.name))
    .map((entry) => entry.name)
    .sort((a, b) => a.localeCompare(b));
}

/**
 * Concatenate every SQL file of a directory into one batch
 */
export async function readBatch(dir: string): Promise<{ files: string[]; sql: string }> {
  const files = await listSqlFiles(dir);
  const parts: string[] = [];
  for (const file of files) {
    parts.push(await readFile(path.join(dir, file), 'utf-8'));
  }
  return { files, sql: parts.join('\n') };
}

/**
 * Run all SQL files of one fixture directory as a single batch
 */
export async function runFixtureBatch(
  client: MysqlClientService,
  conn: ConnectionSettings,
  dir: string,
  stage: FixtureStage
): Promise<BatchResult> {
  const { files, sql } = await readBatch(dir);
  if (files.length === 0) {
    return { stage, status: 'skipped', files };
  }

  const result = await client.executeBatch(conn, sql);
  if (!result.success) {
    return { stage, status: 'failed', files, error: result.error };
  }
  return { stage, status: 'applied', files };
}
