import { spawn, type SpawnOptions } from 'child_process';
import type { Readable, Writable } from 'stream';

/**
 * The part of a child process the client relies on
 */
export interface SpawnedProcess {
  stdin: Writable | null;
  stdout: Readable | null;
  stderr: Readable | null;
  on(event: 'close', listener: (code: number | null) => void): unknown;
  on(event: 'error', listener: (err: Error) => void): unknown;
}

export type Spawner = (
  command: string,
  args: readonly string[],
  options: SpawnOptions
) => SpawnedProcess;

export interface ConnectionSettings {
  host: string;
  port: number;
  user: string;
  password: string;
}

export interface MysqlResult {
  success: boolean;
  code: number | null;
  stdout: string;
  stderr: string;
  error?: string;
}

export interface SchemaListResult {
  success: boolean;
  schemas: string[];
  error?: string;
}

const PASSWORD_WARNING = 'Using a password on the command line interface can be insecure';

/**
 * Drop the warning mysql prints whenever --password is passed as an argument
 */
export function cleanStderr(stderr: string): string {
  return stderr
    .split('\n')
    .filter((line) => !line.includes(PASSWORD_WARNING))
    .join('\n')
    .trim();
}

/**
 * Quote a schema name for use in a statement
 */
export function quoteIdentifier(name: string): string {
  return '`' + name.replace(/`/g, '``') + '`';
}

export function connectionArgs(conn: ConnectionSettings): string[] {
  const args = [`--host=${conn.host}`, `--port=${conn.port}`, `--user=${conn.user}`];
  // Without --password the client connects with no password instead of prompting
  if (conn.password !== '') {
    args.push(`--password=${conn.password}`);
  }
  return args;
}

/**
 * MySQL Client Service
 * Runs the mysql command-line client, one process at a time.
 */
export class MysqlClientService {
  constructor(
    readonly bin: string = 'mysql',
    private readonly spawner: Spawner = spawn
  ) {}

  /**
   * Run the client with the given arguments, writing `input` to its stdin
   */
  run(args: string[], input = ''): Promise<MysqlResult> {
    return new Promise((resolve) => {
      let stdout = '';
      let stderr = '';
      let stdinError: string | undefined;
      let settled = false;

      const finish = (result: MysqlResult) => {
        if (settled) return;
        settled = true;
        resolve(result);
      };

      const child = this.spawner(this.bin, args, {
        stdio: ['pipe', 'pipe', 'pipe'],
      });

      child.stdout?.on('data', (data: Buffer | string) => {
        stdout += data.toString();
      });

      child.stderr?.on('data', (data: Buffer | string) => {
        stderr += data.toString();
      });

      child.on('error', (err) => {
        finish({
          success: false,
          code: null,
          stdout,
          stderr,
          error: `Failed to execute ${this.bin}: ${err.message}`,
        });
      });

      child.on('close', (code) => {
        if (code === 0) {
          finish({ success: true, code, stdout, stderr });
          return;
        }
        finish({
          success: false,
          code,
          stdout,
          stderr,
          error: cleanStderr(stderr) || stdinError || `${this.bin} exited with code ${code}`,
        });
      });

      if (child.stdin) {
        // The client may exit before reading everything (e.g. bad credentials)
        child.stdin.on('error', (err) => {
          stdinError = `Could not write to ${this.bin}: ${err.message}`;
        });
        child.stdin.end(input);
      }
    });
  }

  /**
   * Check that the client binary can be started
   */
  async isInstalled(): Promise<{ installed: boolean; version?: string; error?: string }> {
    const result = await this.run(['--version']);
    if (!result.success) {
      return { installed: false, error: result.error };
    }
    return { installed: true, version: result.stdout.trim() };
  }

  /**
   * Run a single statement and return its tab-separated output
   */
  query(conn: ConnectionSettings, sql: string): Promise<MysqlResult> {
    return this.run([...connectionArgs(conn), '--batch', '--skip-column-names', `--execute=${sql}`]);
  }

  async listSchemas(conn: ConnectionSettings): Promise<SchemaListResult> {
    const result = await this.query(conn, 'SHOW DATABASES');
    if (!result.success) {
      return { success: false, schemas: [], error: result.error };
    }
    const schemas = result.stdout
      .split('\n')
      .map((line) => line.trim())
      .filter((line) => line.length > 0);
    return { success: true, schemas };
  }

  dropSchema(conn: ConnectionSettings, name: string): Promise<MysqlResult> {
    return this.query(conn, `DROP DATABASE IF EXISTS ${quoteIdentifier(name)}`);
  }

  /**
   * Pipe a batch of SQL statements to the client
   */
  executeBatch(conn: ConnectionSettings, sql: string): Promise<MysqlResult> {
    return this.run(connectionArgs(conn), sql);
  }
}
