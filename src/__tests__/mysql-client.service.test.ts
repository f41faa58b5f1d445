import { describe, it, expect } from 'vitest';
import {
  MysqlClientService,
  cleanStderr,
  connectionArgs,
  quoteIdentifier,
  type ConnectionSettings,
} from '../services/mysql-client.service.js';
import { fakeSpawner } from './fakes.js';

const conn: ConnectionSettings = {
  host: 'db.local',
  port: 3307,
  user: 'admin',
  password: 'test-secret',
};

const PASSWORD_WARNING =
  'mysql: [Warning] Using a password on the command line interface can be insecure.\n';

describe('mysql-client.service', () => {
  describe('connectionArgs', () => {
    it('should pass each setting as its own argument', () => {
      expect(connectionArgs(conn)).toEqual([
        '--host=db.local',
        '--port=3307',
        '--user=admin',
        '--password=test-secret',
      ]);
    });

    it('should leave out an empty password', () => {
      expect(connectionArgs({ ...conn, password: '' })).toEqual([
        '--host=db.local',
        '--port=3307',
        '--user=admin',
      ]);
    });
  });

  describe('quoteIdentifier', () => {
    it('should wrap names in backticks', () => {
      expect(quoteIdentifier('app_dev')).toBe('`app_dev`');
    });

    it('should double backticks inside the name', () => {
      expect(quoteIdentifier('app`dev')).toBe('`app``dev`');
    });
  });

  describe('cleanStderr', () => {
    it('should drop the command line password warning', () => {
      expect(cleanStderr(`${PASSWORD_WARNING}ERROR 1045 (28000): Access denied\n`)).toBe(
        'ERROR 1045 (28000): Access denied'
      );
    });
  });

  describe('isInstalled', () => {
    it('should report the client version', async () => {
      const { spawner, calls } = fakeSpawner(() => ({ stdout: 'mysql  Ver 8.0.36 for Linux on x86_64\n' }));
      const client = new MysqlClientService('mysql', spawner);

      expect(await client.isInstalled()).toEqual({
        installed: true,
        version: 'mysql  Ver 8.0.36 for Linux on x86_64',
      });
      expect(calls[0].args).toEqual(['--version']);
    });

    it('should report a missing binary', async () => {
      const { spawner } = fakeSpawner(() => new Error('spawn mysql ENOENT'));
      const client = new MysqlClientService('mysql', spawner);

      expect(await client.isInstalled()).toEqual({
        installed: false,
        error: 'Failed to execute mysql: spawn mysql ENOENT',
      });
    });

    it('should run the configured binary', async () => {
      const { spawner, calls } = fakeSpawner(() => ({ stdout: 'mariadb  Ver 15.1\n' }));
      const client = new MysqlClientService('/opt/mariadb/bin/mariadb', spawner);

      await client.isInstalled();

      expect(calls[0].command).toBe('/opt/mariadb/bin/mariadb');
    });
  });

  describe('listSchemas', () => {
    it('should run SHOW DATABASES and split the rows', async () => {
      const { spawner, calls } = fakeSpawner(() => ({
        stdout: 'information_schema\napp_dev\nmysql\n',
        stderr: PASSWORD_WARNING,
      }));
      const client = new MysqlClientService('mysql', spawner);

      const result = await client.listSchemas(conn);

      expect(result).toEqual({ success: true, schemas: ['information_schema', 'app_dev', 'mysql'] });
      expect(calls[0].args).toEqual([
        '--host=db.local',
        '--port=3307',
        '--user=admin',
        '--password=test-secret',
        '--batch',
        '--skip-column-names',
        '--execute=SHOW DATABASES',
      ]);
    });

    it('should return the server error on failure', async () => {
      const { spawner } = fakeSpawner(() => ({
        code: 1,
        stderr: `${PASSWORD_WARNING}ERROR 1045 (28000): Access denied for user 'admin'@'localhost'\n`,
      }));
      const client = new MysqlClientService('mysql', spawner);

      expect(await client.listSchemas(conn)).toEqual({
        success: false,
        schemas: [],
        error: "ERROR 1045 (28000): Access denied for user 'admin'@'localhost'",
      });
    });

    it('should fall back to the exit code when there is no error output', async () => {
      const { spawner } = fakeSpawner(() => ({ code: 2 }));
      const client = new MysqlClientService('mysql', spawner);

      expect((await client.listSchemas(conn)).error).toBe('mysql exited with code 2');
    });
  });

  describe('dropSchema', () => {
    it('should drop the quoted schema', async () => {
      const { spawner, calls } = fakeSpawner(() => ({ code: 0 }));
      const client = new MysqlClientService('mysql', spawner);

      const result = await client.dropSchema(conn, 'app_dev');

      expect(result.success).toBe(true);
      expect(calls[0].args[calls[0].args.length - 1]).toBe('--execute=DROP DATABASE IF EXISTS `app_dev`');
    });
  });

  describe('executeBatch', () => {
    it('should write the SQL to stdin', async () => {
      const { spawner, calls } = fakeSpawner(() => ({ code: 0 }));
      const client = new MysqlClientService('mysql', spawner);

      await client.executeBatch(conn, 'CREATE DATABASE app_dev;');

      expect(calls[0]).toEqual({
        command: 'mysql',
        args: ['--host=db.local', '--port=3307', '--user=admin', '--password=test-secret'],
        input: 'CREATE DATABASE app_dev;',
      });
    });
  });
});
