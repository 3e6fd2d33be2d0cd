jest.mock('child_process', () => ({
  spawn: jest.fn(),
}));

jest.mock('mysql2/promise', () => ({
  createConnection: jest.fn(),
}));

import { EventEmitter } from 'events';
import { existsSync, mkdtempSync, readFileSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { PassThrough } from 'stream';
import { gunzipSync } from 'zlib';
import { spawn } from 'child_process';
import { createConnection } from 'mysql2/promise';
import { DumpError, MySQLClient, PreflightError } from '../src/clients/MySQLClient';
import { createMockLogger, createTestConfig } from './helpers/fakes';

const mockSpawn = spawn as unknown as jest.Mock;
const mockCreateConnection = createConnection as unknown as jest.Mock;

const HELP_WITH_GTID = 'mysqldump  Ver 8.0.36\n  --set-gtid-purged=name\n  --single-transaction\n';
const HELP_WITHOUT_GTID = 'mysqldump  Ver 10.19 Distrib 10.11.6-MariaDB\n  --single-transaction\n';

class FakeChildProcess extends EventEmitter {
  readonly stdout = new PassThrough();
  readonly stderr = new PassThrough();
}

interface ChildScript {
  stdout?: string;
  stderr?: string;
  code?: number;
  error?: Error;
}

/**
 * A child process that writes its output, then closes with the given exit code
 */
function scriptedChild(script: ChildScript): FakeChildProcess {
  const child = new FakeChildProcess();

  setImmediate(() => {
    if (script.error) {
      child.emit('error', script.error);
      return;
    }

    let openStreams = 2;
    const onEnd = () => {
      openStreams--;
      if (openStreams === 0) {
        child.emit('close', script.code ?? 0);
      }
    };
    child.stdout.on('end', onEnd);
    child.stderr.on('end', onEnd);
    child.stdout.end(script.stdout ?? '');
    child.stderr.end(script.stderr ?? '');
  });

  return child;
}

function scriptSpawn(help: ChildScript, dump: ChildScript = {}): void {
  mockSpawn.mockImplementation((_command: string, args: string[]) =>
    scriptedChild(args[0] === '--help' ? help : dump)
  );
}

describe('MySQLClient', () => {
  let workDir: string;
  let logger: ReturnType<typeof createMockLogger>;
  let client: MySQLClient;

  beforeEach(() => {
    jest.clearAllMocks();
    workDir = mkdtempSync(join(tmpdir(), 'mysql-client-test-'));
    logger = createMockLogger();
    client = new MySQLClient(createTestConfig(), logger);
  });

  afterEach(() => {
    rmSync(workDir, { recursive: true, force: true });
  });

  describe('checkDumpTool', () => {
    it('should detect --set-gtid-purged support', async () => {
      scriptSpawn({ stdout: HELP_WITH_GTID });

      await expect(client.checkDumpTool()).resolves.toEqual({ supportsGtidPurged: true });
      expect(mockSpawn).toHaveBeenCalledWith('mysqldump', ['--help'], { stdio: ['ignore', 'pipe', 'pipe'] });
    });

    it('should report no GTID support for dump tools without the option', async () => {
      scriptSpawn({ stdout: HELP_WITHOUT_GTID });

      await expect(client.checkDumpTool()).resolves.toEqual({ supportsGtidPurged: false });
    });

    it('should fail preflight when mysqldump is not installed', async () => {
      scriptSpawn({ error: Object.assign(new Error('spawn mysqldump ENOENT'), { code: 'ENOENT' }) });

      const failure = client.checkDumpTool();

      await expect(failure).rejects.toBeInstanceOf(PreflightError);
      await expect(failure).rejects.toMatchObject({
        message: "'mysqldump' not found",
        command: 'mysqldump',
      });
    });

    it('should fail preflight when mysqldump cannot run', async () => {
      scriptSpawn({ error: Object.assign(new Error('spawn mysqldump EACCES'), { code: 'EACCES' }) });

      await expect(client.checkDumpTool()).rejects.toThrow(
        "'mysqldump' cannot be executed: spawn mysqldump EACCES"
      );
    });
  });

  describe('buildDumpArgs', () => {
    it('should request a consistent dump with routines, triggers and events', () => {
      expect(client.buildDumpArgs('shop', { supportsGtidPurged: false })).toEqual([
        '--host=db.internal',
        '--port=3306',
        '--user=backup',
        '--single-transaction',
        '--routines',
        '--triggers',
        '--events',
        'shop',
      ]);
    });

    it('should disable GTID_PURGED output when supported', () => {
      const args = client.buildDumpArgs('shop', { supportsGtidPurged: true });

      expect(args.slice(-2)).toEqual(['--set-gtid-purged=OFF', 'shop']);
    });

    it('should never put the password on the command line', () => {
      const args = client.buildDumpArgs('shop', { supportsGtidPurged: true });

      expect(args.some(arg => arg.includes('test-secret'))).toBe(false);
    });
  });

  describe('createBackup', () => {
    it('should write the gzip-compressed dump', async () => {
      const dump = 'CREATE TABLE orders (id INT);\nINSERT INTO orders VALUES (1);\n';
      scriptSpawn({ stdout: HELP_WITH_GTID }, { stdout: dump });
      const outputPath = join(workDir, 'nested', 'shop.sql.gz');

      const info = await client.createBackup('shop', outputPath);

      expect(info.filePath).toBe(outputPath);
      expect(info.databaseName).toBe('shop');
      expect(info.fileSize).toBeGreaterThan(0);
      expect(gunzipSync(readFileSync(outputPath)).toString()).toBe(dump);
    });

    it('should pass the password through the environment', async () => {
      scriptSpawn({ stdout: HELP_WITH_GTID }, { stdout: 'SELECT 1;\n' });

      await client.createBackup('shop', join(workDir, 'shop.sql.gz'));

      const [command, args, options] = mockSpawn.mock.calls[1];
      expect(command).toBe('mysqldump');
      expect(args).toEqual(client.buildDumpArgs('shop', { supportsGtidPurged: true }));
      expect(options.env.MYSQL_PWD).toBe('test-secret');
    });

    it('should run the preflight check only once', async () => {
      scriptSpawn({ stdout: HELP_WITH_GTID }, { stdout: 'SELECT 1;\n' });

      await client.createBackup('shop', join(workDir, 'shop.sql.gz'));
      await client.createBackup('crm', join(workDir, 'crm.sql.gz'));

      const helpCalls = mockSpawn.mock.calls.filter(([, args]) => args[0] === '--help');
      expect(helpCalls).toHaveLength(1);
      expect(mockSpawn).toHaveBeenCalledTimes(3);
    });

    it('should fail with the exit code and stderr of mysqldump', async () => {
      scriptSpawn(
        { stdout: HELP_WITH_GTID },
        { stderr: "mysqldump: Got error: 1049: Unknown database 'ghost'\n", code: 2 }
      );

      const failure = client.createBackup('ghost', join(workDir, 'ghost.sql.gz'));

      await expect(failure).rejects.toBeInstanceOf(DumpError);
      await expect(failure).rejects.toMatchObject({
        message: "mysqldump exited with code 2 for ghost. Error details: mysqldump: Got error: 1049: Unknown database 'ghost'",
        databaseName: 'ghost',
        exitCode: 2,
      });
    });
  });

  describe('listDatabases', () => {
    it('should exclude system schemas and keep server order', async () => {
      const connection = {
        query: jest.fn().mockResolvedValue([
          [
            { Database: 'crm' },
            { Database: 'information_schema' },
            { Database: 'mysql' },
            { Database: 'performance_schema' },
            { Database: 'shop' },
            { Database: 'sys' },
          ],
          [],
        ]),
        end: jest.fn().mockResolvedValue(undefined),
      };
      mockCreateConnection.mockResolvedValue(connection);

      await expect(client.listDatabases()).resolves.toEqual(['crm', 'shop']);
      expect(connection.query).toHaveBeenCalledWith('SHOW DATABASES');
      expect(connection.end).toHaveBeenCalled();
      expect(mockCreateConnection).toHaveBeenCalledWith({
        host: 'db.internal',
        port: 3306,
        user: 'backup',
        password: 'test-secret',
      });
    });

    it('should close the connection when the query fails', async () => {
      const connection = {
        query: jest.fn().mockRejectedValue(new Error('Access denied')),
        end: jest.fn().mockResolvedValue(undefined),
      };
      mockCreateConnection.mockResolvedValue(connection);

      await expect(client.listDatabases()).rejects.toThrow('Access denied');
      expect(connection.end).toHaveBeenCalled();
    });
  });

  describe('testConnection', () => {
    it('should return false when the server is unreachable', async () => {
      mockCreateConnection.mockRejectedValue(new Error('connect ECONNREFUSED'));

      await expect(client.testConnection()).resolves.toBe(false);
      expect(logger.error).toHaveBeenCalledWith('MySQL connection test failed', expect.any(Error), {
        host: 'db.internal',
        port: 3306,
      });
    });

    it('should return true after a successful query', async () => {
      mockCreateConnection.mockResolvedValue({
        query: jest.fn().mockResolvedValue([[{ 1: 1 }], []]),
        end: jest.fn().mockResolvedValue(undefined),
      });

      await expect(client.testConnection()).resolves.toBe(true);
    });
  });

  it('should not leave a partial file behind after a failed dump', async () => {
    scriptSpawn({ stdout: HELP_WITH_GTID }, { stdout: '-- partial', code: 1 });
    const outputPath = join(workDir, 'broken.sql.gz');

    await expect(client.createBackup('broken', outputPath)).rejects.toThrow(DumpError);
    // Give the compressor a moment to finish flushing
    await new Promise(resolve => setTimeout(resolve, 50));
    expect(existsSync(outputPath)).toBe(false);
  });
});
