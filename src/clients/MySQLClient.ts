import { createConnection, Connection, RowDataPacket } from 'mysql2/promise';
import { spawn } from 'child_process';
import { createWriteStream, promises as fs } from 'fs';
import { dirname } from 'path';
import { pipeline } from 'stream/promises';
import { createGzip } from 'zlib';
import { BackupConfig } from '../interfaces/BackupConfig';
import { BackupInfo, DumpToolInfo, MySQLClient as IMySQLClient } from '../interfaces/MySQLClient';
import { Logger } from '../interfaces/Logger';
import { errorCode, formatError, toError } from '../utils/errors';

/**
 * Schemas the server maintains for itself; never backed up
 */
export const SYSTEM_SCHEMAS: ReadonlySet<string> = new Set([
  'information_schema',
  'performance_schema',
  'sys',
  'mysql',
]);

/**
 * Custom error classes for MySQL operations
 */
export class MySQLError extends Error {
  constructor(
    message: string,
    public readonly operation: string,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'MySQLError';
    if (cause) {
      this.stack = `${this.stack}\nCaused by: ${cause.stack}`;
    }
  }
}

export class PreflightError extends MySQLError {
  constructor(
    message: string,
    public readonly command: string,
    cause?: Error
  ) {
    super(message, 'preflight', cause);
    this.name = 'PreflightError';
  }
}

export class DumpError extends MySQLError {
  constructor(
    message: string,
    public readonly databaseName: string,
    public readonly exitCode?: number,
    cause?: Error
  ) {
    super(message, 'dump', cause);
    this.name = 'DumpError';
  }
}

type ConnectionSettings = Pick<BackupConfig, 'mysqlHost' | 'mysqlPort' | 'mysqlUser' | 'mysqlPassword'>;

/**
 * MySQL client for catalog queries and mysqldump-based backups
 */
export class MySQLClient implements IMySQLClient {
  private dumpTool: DumpToolInfo | null = null;

  constructor(
    private readonly settings: ConnectionSettings,
    private readonly logger: Logger
  ) {}

  /**
   * Test connection to the MySQL server
   */
  async testConnection(): Promise<boolean> {
    try {
      await this.withConnection(connection => connection.query('SELECT 1'));
      return true;
    } catch (error) {
      this.logger.error('MySQL connection test failed', toError(error), {
        host: this.settings.mysqlHost,
        port: this.settings.mysqlPort,
      });
      return false;
    }
  }

  /**
   * Database names from SHOW DATABASES, without system schemas, in server order
   */
  async listDatabases(): Promise<string[]> {
    const [rows] = await this.withConnection(connection =>
      connection.query<RowDataPacket[]>('SHOW DATABASES')
    );

    return rows
      .map(row => row['Database'])
      .filter((name): name is string => typeof name === 'string')
      .filter(name => !SYSTEM_SCHEMAS.has(name));
  }

  /**
   * Run `mysqldump --help` to make sure the tool is installed and read its options
   */
  async checkDumpTool(): Promise<DumpToolInfo> {
    const output = await new Promise<string>((resolve, reject) => {
      const child = spawn('mysqldump', ['--help'], { stdio: ['ignore', 'pipe', 'pipe'] });
      let text = '';

      child.stdout.on('data', (chunk: Buffer) => {
        text += chunk.toString();
      });
      child.stderr.on('data', (chunk: Buffer) => {
        text += chunk.toString();
      });

      child.on('error', error => {
        const reason =
          errorCode(error) === 'ENOENT' ? "'mysqldump' not found" : `'mysqldump' cannot be executed: ${error.message}`;
        reject(new PreflightError(reason, 'mysqldump', error));
      });
      child.on('close', () => resolve(text));
    });

    this.dumpTool = { supportsGtidPurged: output.includes('set-gtid-purged') };
    return this.dumpTool;
  }

  /**
   * Dump one database with mysqldump, compressing its output with gzip on the way to disk
   */
  async createBackup(databaseName: string, outputPath: string): Promise<BackupInfo> {
    const timestamp = new Date();
    const dumpTool = this.dumpTool ?? (await this.checkDumpTool());

    try {
      await fs.mkdir(dirname(outputPath), { recursive: true });
      await this.executeDump(databaseName, outputPath, dumpTool);

      const stats = await fs.stat(outputPath);

      return {
        filePath: outputPath,
        fileSize: stats.size,
        databaseName,
        timestamp,
      };
    } catch (error) {
      // Clean up partial file if it exists
      await fs.rm(outputPath, { force: true }).catch(cleanupError => {
        this.logger.warn(`Failed to cleanup partial backup file ${outputPath}: ${formatError(cleanupError)}`);
      });

      if (error instanceof DumpError) {
        throw error;
      }

      throw new DumpError(
        `Failed to create backup of ${databaseName}: ${formatError(error)}`,
        databaseName,
        undefined,
        toError(error)
      );
    }
  }

  /**
   * Arguments for a consistent snapshot dump including routines, triggers and events
   */
  buildDumpArgs(databaseName: string, dumpTool: DumpToolInfo): string[] {
    const args = [
      `--host=${this.settings.mysqlHost}`,
      `--port=${this.settings.mysqlPort}`,
      `--user=${this.settings.mysqlUser}`,
      '--single-transaction',
      '--routines',
      '--triggers',
      '--events',
    ];

    if (dumpTool.supportsGtidPurged) {
      args.push('--set-gtid-purged=OFF');
    }

    args.push(databaseName);
    return args;
  }

  private async executeDump(databaseName: string, outputPath: string, dumpTool: DumpToolInfo): Promise<void> {
    const child = spawn('mysqldump', this.buildDumpArgs(databaseName, dumpTool), {
      stdio: ['ignore', 'pipe', 'pipe'],
      // Password goes through the environment, not argv
      env: { ...process.env, MYSQL_PWD: this.settings.mysqlPassword },
    });

    let stderr = '';
    child.stderr.on('data', (chunk: Buffer) => {
      stderr += chunk.toString();
    });

    const exited = new Promise<void>((resolve, reject) => {
      child.on('error', error => {
        reject(new DumpError(`Failed to execute mysqldump: ${error.message}`, databaseName, undefined, error));
      });
      child.on('close', code => {
        if (code === 0) {
          resolve();
          return;
        }
        const details = stderr.trim() || 'No additional error information available';
        reject(
          new DumpError(
            `mysqldump exited with code ${code ?? -1} for ${databaseName}. Error details: ${details}`,
            databaseName,
            code ?? -1
          )
        );
      });
    });

    await Promise.all([pipeline(child.stdout, createGzip(), createWriteStream(outputPath)), exited]);

    if (stderr.trim()) {
      this.logger.debug(`mysqldump reported: ${stderr.trim()}`, { databaseName });
    }
  }

  private async withConnection<T>(work: (connection: Connection) => Promise<T>): Promise<T> {
    const connection = await createConnection({
      host: this.settings.mysqlHost,
      port: this.settings.mysqlPort,
      user: this.settings.mysqlUser,
      password: this.settings.mysqlPassword,
    });

    try {
      return await work(connection);
    } finally {
      await connection.end().catch(cleanupError => {
        this.logger.warn(`Failed to close MySQL connection: ${formatError(cleanupError)}`);
      });
    }
  }
}
