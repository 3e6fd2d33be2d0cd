#!/usr/bin/env node
import { ConfigurationManager, ConfigurationError } from './config/ConfigurationManager';
import { Logger } from './clients/Logger';
import { BackupManager, exitCodeFor } from './clients/BackupManager';
import { CronScheduler } from './clients/CronScheduler';
import { MySQLClient } from './clients/MySQLClient';
import { S3Client } from './clients/S3Client';
import { RetentionManager } from './clients/RetentionManager';
import { FileRunLock } from './clients/RunLock';
import { NotificationClient } from './clients/NotificationClient';
import { BackupConfig } from './interfaces/BackupConfig';
import { Logger as ILogger } from './interfaces/Logger';
import { toError } from './utils/errors';

export interface ApplicationOptions {
  /** Keep running and back up every BACKUP_INTERVAL_HOURS instead of once */
  schedule: boolean;
  /** In schedule mode, also run one backup immediately */
  runOnStart: boolean;
}

export function parseArguments(argv: readonly string[]): ApplicationOptions {
  return {
    schedule: argv.includes('--schedule'),
    runOnStart: argv.includes('--run-on-start'),
  };
}

/**
 * Main application class that initializes and coordinates all components
 */
class MySQLBackupApplication {
  private logger: ILogger;
  private backupManager: BackupManager | null = null;
  private cronScheduler: CronScheduler | null = null;
  private backupIntervalHours = 0;
  private isShuttingDown = false;
  private readonly hasInjectedLogger: boolean;

  constructor(logger?: ILogger) {
    // Without an injected logger, reconfigured once the configuration is loaded
    this.logger = logger ?? Logger.createFromEnvironment();
    this.hasInjectedLogger = logger !== undefined;
  }

  /**
   * Load configuration and wire up components. Returns false on configuration errors.
   */
  initialize(env: NodeJS.ProcessEnv = process.env): boolean {
    let config: BackupConfig;
    try {
      config = ConfigurationManager.loadConfiguration(env);
    } catch (error) {
      if (error instanceof ConfigurationError) {
        this.logger.fatal('Configuration error', error, { field: error.field });
        return false;
      }
      throw error;
    }

    if (!this.hasInjectedLogger) {
      this.logger = new Logger({ level: config.logLevel, logFile: config.logFile });
    }
    this.logger.logConfigurationStart(ConfigurationManager.sanitizeForLogging(config));

    if (!ConfigurationManager.hasSortableNamePattern(config.backupNamePattern)) {
      this.logger.warn(
        'BACKUP_NAME_PATTERN has no {date} or {timestamp}; retention cannot tell older backups from newer ones'
      );
    }

    const mysqlClient = new MySQLClient(config, this.logger);
    const s3Client = new S3Client(config, this.logger);
    const retentionManager = new RetentionManager(s3Client, config, this.logger);

    this.backupIntervalHours = config.backupIntervalHours;
    this.backupManager = new BackupManager(config, {
      mysqlClient,
      s3Client,
      retentionManager,
      runLock: new FileRunLock(config.lockFile, this.logger),
      notifier: new NotificationClient(config.notifyWebhookUrl, config.notifyType, this.logger),
      logger: this.logger,
    });

    return true;
  }

  /**
   * Run a single backup cycle and return the process exit code
   */
  async runOnce(): Promise<number> {
    const backupManager = this.requireBackupManager();
    const report = await backupManager.executeBackup();
    return exitCodeFor(report);
  }

  /**
   * Validate connectivity and start scheduled backups
   */
  async startScheduler(runOnStart: boolean): Promise<boolean> {
    const backupManager = this.requireBackupManager();

    this.logger.info('Validating configuration and testing connections...');
    if (!(await backupManager.validateConfiguration())) {
      this.logger.fatal('Configuration validation failed');
      return false;
    }

    this.cronScheduler = new CronScheduler(
      { intervalHours: this.backupIntervalHours, timezone: 'UTC', runOnInit: runOnStart },
      backupManager,
      this.logger
    );
    this.cronScheduler.start();
    this.logger.info('Service is now running and will execute backups according to the configured schedule');
    return true;
  }

  /**
   * Stop scheduling and release anything a run in progress holds
   */
  async shutdown(): Promise<void> {
    if (this.isShuttingDown) {
      this.logger.warn('Shutdown already in progress');
      return;
    }

    this.isShuttingDown = true;
    this.logger.info('Initiating graceful shutdown...');

    if (this.cronScheduler?.isRunning()) {
      this.cronScheduler.stop();
    }

    await this.backupManager?.abort();
    this.logger.info('MySQL S3 Backup Service shutdown completed');
  }

  /**
   * Setup signal handlers for graceful shutdown
   */
  setupSignalHandlers(): void {
    const signals = ['SIGTERM', 'SIGINT', 'SIGHUP'] as const;

    signals.forEach(signal => {
      process.on(signal, () => {
        this.logger.warn(`Received ${signal}, initiating graceful shutdown...`);
        void this.shutdown()
          .catch(error => this.logger.error('Error during shutdown', toError(error)))
          .finally(() => process.exit(signal === 'SIGTERM' || signal === 'SIGHUP' ? 143 : 130));
      });
    });

    process.on('uncaughtException', error => {
      this.logger.fatal('Uncaught exception', error);
      void this.shutdown().finally(() => process.exit(1));
    });

    process.on('unhandledRejection', reason => {
      this.logger.fatal('Unhandled promise rejection', toError(reason));
      void this.shutdown().finally(() => process.exit(1));
    });
  }

  private requireBackupManager(): BackupManager {
    if (!this.backupManager) {
      throw new Error('Application not initialized. Call initialize() first.');
    }
    return this.backupManager;
  }
}

/**
 * Main application entry point
 */
async function main(argv: readonly string[] = process.argv.slice(2)): Promise<number> {
  const options = parseArguments(argv);
  const app = new MySQLBackupApplication();

  app.setupSignalHandlers();

  if (!app.initialize()) {
    return 1;
  }

  if (!options.schedule) {
    return app.runOnce();
  }

  if (!(await app.startScheduler(options.runOnStart))) {
    return 1;
  }

  // Keep the process running
  process.stdin.resume();
  return 0;
}

// Export for testing
export { MySQLBackupApplication, main };

// Start the application
if (require.main === module) {
  main()
    .then(code => {
      process.exitCode = code;
    })
    .catch(error => {
      console.error('Fatal error starting application:', error);
      process.exit(1);
    });
}
