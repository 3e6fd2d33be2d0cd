import { MySQLBackupApplication, parseArguments } from '../src/index';
import { createMockLogger } from './helpers/fakes';

describe('parseArguments', () => {
  it('should run once by default', () => {
    expect(parseArguments([])).toEqual({ schedule: false, runOnStart: false });
  });

  it('should read the schedule flags', () => {
    expect(parseArguments(['--schedule', '--run-on-start'])).toEqual({ schedule: true, runOnStart: true });
    expect(parseArguments(['--schedule'])).toEqual({ schedule: true, runOnStart: false });
  });
});

describe('MySQLBackupApplication', () => {
  let logger: ReturnType<typeof createMockLogger>;
  let app: MySQLBackupApplication;

  const env: NodeJS.ProcessEnv = {
    S3_BUCKET: 'test-bucket',
    MYSQL_PASSWORD: 'test-secret',
    AWS_ACCESS_KEY_ID: 'test-access-key',
    AWS_SECRET_ACCESS_KEY: 'test-secret-key',
  };

  beforeEach(() => {
    logger = createMockLogger();
    app = new MySQLBackupApplication(logger);
  });

  describe('initialize', () => {
    it('should fail on a configuration error', () => {
      expect(app.initialize({})).toBe(false);
      expect(logger.fatal).toHaveBeenCalledWith('Configuration error', expect.any(Error), { field: 'S3_BUCKET' });
    });

    it('should log the sanitized configuration', () => {
      expect(app.initialize(env)).toBe(true);

      const [loggedConfig] = logger.logConfigurationStart.mock.calls[0];
      expect(loggedConfig).toMatchObject({
        s3Bucket: 'test-bucket',
        mysqlPassword: '[REDACTED]',
        s3AccessKey: '[REDACTED]',
        s3SecretKey: '[REDACTED]',
      });
      expect(logger.warn).not.toHaveBeenCalled();
    });

    it('should warn about a naming pattern retention cannot order', () => {
      expect(app.initialize({ ...env, BACKUP_NAME_PATTERN: '{hostname}_{db}' })).toBe(true);

      expect(logger.warn).toHaveBeenCalledWith(
        'BACKUP_NAME_PATTERN has no {date} or {timestamp}; retention cannot tell older backups from newer ones'
      );
    });
  });

  it('should refuse to run before initialization', async () => {
    await expect(app.runOnce()).rejects.toThrow('Application not initialized. Call initialize() first.');
  });

  describe('shutdown', () => {
    it('should only shut down once', async () => {
      app.initialize(env);

      await app.shutdown();
      await app.shutdown();

      expect(logger.info).toHaveBeenCalledWith('MySQL S3 Backup Service shutdown completed');
      expect(logger.warn).toHaveBeenCalledWith('Shutdown already in progress');
    });
  });
});
