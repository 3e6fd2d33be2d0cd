import { hostname } from 'os';

export const BACKUP_FILE_SUFFIX = '.sql.gz';

/**
 * Render a backup file name from a pattern.
 *
 * Supported placeholders are `{db}`, `{date}` (YYYY-MM-DD), `{time}` (HH-MM-SS),
 * `{timestamp}` (epoch seconds) and `{hostname}`. Anything else in braces is
 * left as written. Date and time use the local timezone of the host.
 *
 * Call once per database with the instant that database starts processing.
 */
export function renderBackupName(pattern: string, databaseName: string, now: Date, host: string): string {
  const values: Record<string, string> = {
    db: databaseName,
    date: formatDate(now),
    time: formatTime(now),
    timestamp: String(Math.floor(now.getTime() / 1000)),
    hostname: host,
  };

  const rendered = pattern.replace(/\{(\w+)\}/g, (placeholder: string, name: string) =>
    Object.prototype.hasOwnProperty.call(values, name) ? values[name] : placeholder
  );

  return `${rendered}${BACKUP_FILE_SUFFIX}`;
}

/**
 * Storage prefix holding every artifact of one database, with a trailing slash
 */
export function buildDatabasePrefix(s3Path: string, databaseName: string): string {
  const normalizedPath = normalizeS3Path(s3Path);
  return normalizedPath ? `${normalizedPath}/${databaseName}/` : `${databaseName}/`;
}

export function buildArtifactKey(s3Path: string, databaseName: string, fileName: string): string {
  return `${buildDatabasePrefix(s3Path, databaseName)}${fileName}`;
}

/**
 * Strip leading and trailing slashes from the configured path prefix
 */
export function normalizeS3Path(s3Path: string): string {
  return s3Path.replace(/^\/+/, '').replace(/\/+$/, '');
}

/**
 * Host name without its domain part
 */
export function shortHostname(): string {
  return hostname().split('.')[0];
}

function formatDate(date: Date): string {
  const year = date.getFullYear();
  const month = String(date.getMonth() + 1).padStart(2, '0');
  const day = String(date.getDate()).padStart(2, '0');
  return `${year}-${month}-${day}`;
}

function formatTime(date: Date): string {
  const hours = String(date.getHours()).padStart(2, '0');
  const minutes = String(date.getMinutes()).padStart(2, '0');
  const seconds = String(date.getSeconds()).padStart(2, '0');
  return `${hours}-${minutes}-${seconds}`;
}
