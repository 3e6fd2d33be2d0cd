export interface MySQLClient {
  testConnection(): Promise<boolean>;

  /** Database names on the server, excluding system schemas */
  listDatabases(): Promise<string[]>;

  /** Verify that mysqldump can run and detect the flags it supports */
  checkDumpTool(): Promise<DumpToolInfo>;

  /** Dump one database through gzip into outputPath */
  createBackup(databaseName: string, outputPath: string): Promise<BackupInfo>;
}

export interface DumpToolInfo {
  supportsGtidPurged: boolean;
}

export interface BackupInfo {
  filePath: string;
  fileSize: number;
  databaseName: string;
  timestamp: Date;
}
