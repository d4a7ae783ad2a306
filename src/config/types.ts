export interface OutputDirs {
  raw: string;
  tables: string;
  manifests: string;
  exports: string;
}

/** Remote storage folder used for every report up to and including `through` (YYYY-MM). */
export interface FolderBucket {
  through: string;
  folder: string;
}

export interface AppConfig {
  baseUrl: string;
  domainBase: string;
  userAgent: string;
  ignoreHttpsErrors: boolean;
  downloadTimeoutMs: number;
  maxDownloadAttempts: number;
  retryDelayMs: number;
  startYear: number;
  startMonth: number;
  updateWindowMonths: number;
  urlOverridesPath: string;
  folderBuckets: FolderBucket[];
  defaultFolder: string;
  outputDirs: OutputDirs;
}

export type ConfigOverrides = Partial<Omit<AppConfig, "outputDirs">> & {
  outputDirs?: Partial<OutputDirs>;
};
