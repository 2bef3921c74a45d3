export interface StorageConfig {
  local: boolean;
  repo_url: string;
  profile?: string;
}

export interface TrackingConfig {
  files: Record<string, string>;
}

export interface ConfsyncConfigFile {
  storage: StorageConfig;
  tracking: TrackingConfig;
}

export interface Layout {
  configDir: string;
  dataDir: string;
}

export interface HistoryEntry {
  timestamp: string | null;
  source: string;
  line: string;
}

export type ProgressListener = (percent: number) => void;

export type BackupStatus = "copied" | "unchanged";

export interface BackupResult {
  alias: string;
  status: BackupStatus;
  source: string;
  destination: string;
  bytes: number;
  entry: HistoryEntry | null;
}

export interface RestoreResult {
  alias: string;
  source: string;
  destination: string;
  bytes: number;
  overwritten: boolean;
  dryRun: boolean;
}

export type TrackedStatus = "ok" | "modified" | "pending" | "missing";

export interface StatusEntry {
  alias: string;
  path: string;
  status: TrackedStatus;
  reason?: string;
}

export type DiagnosticLevel = "info" | "warn" | "error";

export interface DiagnosticEvent {
  level: DiagnosticLevel;
  action: string;
  message: string;
  profile?: string;
}
