/**
 * Coarse file classification derived from the extension.
 */
export type Category =
  | 'image'
  | 'video'
  | 'pdf'
  | 'docx'
  | 'xlsx'
  | 'pptx'
  | 'audio'
  | 'archive'
  | 'unknown';

/**
 * Collaborators a strategy can depend on. External binaries are found on
 * PATH; libraries are probed by importing them.
 */
export type Collaborator = 'exiftool' | 'ffmpeg' | 'sharp' | 'jszip' | 'pdf' | 'audio-tags';

/**
 * Availability snapshot taken once at startup and never re-probed.
 */
export type DependencyAvailability = Readonly<Record<Collaborator, boolean>>;

/**
 * Names of the cleaning strategies, as recorded in outcomes and reports.
 */
export type StrategyName = 'exiftool' | 'sharp' | 'ffmpeg' | 'pdf' | 'office' | 'audio-tags';

/**
 * How a file ended up (not) cleaned.
 *
 * `none` means strategies were attempted and all failed; `none_available`
 * means no strategy applied to the file at all.
 */
export type CleanMethod = 'none' | 'external_tool' | 'library' | 'none_available';

export type CleanOutcome =
  | {
      success: true;
      method: 'external_tool' | 'library';
      strategy: StrategyName;
      category: Category;
    }
  | {
      success: false;
      method: 'none' | 'none_available';
      category: Category;
    };

/**
 * Immutable snapshot of the run options.
 */
export interface RunConfig {
  /** Absolute root directory to clean. */
  readonly root: string;
  readonly dryRun: boolean;
  readonly backup: boolean;
  readonly reencodeVideos: boolean;
  readonly normalizeTime: boolean;
  readonly skipConfirm: boolean;
  readonly verbose: boolean;
  /** Directory names skipped in addition to the built-in exclusions. */
  readonly exclude: readonly string[];
  /** Where to write the JSON audit report, if anywhere. */
  readonly reportPath?: string;
  readonly color: boolean;
}

export type RunPhase =
  | 'init'
  | 'scanning'
  | 'dry-run-report'
  | 'confirming'
  | 'processing'
  | 'summarizing'
  | 'done';

/**
 * How a run ended. `interrupted` is only used when the interrupt arrived
 * before the summary could be produced.
 */
export type RunStatus = 'completed' | 'empty' | 'dry-run' | 'cancelled' | 'interrupted';

/**
 * Mutable aggregate owned by the orchestrator.
 */
export interface BatchStatistics {
  totalFiles: number;
  cleaned: number;
  failed: number;
  skipped: number;
  totalBytes: number;
  byCategory: Partial<Record<Category, number>>;
  byMethod: Partial<Record<StrategyName, number>>;
  /** Wall time in milliseconds, set when the run is summarized. */
  elapsedMs: number;
  backupDir: string | null;
}

/**
 * One file entry inside an `AuditReport`.
 */
export interface AuditEntry {
  /** Absolute path. */
  path: string;
  category: Category;
  success: boolean;
  /** `true` when the run stopped before this file was processed. */
  skipped: boolean;
  method?: CleanMethod;
  strategy?: StrategyName;
  /** Whether a backup copy was written before cleaning. */
  backedUp?: boolean;
  error?: string;
}

/**
 * Aggregate report written by `--report`, suitable for audit trails.
 */
export interface AuditReport {
  /** ISO 8601 timestamp of when the run started. */
  timestamp: string;
  root: string;
  status: RunStatus;
  totalFiles: number;
  cleaned: number;
  failed: number;
  skipped: number;
  totalBytes: number;
  byCategory: Partial<Record<Category, number>>;
  byMethod: Partial<Record<StrategyName, number>>;
  elapsedMs: number;
  backupDir: string | null;
  entries: AuditEntry[];
}

export interface BatchResult {
  status: RunStatus;
  stats: BatchStatistics;
  entries: AuditEntry[];
  exitCode: 0 | 1 | 130;
}
