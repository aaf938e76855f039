/**
 * tagsweep - directory-wide metadata stripping
 *
 * Walks a directory tree, classifies every file by extension and strips its
 * embedded metadata in place with the first applicable strategy (exiftool,
 * sharp, ffmpeg, or the built-in PDF, Office and audio rewriters).
 *
 * @packageDocumentation
 */

// Main API
export { runBatch, resolveRoot, CONFIRM_QUESTION } from './operations/batch.js';
export type { BatchHooks } from './operations/batch.js';
export { createRunContext } from './context.js';
export type { RunContext, ContextOptions } from './context.js';
export { parseArgs, buildConfig } from './config.js';
export type { CliArgs } from './config.js';

// Building blocks
export { classify, CATEGORIES, FILE_CATEGORIES } from './detect.js';
export { walkFiles, collectFiles, DEFAULT_EXCLUDED_DIRS } from './operations/walk.js';
export type { WalkOptions } from './operations/walk.js';
export { backupFile, backupPathFor } from './operations/backup.js';
export { normalizeTimestamps } from './operations/timestamps.js';
export { replaceAtomically, discardPendingTemps } from './operations/atomic.js';
export { createDispatchPolicy, buildRules } from './operations/dispatch.js';
export type { DispatchPolicy, DispatchRule, RuleMode } from './operations/dispatch.js';
export {
  createStatistics,
  recordOutcome,
  recordFailure,
  recordSkipped,
  renderSummary,
  buildAuditReport,
} from './operations/stats.js';
export { probeAvailability } from './availability.js';
export { createStrategies } from './strategies/index.js';
export type { CleaningStrategy, StrategyDeps, StrategySet } from './strategies/index.js';
export { Logger } from './logger.js';
export type { LogLevel, LoggerOptions, LogSink } from './logger.js';
export { runCommand, findExecutable } from './process.js';
export type { CommandRunner, CommandResult } from './process.js';

// Types
export type {
  Category,
  Collaborator,
  CleanMethod,
  CleanOutcome,
  DependencyAvailability,
  RunConfig,
  RunStatus,
  StrategyName,
  BatchStatistics,
  BatchResult,
  AuditEntry,
  AuditReport,
} from './types.js';

// Error classes
export {
  TagsweepError,
  InvalidRootError,
  CollaboratorFailureError,
  IOFailureError,
  CorruptedFileError,
  UsageError,
} from './errors.js';

// Built-in rewriters for advanced usage
export { stripPdfMetadata } from './formats/pdf.js';
export { stripAudioTags } from './formats/audio.js';
export { cleanCoreProperties, cleanAppProperties } from './formats/office.js';
