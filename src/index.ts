/**
 * Library entry: atom walking, size resolution and crash-safe carving of
 * CR3 / ISO-BMFF containers.
 *
 * The CLI in `main/` is a thin layer over these exports.
 */

// --- Atom walking & sizing ---
export { walkAtoms, formatTag } from './core/carving/atom-walker'
export type { WalkOptions } from './core/carving/atom-walker'
export { resolveSize } from './core/carving/size-resolver'
export type { ResolveOptions } from './core/carving/size-resolver'

// --- Sources & carving ---
export { BufferSource } from './core/io/seekable-source'
export type { SeekableSource } from './core/io/seekable-source'
export { FileSource } from './core/io/file-source'
export { FileCarver } from './core/io/file-carver'
export type { CarveOptions } from './core/io/file-carver'

// --- Batch ---
export { BatchRecovery } from './main/services/batch-recovery'
export { runCli, parseCliArgs, UsageError } from './main/cli'

// --- Logging & errors ---
export { createConsoleLogger, silentLogger, formatLogLine, formatBytes } from './core/logging/logger'
export type { Logger, LogLevel, LogSink, ConsoleLoggerOptions } from './core/logging/logger'
export {
  CarveError,
  StructuralError,
  IncompleteCopyError,
  FilesystemError,
  CopyFailedError,
  DestinationExistsError,
  SourceError,
  BatchSetupError
} from './core/errors'

// --- Constants & types ---
export {
  FTYP_TAG,
  DEFAULT_TERMINATION_TAG,
  COPY_CHUNK_SIZE,
  TEMP_SUFFIX
} from './shared/constants/atoms'
export type {
  Atom,
  Endianness,
  ResolveResult,
  ResolveFailureReason,
  CarveResult,
  BatchConfig,
  BatchSummary,
  FileReport,
  FileStatus
} from './shared/types'
