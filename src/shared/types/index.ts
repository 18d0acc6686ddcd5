import type { Endianness } from '../constants/atoms'

export type { Endianness }

// ─── Atom Types ───────────────────────────────────────────────

/** One top-level box header as seen by the walker. */
export interface Atom {
  /** Absolute position of the header within the source. */
  offset: bigint
  /** Raw 4-byte box type. Compare with `Buffer.equals`, never as text. */
  tag: Buffer
  /** Header plus payload; the distance to the next atom. */
  size: bigint
}

// ─── Resolver Types ───────────────────────────────────────────

export type ResolveFailureReason = 'invalid-start-atom' | 'termination-not-found'

export interface ResolveResult {
  /** Logical file length, or 0 when the structure could not be resolved. */
  size: bigint
  valid: boolean
  /** Which rule rejected the source. Diagnostic only; `size` is the signal. */
  reason?: ResolveFailureReason
}

// ─── Carve Types ──────────────────────────────────────────────

export interface CarveResult {
  destinationPath: string
  bytesWritten: bigint
}

// ─── Batch Types ──────────────────────────────────────────────

export interface BatchConfig {
  inputDir: string
  outputDir: string
  /** Tag of the last atom included in the output. Default: `mdat`. */
  terminationTag?: Buffer
  endianness?: Endianness
  /** Log at debug level and include stack traces of unexpected errors. */
  verbose?: boolean
  /** Copy buffer size in bytes. */
  chunkSize?: number
}

export type FileStatus =
  | 'carved'
  | 'skipped-existing'
  | 'invalid-structure'
  | 'incomplete-copy'
  | 'io-error'

export interface FileReport {
  inputPath: string
  outputPath: string
  status: FileStatus
  /** Logical size found by the resolver (0 when unresolved). */
  size: bigint
  bytesWritten: bigint
  error?: string
}

export interface BatchSummary {
  sessionId: string
  /** Regular files looked at (excludes directories and other entries). */
  processed: number
  carved: number
  skipped: number
  failed: number
  bytesWritten: bigint
  reports: FileReport[]
}
