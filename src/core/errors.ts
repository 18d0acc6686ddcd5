import type { ResolveFailureReason } from '../shared/types'

// ─── Error Types ──────────────────────────────────────────────

export class CarveError extends Error {
  public readonly code: string
  public override readonly cause?: unknown

  constructor(message: string, code: string, cause?: unknown) {
    super(message)
    this.name = 'CarveError'
    this.code = code
    this.cause = cause
  }
}

/**
 * The source does not start with `ftyp`, or it ran out of headers before
 * the termination atom.
 */
export class StructuralError extends CarveError {
  constructor(
    public readonly sourcePath: string,
    public readonly reason: ResolveFailureReason
  ) {
    super(
      reason === 'invalid-start-atom'
        ? `"${sourcePath}" does not start with an ftyp atom.`
        : `"${sourcePath}" ended before the termination atom was reached.`,
      'STRUCTURE_INVALID'
    )
    this.name = 'StructuralError'
  }
}

/** The source yielded fewer bytes than the resolved size. */
export class IncompleteCopyError extends CarveError {
  constructor(
    public readonly destinationPath: string,
    public readonly bytesWritten: bigint,
    public readonly expectedBytes: bigint
  ) {
    super(
      `Incomplete save for "${destinationPath}": wrote ${bytesWritten} of ${expectedBytes} bytes.`,
      'INCOMPLETE_COPY'
    )
    this.name = 'IncompleteCopyError'
  }
}

export class FilesystemError extends CarveError {
  constructor(message: string, cause?: unknown, code = 'FILESYSTEM') {
    super(message, code, cause)
    this.name = 'FilesystemError'
  }
}

/** An I/O step of a carve failed after `bytesWritten` bytes reached the temp file. */
export class CopyFailedError extends FilesystemError {
  constructor(
    message: string,
    public readonly destinationPath: string,
    public readonly bytesWritten: bigint,
    cause?: unknown
  ) {
    super(message, cause, 'COPY_FAILED')
    this.name = 'CopyFailedError'
  }
}

export class DestinationExistsError extends FilesystemError {
  constructor(public readonly destinationPath: string) {
    super(`"${destinationPath}" already exists.`, undefined, 'DESTINATION_EXISTS')
    this.name = 'DestinationExistsError'
  }
}

export class SourceError extends CarveError {
  constructor(message: string, code: string, cause?: unknown) {
    super(message, code, cause)
    this.name = 'SourceError'
  }
}

/** Raised before any per-file work; the only error that stops a batch. */
export class BatchSetupError extends CarveError {
  constructor(message: string, cause?: unknown) {
    super(message, 'SETUP_FAILED', cause)
    this.name = 'BatchSetupError'
  }
}

/** Render an unknown thrown value as a message. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}
