import { parseArgs } from 'util'

import type { BatchConfig, BatchSummary, Endianness } from '../shared/types'
import { TAG_LENGTH } from '../shared/constants/atoms'
import { BatchSetupError, errorMessage } from '../core/errors'
import { createConsoleLogger, formatBytes } from '../core/logging/logger'
import type { LogSink, Logger } from '../core/logging/logger'
import { BatchRecovery } from './services/batch-recovery'

// ─── Usage ──────────────────────────────────────────────────

export const USAGE = `Usage:
  cr3-carve --input-dir <dir> --output-dir <dir> [--lastchunk <name>] [--endianness big|little] [-v]

Carves CR3 files to their true size by walking their atoms and copying
exactly the bytes up to and including the last chunk.

Options:
  --input-dir      Directory containing the files to fix (required)
  --output-dir     Directory for fixed files; created if missing (required)
  --lastchunk      Name of the last chunk to include [default 'mdat']
  --endianness     Byte order of atom size fields [default 'big']
  -v, --verbose    Enable verbose (DEBUG) logging
  -h, --help       Show this help`

export class UsageError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'UsageError'
  }
}

export type CliCommand = { kind: 'help' } | { kind: 'run'; config: BatchConfig }

function readFlags(argv: string[]) {
  return parseArgs({
    args: argv,
    options: {
      'input-dir': { type: 'string' },
      'output-dir': { type: 'string' },
      lastchunk: { type: 'string', default: 'mdat' },
      endianness: { type: 'string', default: 'big' },
      verbose: { type: 'boolean', short: 'v', default: false },
      help: { type: 'boolean', short: 'h', default: false }
    },
    strict: true,
    allowPositionals: false
  })
}

/**
 * Turn argv (without the node and script entries) into a command.
 *
 * @throws {UsageError} On unknown flags or invalid values.
 */
export function parseCliArgs(argv: string[]): CliCommand {
  let flags: ReturnType<typeof readFlags>
  try {
    flags = readFlags(argv)
  } catch (err) {
    throw new UsageError(errorMessage(err))
  }
  const { values } = flags

  if (values.help) return { kind: 'help' }

  const inputDir = values['input-dir']
  const outputDir = values['output-dir']
  if (!inputDir) throw new UsageError('--input-dir is required')
  if (!outputDir) throw new UsageError('--output-dir is required')

  const lastchunk = values.lastchunk ?? 'mdat'
  if (lastchunk.length === 0) {
    throw new UsageError('--lastchunk must not be empty')
  }
  // Tags are compared byte for byte, so anything but four single-byte characters never matches.
  if (lastchunk.length !== TAG_LENGTH || /[^\x00-\xff]/.test(lastchunk)) {
    throw new UsageError(`--lastchunk must be exactly ${TAG_LENGTH} characters, got '${lastchunk}'`)
  }
  const terminationTag = Buffer.from(lastchunk, 'latin1')

  const endianness = values.endianness ?? 'big'
  if (!isEndianness(endianness)) {
    throw new UsageError(`--endianness must be 'big' or 'little', got '${endianness}'`)
  }

  return {
    kind: 'run',
    config: {
      inputDir,
      outputDir,
      terminationTag,
      endianness,
      verbose: values.verbose ?? false
    }
  }
}

function isEndianness(value: string): value is Endianness {
  return value === 'big' || value === 'little'
}

// ─── Run ────────────────────────────────────────────────────

export interface CliIO {
  sink: LogSink
  /** Builds the logger once verbosity is known. */
  createLogger?: (verbose: boolean) => Logger
}

/**
 * Run the tool and return the process exit code.
 *
 * 0 once the batch has run (per-file failures are reported, not fatal),
 * 1 on usage or setup errors.
 */
export async function runCli(argv: string[], io: CliIO = { sink: console }): Promise<number> {
  let command: CliCommand
  try {
    command = parseCliArgs(argv)
  } catch (err) {
    io.sink.error(`error: ${errorMessage(err)}\n(use --help for usage)`)
    return 1
  }

  if (command.kind === 'help') {
    io.sink.log(USAGE)
    return 0
  }

  const { config } = command
  const verbose = config.verbose ?? false
  const logger = io.createLogger
    ? io.createLogger(verbose)
    : createConsoleLogger({ level: verbose ? 'debug' : 'info', sink: io.sink })

  logger.info('--- CR3 File Fixer Initialized (Batch Mode) ---')

  let summary: BatchSummary
  try {
    summary = await new BatchRecovery(logger).run(config)
  } catch (err) {
    if (err instanceof BatchSetupError) {
      logger.critical(err.message)
      return 1
    }
    throw err
  }

  logger.info(
    `Processed ${summary.processed} file(s): ${summary.carved} saved, ` +
      `${summary.skipped} skipped, ${summary.failed} failed, ${formatBytes(summary.bytesWritten)} B written`
  )
  logger.info('--- CR3 File Fixer Complete ---')
  return 0
}
