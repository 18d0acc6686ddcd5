/**
 * BatchRecovery - Carves every file of an input directory into an output
 * directory.
 *
 * Each regular file is paired with `<outputDir>/<basename>`. Files whose
 * output already exists are skipped, never overwritten. Every per-file
 * failure is recorded in the report and the batch moves on; only setup
 * failures (input missing, output not writable) stop it before any file is
 * touched.
 */

import { EventEmitter } from 'events'
import * as fs from 'fs/promises'
import * as path from 'path'
import { v4 as uuidv4 } from 'uuid'

import type { BatchConfig, BatchSummary, FileReport } from '../../shared/types'
import { DEFAULT_TERMINATION_TAG } from '../../shared/constants/atoms'
import { formatTag } from '../../core/carving/atom-walker'
import { resolveSize } from '../../core/carving/size-resolver'
import { FileCarver } from '../../core/io/file-carver'
import { FileSource } from '../../core/io/file-source'
import {
  BatchSetupError,
  CopyFailedError,
  DestinationExistsError,
  FilesystemError,
  IncompleteCopyError,
  StructuralError,
  errorMessage
} from '../../core/errors'
import { silentLogger } from '../../core/logging/logger'
import type { Logger } from '../../core/logging/logger'

/**
 * Emits:
 *   - 'file'     (report: FileReport) after each regular file
 *   - 'complete' (summary: BatchSummary) once the directory is done
 */
export class BatchRecovery extends EventEmitter {
  private readonly logger: Logger
  private readonly carver: FileCarver

  constructor(logger: Logger = silentLogger, carver: FileCarver = new FileCarver()) {
    super()
    this.logger = logger
    this.carver = carver
  }

  /**
   * Process every entry of `config.inputDir`.
   *
   * @returns Summary of the batch, one report per regular file.
   * @throws {BatchSetupError} If the directories are unusable.
   */
  async run(config: BatchConfig): Promise<BatchSummary> {
    await this.prepare(config)

    const sessionId = uuidv4()
    const reports: FileReport[] = []

    this.logger.info(`Analyzing files in input directory: ${config.inputDir} (session ${sessionId})`)

    const entries = await fs.readdir(config.inputDir, { withFileTypes: true })
    entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0))

    for (const entry of entries) {
      if (!entry.isFile()) {
        this.logger.debug(`Skipping non-file object: ${entry.name}`)
        continue
      }

      const report = await this.processFile(
        path.join(config.inputDir, entry.name),
        path.join(config.outputDir, entry.name),
        config
      )
      reports.push(report)
      this.emit('file', report)
    }

    const summary: BatchSummary = {
      sessionId,
      processed: reports.length,
      carved: reports.filter((r) => r.status === 'carved').length,
      skipped: reports.filter((r) => r.status === 'skipped-existing').length,
      failed: reports.filter((r) => r.status !== 'carved' && r.status !== 'skipped-existing').length,
      bytesWritten: reports.reduce((sum, r) => sum + r.bytesWritten, 0n),
      reports
    }

    this.logger.info(`Batch processing complete. ${summary.carved} files successfully saved.`)
    this.emit('complete', summary)
    return summary
  }

  /**
   * Resolve and carve a single input. Never throws.
   */
  async processFile(inputPath: string, outputPath: string, config: BatchConfig): Promise<FileReport> {
    const name = path.basename(inputPath)
    const report: FileReport = {
      inputPath,
      outputPath,
      status: 'carved',
      size: 0n,
      bytesWritten: 0n
    }

    if (await this.exists(outputPath)) {
      this.logger.warn(`Output file already exists: ${path.basename(outputPath)}. Skipping.`)
      return { ...report, status: 'skipped-existing' }
    }

    this.logger.info(`--- Processing ${name} ---`)

    let source: FileSource | null = null
    try {
      source = await FileSource.open(inputPath)

      const startOffset = 0n
      source.seek(startOffset)

      const resolved = await resolveSize(source, {
        terminationTag: config.terminationTag ?? DEFAULT_TERMINATION_TAG,
        endianness: config.endianness,
        logger: this.logger
      })
      report.size = resolved.size

      if (resolved.size === 0n) {
        throw new StructuralError(inputPath, resolved.reason ?? 'termination-not-found')
      }

      const result = await this.carver.carve(source, outputPath, startOffset, resolved.size, {
        chunkSize: config.chunkSize,
        logger: this.logger
      })
      report.bytesWritten = result.bytesWritten
      return report
    } catch (err) {
      return this.classify(report, err, config)
    } finally {
      if (source) {
        await source.close().catch((err: unknown) => {
          this.logger.warn(`Could not close ${name}: ${errorMessage(err)}`)
        })
      }
    }
  }

  // ─── Private ──────────────────────────────────────────────────

  /**
   * Map a per-file failure onto its report status and log it.
   */
  private classify(report: FileReport, err: unknown, config: BatchConfig): FileReport {
    const name = path.basename(report.inputPath)
    const error = errorMessage(err)

    if (err instanceof StructuralError) {
      this.logger.error(
        `Failed to determine a valid CR3 structure and size for ${name}. File not saved.`
      )
      return { ...report, status: 'invalid-structure', error }
    }

    if (err instanceof IncompleteCopyError) {
      return { ...report, status: 'incomplete-copy', bytesWritten: err.bytesWritten, error }
    }

    if (err instanceof DestinationExistsError) {
      return { ...report, status: 'skipped-existing' }
    }

    if (err instanceof CopyFailedError) {
      this.logger.error(error)
      return { ...report, status: 'io-error', bytesWritten: err.bytesWritten, error }
    }

    if (err instanceof FilesystemError) {
      this.logger.error(error)
      return { ...report, status: 'io-error', error }
    }

    const detail = config.verbose && err instanceof Error && err.stack ? `\n${err.stack}` : ''
    this.logger.critical(`An unexpected error occurred during processing ${name}: ${error}${detail}`)
    return { ...report, status: 'io-error', error }
  }

  /**
   * Validate the input directory and make sure the output directory exists
   * and is writable.
   */
  private async prepare(config: BatchConfig): Promise<void> {
    try {
      const stat = await fs.stat(config.inputDir)
      if (!stat.isDirectory()) {
        throw new BatchSetupError(`Input path must be an existing directory: ${config.inputDir}`)
      }
    } catch (err) {
      if (err instanceof BatchSetupError) throw err
      throw new BatchSetupError(`Input path must be an existing directory: ${config.inputDir}`, err)
    }

    try {
      await fs.mkdir(config.outputDir, { recursive: true })
      await fs.access(config.outputDir, fs.constants.W_OK)
    } catch (err) {
      throw new BatchSetupError(
        `Could not create output directory ${config.outputDir}: ${errorMessage(err)}`,
        err
      )
    }

    this.logger.debug(
      `Termination atom '${formatTag(config.terminationTag ?? DEFAULT_TERMINATION_TAG)}', ` +
        `${config.endianness ?? 'big'}-endian size fields`
    )
  }

  private async exists(filePath: string): Promise<boolean> {
    try {
      await fs.access(filePath)
      return true
    } catch {
      return false
    }
  }
}
