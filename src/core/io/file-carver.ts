import * as fs from 'node:fs/promises'
import * as path from 'node:path'

import type { CarveResult } from '../../shared/types'
import { COPY_CHUNK_SIZE, TEMP_SUFFIX } from '../../shared/constants/atoms'
import {
  CarveError,
  CopyFailedError,
  DestinationExistsError,
  FilesystemError,
  IncompleteCopyError,
  errorMessage
} from '../errors'
import { formatBytes, silentLogger } from '../logging/logger'
import type { Logger } from '../logging/logger'
import type { SeekableSource } from './seekable-source'

// ─── Types ────────────────────────────────────────────────────

export interface CarveOptions {
  /** Size of each read from the source. Default: 8 MB. */
  chunkSize?: number
  /** Suffix of the in-progress file next to the destination. Default: '.tmp'. */
  tempSuffix?: string
  logger?: Logger
}

// ─── Helpers ──────────────────────────────────────────────────

/**
 * Check whether a file already exists at the given path.
 */
async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath)
    return true
  } catch {
    return false
  }
}

// ─── FileCarver ───────────────────────────────────────────────

/**
 * Copies a byte window of a source into a new file.
 *
 * Safety features:
 *   - Data lands in `<destination>.tmp` (created exclusively) and is renamed
 *     onto the destination only once every byte is written. The rename is
 *     the single commit point.
 *   - Any failure before the rename removes the temp file, so the
 *     destination is either absent or complete.
 *   - Memory use is bounded by the chunk size, not by the carved size.
 */
export class FileCarver {
  constructor(private readonly defaults: CarveOptions = {}) {}

  /**
   * Copy `size` bytes starting at `sourceOffset` to `destinationPath`.
   *
   * @throws {DestinationExistsError} If the destination is already present.
   * @throws {IncompleteCopyError}    If the source ends before `size` bytes.
   * @throws {FilesystemError}        If the temp file cannot be created.
   * @throws {CopyFailedError}        On a read, write, close or rename failure,
   *   with the bytes written before it.
   */
  async carve(
    source: SeekableSource,
    destinationPath: string,
    sourceOffset: bigint,
    size: bigint,
    options: CarveOptions = {}
  ): Promise<CarveResult> {
    const chunkSize = options.chunkSize ?? this.defaults.chunkSize ?? COPY_CHUNK_SIZE
    const tempSuffix = options.tempSuffix ?? this.defaults.tempSuffix ?? TEMP_SUFFIX
    const logger = options.logger ?? this.defaults.logger ?? silentLogger

    if (size <= 0n || sourceOffset < 0n) {
      throw new CarveError(
        `Invalid carve range: offset ${sourceOffset}, size ${size}.`,
        'INVALID_RANGE'
      )
    }
    if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
      throw new CarveError(`Invalid chunk size: ${chunkSize}.`, 'INVALID_RANGE')
    }

    const name = path.basename(destinationPath)

    if (await fileExists(destinationPath)) {
      logger.warn(`${name} already exists: skipping save attempt.`)
      throw new DestinationExistsError(destinationPath)
    }

    source.seek(sourceOffset)
    logger.info(`Saving ${name}, calculated size ${formatBytes(size)} B`)

    const tempPath = destinationPath + tempSuffix
    let remaining = size

    // Exclusive create: a leftover temp file belongs to someone else.
    let handle: fs.FileHandle
    try {
      handle = await fs.open(tempPath, 'wx')
    } catch (err) {
      throw new FilesystemError(`Cannot create temporary file for ${name}: ${errorMessage(err)}`, err)
    }

    try {
      let copyFailure: { cause: unknown } | null = null
      try {
        while (remaining > 0n) {
          const toRead = Number(remaining < BigInt(chunkSize) ? remaining : BigInt(chunkSize))
          const chunk = await source.read(toRead)

          if (chunk.length === 0) {
            logger.error(`Premature EOF encountered while reading ${formatBytes(size)} B for ${name}`)
            break
          }

          await handle.write(chunk, 0, chunk.length)
          remaining -= BigInt(chunk.length)
        }
      } catch (err) {
        copyFailure = { cause: err }
      }

      try {
        await handle.close()
      } catch (err) {
        if (!copyFailure) throw err
        // The copy error is the one reported.
        logger.error(`Could not close temporary file for ${name}: ${errorMessage(err)}`)
      }
      if (copyFailure) throw copyFailure.cause

      if (remaining === 0n) {
        await fs.rename(tempPath, destinationPath)
      }
    } catch (err) {
      await this.discardTemp(tempPath, logger)
      throw new CopyFailedError(
        `Error restoring file ${name}: ${errorMessage(err)}`,
        destinationPath,
        size - remaining,
        err
      )
    }

    const bytesWritten = size - remaining

    if (remaining > 0n) {
      logger.error(`Incomplete save for ${name}. Saved only ${formatBytes(bytesWritten)} bytes.`)
      await this.discardTemp(tempPath, logger)
      throw new IncompleteCopyError(destinationPath, bytesWritten, size)
    }

    logger.info(`[SUCCESS] File successfully fixed and saved to ${name}`)
    return { destinationPath, bytesWritten }
  }

  // ── Private ─────────────────────────────────────────────

  /**
   * Remove a temp file. Failures are logged and never replace the error
   * that led here.
   */
  private async discardTemp(tempPath: string, logger: Logger): Promise<void> {
    try {
      await fs.rm(tempPath, { force: true })
    } catch (err) {
      logger.error(`Could not remove temporary file ${path.basename(tempPath)}: ${errorMessage(err)}`)
    }
  }
}
