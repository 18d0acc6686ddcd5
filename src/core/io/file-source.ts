import * as fs from 'node:fs/promises'
import type { FileHandle } from 'node:fs/promises'

import { SourceError } from '../errors'
import type { SeekableSource } from './seekable-source'

// ─── FileSource ───────────────────────────────────────────────

/**
 * Seekable source backed by an open file handle.
 *
 * Design choices:
 *   - Every offset is `bigint`; 64-bit atom sizes can point far past
 *     `Number.MAX_SAFE_INTEGER` and seeking there must not lose precision.
 *   - Reads are positional (`FileHandle.read` with an explicit position), so
 *     the cursor lives here and `seek` never touches the OS.
 *   - A position beyond the end of the file reads as end-of-data.
 */
export class FileSource implements SeekableSource {
  private handle: FileHandle | null = null
  private filePath: string = ''
  private fileSize: bigint = 0n
  private position: bigint = 0n

  /**
   * Open a file and return a source positioned at offset 0.
   */
  static async open(path: string): Promise<FileSource> {
    const source = new FileSource()
    await source.open(path)
    return source
  }

  // ── Public Accessors ────────────────────────────────────

  /** Whether the source currently holds an open file handle. */
  get isOpen(): boolean {
    return this.handle !== null
  }

  /** Path of the currently opened file. */
  get path(): string {
    return this.filePath
  }

  /** Size of the opened file in bytes, as reported at open time. */
  get size(): bigint {
    return this.fileSize
  }

  // ── Lifecycle ───────────────────────────────────────────

  /**
   * @throws {SourceError} If the source is already open or the path
   *   cannot be opened for reading.
   */
  async open(path: string): Promise<void> {
    if (this.handle) {
      throw new SourceError(
        'Source is already open. Call close() before opening another file.',
        'ALREADY_OPEN'
      )
    }

    let handle: FileHandle | null = null
    try {
      handle = await fs.open(path, 'r')
      const stat = await handle.stat()

      this.handle = handle
      this.fileSize = BigInt(stat.size)
      this.filePath = path
      this.position = 0n
    } catch (err) {
      // Close-on-error failure would only hide the open error.
      if (handle) {
        await handle.close().catch(() => undefined)
      }

      throw new SourceError(
        `Failed to open "${path}": ${err instanceof Error ? err.message : String(err)}`,
        'SOURCE_OPEN_FAILED',
        err
      )
    }
  }

  /**
   * Close the underlying handle. Safe to call more than once.
   */
  async close(): Promise<void> {
    const handle = this.handle
    if (!handle) return

    this.handle = null
    this.filePath = ''
    this.fileSize = 0n
    this.position = 0n
    await handle.close()
  }

  // ── Cursor ──────────────────────────────────────────────

  tell(): bigint {
    return this.position
  }

  seek(position: bigint): void {
    if (position < 0n) {
      throw new RangeError(`Cannot seek to negative position ${position}`)
    }
    this.position = position
  }

  // ── Reading ─────────────────────────────────────────────

  /**
   * Read up to `length` bytes from the current position and advance it.
   *
   * @throws {SourceError} If the source is not open or the read fails.
   */
  async read(length: number): Promise<Buffer> {
    const handle = this.ensureOpen()

    if (length <= 0 || this.position >= this.fileSize) {
      return Buffer.alloc(0)
    }

    const wanted = Number(
      BigInt(length) < this.fileSize - this.position
        ? BigInt(length)
        : this.fileSize - this.position
    )
    const buffer = Buffer.alloc(wanted)
    let filled = 0

    try {
      // Short reads are legal; keep going until the window is full or EOF.
      while (filled < wanted) {
        const { bytesRead } = await handle.read(
          buffer,
          filled,
          wanted - filled,
          Number(this.position) + filled
        )
        if (bytesRead === 0) break
        filled += bytesRead
      }
    } catch (err) {
      throw new SourceError(
        `Failed to read "${this.filePath}" at offset ${this.position}: ${err instanceof Error ? err.message : String(err)}`,
        'SOURCE_READ_FAILED',
        err
      )
    }

    this.position += BigInt(filled)

    return filled === wanted ? buffer : buffer.subarray(0, filled)
  }

  // ── Private ─────────────────────────────────────────────

  private ensureOpen(): FileHandle {
    if (!this.handle) {
      throw new SourceError('FileSource is not open. Call open() first.', 'SOURCE_NOT_OPEN')
    }
    return this.handle
  }
}
