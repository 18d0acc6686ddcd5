/**
 * Cursor-based byte source used by the atom walker, the size resolver and
 * the carver.
 *
 * Implementations keep a read position like a regular file stream: `read`
 * starts at the position and advances it by the number of bytes returned.
 */
export interface SeekableSource {
  /** Current read position. */
  tell(): bigint
  /** Move the read position to an absolute offset. Seeking past the end is allowed. */
  seek(position: bigint): void
  /**
   * Read up to `length` bytes. Returns fewer only at end of data, and an
   * empty buffer once the position is at or past the end.
   */
  read(length: number): Promise<Buffer>
}

/**
 * In-memory source over a Buffer.
 */
export class BufferSource implements SeekableSource {
  private position = 0n

  constructor(private readonly data: Buffer) {}

  get size(): bigint {
    return BigInt(this.data.length)
  }

  tell(): bigint {
    return this.position
  }

  seek(position: bigint): void {
    if (position < 0n) {
      throw new RangeError(`Cannot seek to negative position ${position}`)
    }
    this.position = position
  }

  async read(length: number): Promise<Buffer> {
    if (length <= 0 || this.position >= this.size) {
      return Buffer.alloc(0)
    }

    const start = Number(this.position)
    const chunk = Buffer.from(this.data.subarray(start, start + length))
    this.position += BigInt(chunk.length)
    return chunk
  }
}
