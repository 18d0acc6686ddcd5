/**
 * Top-level atom (box) walker for CR3 / ISO-BMFF containers.
 *
 * Each atom starts with a 4-byte size followed by a 4-byte tag. A size of 1
 * means an 8-byte extended size follows the tag. The size always counts the
 * header itself, so `offset + size` is the next header.
 *
 * Strategy:
 *   1. Read the header at the current position.
 *   2. Yield it without looking at the payload.
 *   3. Seek absolutely to `offset + size` and repeat.
 *
 * The walk ends quietly on a short header read or a zero size; truncation is
 * not an error at this level.
 */

import type { Atom, Endianness } from '../../shared/types'
import {
  DEFAULT_ENDIANNESS,
  EXTENDED_SIZE_LENGTH,
  EXTENDED_SIZE_SENTINEL,
  TAG_LENGTH
} from '../../shared/constants/atoms'
import type { SeekableSource } from '../io/seekable-source'

export interface WalkOptions {
  /** Byte order of the size fields. Default: 'big'. */
  endianness?: Endianness
}

function readSize32(buf: Buffer, endianness: Endianness): bigint {
  return BigInt(endianness === 'big' ? buf.readUInt32BE(0) : buf.readUInt32LE(0))
}

function readSize64(buf: Buffer, endianness: Endianness): bigint {
  return endianness === 'big' ? buf.readBigUInt64BE(0) : buf.readBigUInt64LE(0)
}

/**
 * Lazily walk atoms starting at the source's current position.
 *
 * The source position is moved as a side effect; where it ends up after the
 * last atom is unspecified.
 */
export async function* walkAtoms(
  source: SeekableSource,
  options: WalkOptions = {}
): AsyncGenerator<Atom, void, undefined> {
  const endianness = options.endianness ?? DEFAULT_ENDIANNESS

  while (true) {
    const offset = source.tell()

    const sizeField = await source.read(4)
    if (sizeField.length < 4) return

    const tag = await source.read(TAG_LENGTH)
    if (tag.length < TAG_LENGTH) return

    let size = readSize32(sizeField, endianness)

    if (size === EXTENDED_SIZE_SENTINEL) {
      const extended = await source.read(EXTENDED_SIZE_LENGTH)
      if (extended.length < EXTENDED_SIZE_LENGTH) return
      size = readSize64(extended, endianness)
    }

    if (size <= 0n) return

    yield { offset, tag, size }

    source.seek(offset + size)
  }
}

/** Printable form of a tag for logs. Non-printable bytes become '.'. */
export function formatTag(tag: Buffer): string {
  let out = ''
  for (const byte of tag) {
    out += byte >= 0x20 && byte <= 0x7e ? String.fromCharCode(byte) : '.'
  }
  return out
}
