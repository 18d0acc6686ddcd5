import * as fs from 'node:fs/promises'
import * as os from 'node:os'
import * as path from 'node:path'

import type { Endianness } from '../shared/types'

/**
 * Plain atom: 4-byte size, 4-byte tag, then `size - 8` payload bytes set to `fill`.
 */
export function atom(tag: string, size: number, fill = 0xab, endianness: Endianness = 'big'): Buffer {
  const buf = Buffer.alloc(size, fill)
  if (endianness === 'big') buf.writeUInt32BE(size, 0)
  else buf.writeUInt32LE(size, 0)
  buf.write(tag, 4, 'latin1')
  return buf
}

/**
 * Atom with the 64-bit size extension: size field 1, tag, 8-byte size,
 * then `size - 16` payload bytes.
 */
export function extendedAtom(tag: string, size: number, fill = 0xcd): Buffer {
  const buf = Buffer.alloc(size, fill)
  buf.writeUInt32BE(1, 0)
  buf.write(tag, 4, 'latin1')
  buf.writeBigUInt64BE(BigInt(size), 8)
  return buf
}

/**
 * ftyp(24) + moov(100) + mdat(5000) + 1000 trailing zero bytes.
 * The logical CR3 length is 5124.
 */
export function overlongCr3(): Buffer {
  return Buffer.concat([
    atom('ftyp', 24, 0x01),
    atom('moov', 100, 0x02),
    atom('mdat', 5000, 0x03),
    Buffer.alloc(1000)
  ])
}

export async function makeTempDir(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), 'cr3-carve-'))
}

export async function pathExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath)
    return true
  } catch {
    return false
  }
}
