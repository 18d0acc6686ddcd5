import { describe, expect, it, vi } from 'vitest'
import type { Mock } from 'vitest'

import { BufferSource } from '../io/seekable-source'
import type { Logger } from '../logging/logger'
import { atom, extendedAtom, overlongCr3 } from '../../test-utils/atoms'
import { resolveSize } from './size-resolver'

function spyLogger(): Logger & Record<keyof Logger, Mock> {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    critical: vi.fn()
  }
}

/** Source that fails on the n-th read. */
class FailingSource extends BufferSource {
  private reads = 0

  constructor(data: Buffer, private readonly failOn: number) {
    super(data)
  }

  override async read(length: number): Promise<Buffer> {
    this.reads++
    if (this.reads === this.failOn) throw new Error('disk went away')
    return super.read(length)
  }
}

describe('resolveSize', () => {
  it('sums atoms up to and including mdat', async () => {
    const source = new BufferSource(overlongCr3())

    const result = await resolveSize(source)

    expect(result).toEqual({ size: 5124n, valid: true })
    expect(source.tell()).toBe(0n)
  })

  it('rejects a source that does not start with ftyp', async () => {
    const source = new BufferSource(Buffer.concat([atom('moov', 100), atom('mdat', 40)]))

    const result = await resolveSize(source)

    expect(result).toEqual({ size: 0n, valid: false, reason: 'invalid-start-atom' })
    expect(source.tell()).toBe(0n)
  })

  it('returns 0 when the termination atom never appears', async () => {
    const data = Buffer.concat([atom('ftyp', 24), atom('moov', 16), atom('free', 10)])
    expect(data.length).toBe(50)

    const result = await resolveSize(new BufferSource(data))

    expect(result).toEqual({ size: 0n, valid: false, reason: 'termination-not-found' })
  })

  it('stops at a custom termination tag', async () => {
    expect(await resolveSize(new BufferSource(overlongCr3()), { terminationTag: 'moov' })).toEqual({
      size: 124n,
      valid: true
    })
    expect(
      await resolveSize(new BufferSource(overlongCr3()), { terminationTag: Buffer.from('moov') })
    ).toEqual({ size: 124n, valid: true })
  })

  it('counts an extended-size ftyp', async () => {
    const source = new BufferSource(Buffer.concat([extendedAtom('ftyp', 32), atom('mdat', 20)]))

    expect(await resolveSize(source)).toEqual({ size: 52n, valid: true })
  })

  it('measures from the entry position and restores it', async () => {
    const source = new BufferSource(Buffer.concat([Buffer.alloc(7, 0xee), overlongCr3()]))
    source.seek(7n)

    const result = await resolveSize(source)

    expect(result).toEqual({ size: 5124n, valid: true })
    expect(source.tell()).toBe(7n)
  })

  it('restores the entry position after a failed walk', async () => {
    const source = new BufferSource(Buffer.concat([Buffer.alloc(3), atom('ftyp', 24), atom('moov', 16)]))
    source.seek(3n)

    await resolveSize(source)

    expect(source.tell()).toBe(3n)
  })

  it('restores the entry position when the source throws', async () => {
    const source = new FailingSource(overlongCr3(), 3)

    await expect(resolveSize(source)).rejects.toThrow('disk went away')
    expect(source.tell()).toBe(0n)
  })

  it('can be retried on the same source with another tag', async () => {
    const source = new BufferSource(Buffer.concat([atom('ftyp', 24), atom('moov', 16)]))

    expect((await resolveSize(source)).valid).toBe(false)
    expect(await resolveSize(source, { terminationTag: 'moov' })).toEqual({ size: 40n, valid: true })
  })

  it('logs each atom and the outcome', async () => {
    const logger = spyLogger()

    await resolveSize(new BufferSource(overlongCr3()), { logger })

    expect(logger.debug.mock.calls).toEqual([
      ['Atom index=0, name=ftyp, size=24'],
      ['Atom index=1, name=moov, size=100'],
      ['Atom index=2, name=mdat, size=5,000']
    ])
    expect(logger.info).toHaveBeenCalledWith(
      "Termination atom 'mdat' reached. Logical size found: 5,124 B"
    )
  })

  it('logs which rule rejected the source', async () => {
    const badStart = spyLogger()
    await resolveSize(new BufferSource(atom('moov', 16)), { logger: badStart })
    expect(badStart.error).toHaveBeenCalledWith("Invalid start atom: moov. Expected 'ftyp'")

    const noMdat = spyLogger()
    await resolveSize(new BufferSource(atom('ftyp', 24)), { logger: noMdat })
    expect(noMdat.warn).toHaveBeenCalledWith(
      "File ended before reaching termination atom 'mdat'. Returning 0."
    )
  })
})
