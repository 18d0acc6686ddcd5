import * as fs from 'node:fs/promises'
import * as path from 'node:path'
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'

import { makeTempDir, overlongCr3 } from '../test-utils/atoms'
import { USAGE, UsageError, parseCliArgs, runCli } from './cli'

describe('parseCliArgs', () => {
  it('builds a batch config with defaults', () => {
    const command = parseCliArgs(['--input-dir', 'in', '--output-dir', 'out'])

    expect(command).toEqual({
      kind: 'run',
      config: {
        inputDir: 'in',
        outputDir: 'out',
        terminationTag: Buffer.from('mdat'),
        endianness: 'big',
        verbose: false
      }
    })
  })

  it('reads every option', () => {
    const command = parseCliArgs([
      '--input-dir=in',
      '--output-dir=out',
      '--lastchunk',
      'moov',
      '--endianness',
      'little',
      '-v'
    ])

    expect(command).toEqual({
      kind: 'run',
      config: {
        inputDir: 'in',
        outputDir: 'out',
        terminationTag: Buffer.from('moov'),
        endianness: 'little',
        verbose: true
      }
    })
  })

  it('returns help without requiring directories', () => {
    expect(parseCliArgs(['--help'])).toEqual({ kind: 'help' })
    expect(parseCliArgs(['-h'])).toEqual({ kind: 'help' })
  })

  const rejected: Array<[string[], string]> = [
    [['--output-dir', 'out'], '--input-dir is required'],
    [['--input-dir', 'in'], '--output-dir is required'],
    [['--input-dir', 'in', '--output-dir', 'out', '--lastchunk='], '--lastchunk must not be empty'],
    [
      ['--input-dir', 'in', '--output-dir', 'out', '--lastchunk', 'md'],
      "--lastchunk must be exactly 4 characters, got 'md'"
    ],
    [
      ['--input-dir', 'in', '--output-dir', 'out', '--endianness', 'middle'],
      "--endianness must be 'big' or 'little', got 'middle'"
    ]
  ]

  it.each(rejected)('rejects %j', (argv, message) => {
    expect(() => parseCliArgs(argv)).toThrow(new UsageError(message))
  })

  it('rejects unknown flags', () => {
    expect(() => parseCliArgs(['--input-dir', 'in', '--output-dir', 'out', '--force'])).toThrow(
      UsageError
    )
  })
})

describe('runCli', () => {
  let root: string

  beforeEach(async () => {
    root = await makeTempDir()
  })

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true })
  })

  function fakeSink() {
    return { log: vi.fn(), error: vi.fn() }
  }

  it('carves a directory and exits 0', async () => {
    const inputDir = path.join(root, 'in')
    const outputDir = path.join(root, 'out')
    await fs.mkdir(inputDir)
    await fs.writeFile(path.join(inputDir, 'IMG_0001.CR3'), overlongCr3())
    const sink = fakeSink()

    const code = await runCli(['--input-dir', inputDir, '--output-dir', outputDir], { sink })

    expect(code).toBe(0)
    expect((await fs.stat(path.join(outputDir, 'IMG_0001.CR3'))).size).toBe(5124)
    expect(sink.log).toHaveBeenCalledWith('[INFO] Saving IMG_0001.CR3, calculated size 5,124 B')
    expect(sink.log).toHaveBeenLastCalledWith('[INFO] --- CR3 File Fixer Complete ---')
    expect(sink.error).not.toHaveBeenCalled()
  })

  it('exits 1 when the input directory is missing', async () => {
    const missing = path.join(root, 'missing')
    const sink = fakeSink()

    const code = await runCli(['--input-dir', missing, '--output-dir', path.join(root, 'out')], {
      sink
    })

    expect(code).toBe(1)
    expect(sink.error).toHaveBeenCalledWith(
      `[CRITICAL] Input path must be an existing directory: ${missing}`
    )
  })

  it('prints usage on --help', async () => {
    const sink = fakeSink()

    expect(await runCli(['--help'], { sink })).toBe(0)
    expect(sink.log).toHaveBeenCalledWith(USAGE)
  })

  it('exits 1 on bad arguments', async () => {
    const sink = fakeSink()

    expect(await runCli(['--output-dir', 'out'], { sink })).toBe(1)
    expect(sink.error).toHaveBeenCalledWith('error: --input-dir is required\n(use --help for usage)')
  })

  it('uses the injected logger factory', async () => {
    const inputDir = path.join(root, 'in')
    await fs.mkdir(inputDir)
    const logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn(), critical: vi.fn() }
    const createLogger = vi.fn(() => logger)

    await runCli(['--input-dir', inputDir, '--output-dir', path.join(root, 'out'), '-v'], {
      sink: fakeSink(),
      createLogger
    })

    expect(createLogger).toHaveBeenCalledWith(true)
    expect(logger.info).toHaveBeenCalledWith('--- CR3 File Fixer Initialized (Batch Mode) ---')
  })
})
