/**
 * Logical length of a CR3 container.
 *
 * Sums atom sizes from the first atom up to and including the termination
 * atom (`mdat` by default). The first atom must be `ftyp`. Whatever the
 * outcome, the source is left at the position it had on entry.
 */

import type { Endianness, ResolveResult } from '../../shared/types'
import { DEFAULT_TERMINATION_TAG, FTYP_TAG } from '../../shared/constants/atoms'
import { formatBytes, silentLogger } from '../logging/logger'
import type { Logger } from '../logging/logger'
import type { SeekableSource } from '../io/seekable-source'
import { formatTag, walkAtoms } from './atom-walker'

export interface ResolveOptions {
  /** Last atom to include. Strings are taken as latin1. Default: `mdat`. */
  terminationTag?: Buffer | string
  endianness?: Endianness
  logger?: Logger
}

/**
 * Compute the logical size of the container starting at the source's
 * current position.
 *
 * `size === 0n` is the only failure signal; `reason` says which rule fired.
 * Errors thrown by the source propagate after the position is restored.
 */
export async function resolveSize(
  source: SeekableSource,
  options: ResolveOptions = {}
): Promise<ResolveResult> {
  const { endianness, logger = silentLogger } = options
  const terminationTag = toTag(options.terminationTag ?? DEFAULT_TERMINATION_TAG)

  const entryPosition = source.tell()

  try {
    let total = 0n
    let index = 0

    for await (const atom of walkAtoms(source, { endianness })) {
      if (index === 0 && !atom.tag.equals(FTYP_TAG)) {
        logger.error(`Invalid start atom: ${formatTag(atom.tag)}. Expected 'ftyp'`)
        return { size: 0n, valid: false, reason: 'invalid-start-atom' }
      }

      total += atom.size
      logger.debug(`Atom index=${index}, name=${formatTag(atom.tag)}, size=${formatBytes(atom.size)}`)

      if (atom.tag.equals(terminationTag)) {
        logger.info(
          `Termination atom '${formatTag(atom.tag)}' reached. Logical size found: ${formatBytes(total)} B`
        )
        return { size: total, valid: true }
      }

      index++
    }

    logger.warn(
      `File ended before reaching termination atom '${formatTag(terminationTag)}'. Returning 0.`
    )
    return { size: 0n, valid: false, reason: 'termination-not-found' }
  } finally {
    source.seek(entryPosition)
  }
}

function toTag(tag: Buffer | string): Buffer {
  return typeof tag === 'string' ? Buffer.from(tag, 'latin1') : tag
}
