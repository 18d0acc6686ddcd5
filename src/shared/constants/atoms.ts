/** Byte order used to decode atom size fields. */
export type Endianness = 'big' | 'little'

/** Every CR3 / BMFF container must open with a file-type box. */
export const FTYP_TAG = Buffer.from('ftyp', 'latin1')

/** Default atom that ends the logical file (media data). */
export const DEFAULT_TERMINATION_TAG = Buffer.from('mdat', 'latin1')

/** Atom tags are always four bytes. */
export const TAG_LENGTH = 4

/** Size field (4) + tag (4). */
export const ATOM_HEADER_SIZE = 8

/** 32-bit size value signalling that a 64-bit size follows the tag. */
export const EXTENDED_SIZE_SENTINEL = 1n

/** Length of the 64-bit extended size field. */
export const EXTENDED_SIZE_LENGTH = 8

/** Default copy buffer for carving (8 MB) */
export const COPY_CHUNK_SIZE = 8 * 1024 * 1024

/** Suffix of the in-progress output file, renamed away on commit */
export const TEMP_SUFFIX = '.tmp'

export const DEFAULT_ENDIANNESS: Endianness = 'big'
