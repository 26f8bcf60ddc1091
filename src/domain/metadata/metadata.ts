/**
 * Transaction Metadata
 *
 * Value model for the metadata payload embedded in a vote transaction,
 * plus a deterministic byte encoding. The fee of a transaction depends on
 * its serialized size, so the encoding is what makes two payloads of
 * different sizes cost different amounts.
 *
 * @module domain/metadata/metadata
 */

import { Utils } from '@bsv/sdk'
import { METADATA } from '../../config'
import { InvalidMetadataError } from '../errors'

// ============================================
// Types
// ============================================

export type TxMetadataValue =
  | { int: bigint }
  | { bytes: number[] }
  | { text: string }
  | { list: TxMetadataValue[] }
  | { map: Array<[TxMetadataValue, TxMetadataValue]> }

/** Label → value. Labels are non-negative integers. */
export type TxMetadata = ReadonlyMap<number, TxMetadataValue>

const MAX_UINT64 = (1n << 64n) - 1n

// Value tags of the encoding
const TAG_INT = 0
const TAG_NEGATIVE_INT = 1
const TAG_BYTES = 2
const TAG_TEXT = 3
const TAG_LIST = 4
const TAG_MAP = 5

// ============================================
// Construction
// ============================================

export const metaInt = (value: bigint | number): TxMetadataValue => ({ int: BigInt(value) })
export const metaBytes = (bytes: number[]): TxMetadataValue => ({ bytes })
export const metaText = (text: string): TxMetadataValue => ({ text })
export const metaList = (items: TxMetadataValue[]): TxMetadataValue => ({ list: items })
export const metaMap = (entries: Array<[TxMetadataValue, TxMetadataValue]>): TxMetadataValue => ({ map: entries })

/**
 * Build a metadata payload, validating every label and value.
 *
 * @throws InvalidMetadataError on a bad label, an oversized chunk, or an
 * integer outside the 64-bit range
 *
 * @example
 * ```typescript
 * const meta = makeTransactionMetadata([[674, metaText('hello')]])
 * ```
 */
export function makeTransactionMetadata(entries: Iterable<[number, TxMetadataValue]>): TxMetadata {
  const metadata = new Map<number, TxMetadataValue>()
  for (const [label, value] of entries) {
    if (!Number.isSafeInteger(label) || label < 0) {
      throw new InvalidMetadataError(`Invalid metadata label: ${label}`, { label })
    }
    validateValue(value, String(label))
    metadata.set(label, value)
  }
  return metadata
}

function validateValue(value: TxMetadataValue, path: string): void {
  if ('int' in value) {
    const magnitude = value.int < 0n ? -value.int : value.int
    if (magnitude > MAX_UINT64) {
      throw new InvalidMetadataError(`Metadata integer out of range at ${path}`, { path })
    }
  } else if ('bytes' in value) {
    if (value.bytes.length > METADATA.MAX_CHUNK_BYTES) {
      throw new InvalidMetadataError(
        `Metadata bytes at ${path} exceed ${METADATA.MAX_CHUNK_BYTES} bytes`,
        { path, length: value.bytes.length }
      )
    }
    if (value.bytes.some(b => !Number.isInteger(b) || b < 0 || b > 0xff)) {
      throw new InvalidMetadataError(`Metadata bytes at ${path} contain a non-byte value`, { path })
    }
  } else if ('text' in value) {
    const length = Utils.toArray(value.text, 'utf8').length
    if (length > METADATA.MAX_CHUNK_BYTES) {
      throw new InvalidMetadataError(
        `Metadata text at ${path} exceeds ${METADATA.MAX_CHUNK_BYTES} bytes`,
        { path, length }
      )
    }
  } else if ('list' in value) {
    value.list.forEach((item, i) => validateValue(item, `${path}[${i}]`))
  } else {
    value.map.forEach(([k, v], i) => {
      validateValue(k, `${path}{${i}}.key`)
      validateValue(v, `${path}{${i}}.value`)
    })
  }
}

// ============================================
// Encoding
// ============================================

/**
 * Encode metadata to bytes. Labels are written in ascending order so the
 * result does not depend on insertion order.
 */
export function encodeMetadata(metadata: TxMetadata): number[] {
  const writer = new Utils.Writer()
  const labels = [...metadata.keys()].sort((a, b) => a - b)

  writer.writeVarIntNum(labels.length)
  for (const label of labels) {
    const value = metadata.get(label)
    if (value === undefined) continue
    writer.writeVarIntNum(label)
    writeValue(writer, value)
  }
  return writer.toArray()
}

function writeValue(writer: Utils.Writer, value: TxMetadataValue): void {
  if ('int' in value) {
    writer.writeUInt8(value.int < 0n ? TAG_NEGATIVE_INT : TAG_INT)
    writeUInt64LE(writer, value.int < 0n ? -value.int : value.int)
  } else if ('bytes' in value) {
    writer.writeUInt8(TAG_BYTES)
    writer.writeVarIntNum(value.bytes.length)
    writer.write(value.bytes)
  } else if ('text' in value) {
    const bytes = Utils.toArray(value.text, 'utf8')
    writer.writeUInt8(TAG_TEXT)
    writer.writeVarIntNum(bytes.length)
    writer.write(bytes)
  } else if ('list' in value) {
    writer.writeUInt8(TAG_LIST)
    writer.writeVarIntNum(value.list.length)
    value.list.forEach(item => writeValue(writer, item))
  } else {
    writer.writeUInt8(TAG_MAP)
    writer.writeVarIntNum(value.map.length)
    for (const [k, v] of value.map) {
      writeValue(writer, k)
      writeValue(writer, v)
    }
  }
}

/**
 * Write an unsigned 64-bit integer, little endian.
 */
export function writeUInt64LE(writer: Utils.Writer, value: bigint): void {
  if (value < 0n || value > MAX_UINT64) {
    throw new RangeError(`Value out of uint64 range: ${value}`)
  }
  for (let i = 0n; i < 8n; i++) {
    writer.writeUInt8(Number((value >> (8n * i)) & 0xffn))
  }
}
