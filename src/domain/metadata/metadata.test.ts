import { describe, it, expect } from 'vitest'
import {
  makeTransactionMetadata,
  encodeMetadata,
  metaBytes,
  metaInt,
  metaList,
  metaMap,
  metaText,
  voteRegistrationMetadata
} from './index'
import { InvalidMetadataError } from '../errors'

describe('Transaction Metadata', () => {
  describe('makeTransactionMetadata', () => {
    it('should keep every label and value', () => {
      const meta = makeTransactionMetadata([
        [1, metaInt(7)],
        [2, metaList([metaText('a'), metaBytes([1, 2])])]
      ])

      expect(meta.size).toBe(2)
      expect(meta.get(1)).toEqual({ int: 7n })
    })

    it('should reject a negative label', () => {
      expect(() => makeTransactionMetadata([[-1, metaInt(0)]])).toThrow(InvalidMetadataError)
    })

    it('should reject a fractional label', () => {
      expect(() => makeTransactionMetadata([[1.5, metaInt(0)]])).toThrow('Invalid metadata label: 1.5')
    })

    it('should reject text longer than 64 bytes', () => {
      expect(() => makeTransactionMetadata([[1, metaText('x'.repeat(65))]]))
        .toThrow('Metadata text at 1 exceeds 64 bytes')
    })

    it('should count text length in UTF-8 bytes', () => {
      // 22 three-byte characters = 66 bytes
      expect(() => makeTransactionMetadata([[1, metaText('€'.repeat(22))]])).toThrow(InvalidMetadataError)
      expect(() => makeTransactionMetadata([[1, metaText('€'.repeat(21))]])).not.toThrow()
    })

    it('should reject oversized bytes nested in a map', () => {
      const value = metaMap([[metaInt(1), metaBytes(new Array(65).fill(0))]])

      expect(() => makeTransactionMetadata([[9, value]])).toThrow('Metadata bytes at 9{0}.value exceed 64 bytes')
    })

    it('should reject values that are not bytes', () => {
      expect(() => makeTransactionMetadata([[1, metaBytes([256])]])).toThrow(InvalidMetadataError)
    })

    it('should reject integers outside the 64-bit range', () => {
      expect(() => makeTransactionMetadata([[1, metaInt(1n << 64n)]])).toThrow(InvalidMetadataError)
      expect(() => makeTransactionMetadata([[1, metaInt(-((1n << 64n) - 1n))]])).not.toThrow()
    })
  })

  describe('encodeMetadata', () => {
    it('should encode an empty payload as a zero count', () => {
      expect(encodeMetadata(makeTransactionMetadata([]))).toEqual([0])
    })

    it('should encode a small integer entry', () => {
      const bytes = encodeMetadata(makeTransactionMetadata([[5, metaInt(258)]]))

      expect(bytes).toEqual([1, 5, 0, 2, 1, 0, 0, 0, 0, 0, 0])
    })

    it('should not depend on insertion order', () => {
      const a = makeTransactionMetadata([[1, metaText('one')], [2, metaText('two')]])
      const b = makeTransactionMetadata([[2, metaText('two')], [1, metaText('one')]])

      expect(encodeMetadata(a)).toEqual(encodeMetadata(b))
    })

    it('should grow with the payload', () => {
      const short = encodeMetadata(makeTransactionMetadata([[1, metaText('a')]]))
      const long = encodeMetadata(makeTransactionMetadata([[1, metaText('abcdef')]]))

      expect(long.length - short.length).toBe(5)
    })
  })

  describe('voteRegistrationMetadata', () => {
    const votePublicKey = new Array(32).fill(0xaa)
    const stakePublicKey = new Array(32).fill(0xbb)

    it('should place keys under the registration label and the signature under its own', () => {
      const signature = new Array(64).fill(0xcc)

      const meta = voteRegistrationMetadata({ votePublicKey, stakePublicKey, signature })

      expect(meta.get(61284)).toEqual({
        map: [
          [{ int: 1n }, { bytes: votePublicKey }],
          [{ int: 2n }, { bytes: stakePublicKey }]
        ]
      })
      expect(meta.get(61285)).toEqual({ map: [[{ int: 1n }, { bytes: signature }]] })
    })

    it('should size an unsigned registration like a signed one', () => {
      const unsigned = voteRegistrationMetadata({ votePublicKey, stakePublicKey })
      const signed = voteRegistrationMetadata({
        votePublicKey,
        stakePublicKey,
        signature: new Array(64).fill(0xcc)
      })

      expect(encodeMetadata(unsigned).length).toBe(encodeMetadata(signed).length)
      // count + 61284 entry (91 bytes) + 61285 entry (80 bytes)
      expect(encodeMetadata(signed)).toHaveLength(172)
    })

    it('should reject keys of the wrong length', () => {
      expect(() => voteRegistrationMetadata({ votePublicKey: [1, 2, 3], stakePublicKey }))
        .toThrow('votePublicKey must be 32 bytes, got 3')
    })

    it('should reject a signature of the wrong length', () => {
      expect(() => voteRegistrationMetadata({ votePublicKey, stakePublicKey, signature: [1] }))
        .toThrow('signature must be 64 bytes, got 1')
    })
  })
})
