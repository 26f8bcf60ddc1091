import { describe, it, expect } from 'vitest'
import {
  candidateTransactionBuilder,
  encodeTxBody,
  txExtraContentEmpty,
  type TxBodyContent
} from './builder'
import { estimatedTxSize, linearFeeOracle } from './oracle'
import { MAINNET } from '../types'
import { OracleFailureError } from '../errors'
import { txIdFor } from '../../test/factories'

function body(overrides: Partial<TxBodyContent> = {}): TxBodyContent {
  return {
    ...txExtraContentEmpty,
    inputs: [],
    outputs: [{ address: [1, 2, 3], value: 0n }],
    ttl: 1,
    fee: 0n,
    ...overrides
  }
}

describe('Candidate Transaction Builder', () => {
  describe('encodeTxBody', () => {
    it('should encode the minimal body', () => {
      expect(encodeTxBody(body())).toEqual([
        0, // inputs
        1, 3, 1, 2, 3, 0, 0, 0, 0, 0, 0, 0, 0, // one output
        0, 0, 0, 0, 0, 0, 0, 0, // fee
        1, // ttl
        0, // certificates
        0, // withdrawals
        0, // update proposal
        0 // metadata
      ])
    })

    it('should add 33 bytes per input', () => {
      const none = encodeTxBody(body())
      const one = encodeTxBody(body({ inputs: [{ txId: txIdFor(1), index: 3 }] }))

      expect(one.length - none.length).toBe(33)
    })

    it('should reject a malformed transaction id', () => {
      expect(() => encodeTxBody(body({ inputs: [{ txId: 'abc', index: 0 }] })))
        .toThrow('Invalid input transaction id: abc')
    })

    it('should reject a negative input index', () => {
      expect(() => encodeTxBody(body({ inputs: [{ txId: txIdFor(1), index: -1 }] })))
        .toThrow('Invalid input index: -1')
    })

    it('should reject a negative ttl', () => {
      expect(() => encodeTxBody(body({ ttl: -5 }))).toThrow('Invalid ttl: -5')
    })

    it('should reject a negative output value', () => {
      expect(() => encodeTxBody(body({ outputs: [{ address: [1], value: -1n }] }))).toThrow(RangeError)
    })
  })

  describe('makeSignedTransaction', () => {
    it('should append the witness set to the body bytes', () => {
      const txBody = candidateTransactionBuilder.makeTransactionBody(body())
      const witness = { vkey: new Array(32).fill(7), signature: new Array(64).fill(9) }

      const unsigned = candidateTransactionBuilder.makeSignedTransaction([], txBody)
      const signed = candidateTransactionBuilder.makeSignedTransaction([witness], txBody)

      expect(unsigned.bytes).toEqual([...txBody.bytes, 0])
      expect(signed.bytes.length - unsigned.bytes.length).toBe(1 + 32 + 1 + 64)
      expect(signed.witnesses).toEqual([witness])
    })
  })
})

describe('Linear Fee Oracle', () => {
  const tx = candidateTransactionBuilder.makeSignedTransaction(
    [],
    candidateTransactionBuilder.makeTransactionBody(body())
  )

  const request = {
    network: MAINNET,
    txFeeFixed: 155381n,
    txFeePerByte: 44n,
    tx,
    numInputs: 0,
    numOutputs: 1,
    numShelleyWitnesses: 1,
    numByronWitnesses: 0
  }

  it('should charge the fixed fee plus the per-byte fee', () => {
    const size = tx.bytes.length + 101

    expect(linearFeeOracle.estimateTransactionFee(request)).toBe(155381n + 44n * BigInt(size))
  })

  it('should count announced witnesses in the size', () => {
    expect(estimatedTxSize(tx, 2, 1)).toBe(tx.bytes.length + 2 * 101 + 140)
  })

  it('should charge only the fixed fee when the per-byte fee is zero', () => {
    expect(linearFeeOracle.estimateTransactionFee({ ...request, txFeePerByte: 0n })).toBe(155381n)
  })

  it('should reject negative fee coefficients', () => {
    expect(() => linearFeeOracle.estimateTransactionFee({ ...request, txFeeFixed: -1n }))
      .toThrow(OracleFailureError)
  })

  it('should reject negative witness counts', () => {
    expect(() => linearFeeOracle.estimateTransactionFee({ ...request, numShelleyWitnesses: -1 }))
      .toThrow('Invalid numShelleyWitnesses: -1')
  })
})
