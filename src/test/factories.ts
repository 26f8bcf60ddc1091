/**
 * Test factories for creating properly-typed sources and ledgers.
 */

import { vi } from 'vitest'
import type { Money, UnspentSource } from '../domain/types'
import type { FeeOracleRequest, LedgerCapabilities, TxBodyContent } from '../domain/transaction'

let sourceCounter = 0

/** 64-hex transaction id derived from a number */
export function txIdFor(n: number): string {
  return n.toString(16).padStart(64, '0')
}

/** Create an unspent source with sensible defaults. Override any field via the partial. */
export function createMockSource(overrides: Partial<UnspentSource> = {}): UnspentSource {
  sourceCounter++
  return {
    reference: { txId: txIdFor(sourceCounter), index: 0 },
    amount: 1_000_000n,
    ...overrides
  }
}

/** Source with a given amount */
export function sourceOf(amount: Money, index: number = 0): UnspentSource {
  return createMockSource({ amount, reference: { txId: txIdFor(++sourceCounter), index } })
}

/**
 * Ledger whose builder passes the body content through and whose oracle
 * answers by input count: `feeBase` with no inputs, `feeWithOneInput` otherwise.
 */
export function scriptedLedger(feeBase: Money, feeWithOneInput: Money) {
  const estimateTransactionFee = vi.fn((request: FeeOracleRequest<TxBodyContent>): Money =>
    request.numInputs === 0 ? feeBase : feeWithOneInput
  )
  const ledger: LedgerCapabilities<TxBodyContent, TxBodyContent> = {
    builder: {
      makeTransactionBody: content => content,
      makeSignedTransaction: (_witnesses, body) => body
    },
    oracle: { estimateTransactionFee }
  }
  return { ledger, estimateTransactionFee }
}
