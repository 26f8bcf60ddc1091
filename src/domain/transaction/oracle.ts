/**
 * Fee Oracle
 *
 * The capability that prices a fully specified candidate transaction,
 * and a reference linear-size oracle for `CandidateTransaction`.
 *
 * @module domain/transaction/oracle
 */

import { TRANSACTION } from '../../config'
import { OracleFailureError } from '../errors'
import type { Money, NetworkId } from '../types'
import {
  candidateTransactionBuilder,
  type CandidateTransaction,
  type CandidateTxBody,
  type TransactionBuilder
} from './builder'

export interface FeeOracleRequest<TTx> {
  network: NetworkId
  /** Constant part of the fee (protocol `minFeeB`) */
  txFeeFixed: Money
  /** Fee per serialized byte (protocol `minFeeA`) */
  txFeePerByte: Money
  tx: TTx
  numInputs: number
  numOutputs: number
  /** Signatures that will be attached */
  numShelleyWitnesses: number
  numByronWitnesses: number
}

/**
 * Must be deterministic and side-effect free.
 */
export interface FeeOracle<TTx> {
  estimateTransactionFee(request: FeeOracleRequest<TTx>): Money
}

/** A ledger's builder and oracle, injected together. */
export interface LedgerCapabilities<TBody, TTx> {
  builder: TransactionBuilder<TBody, TTx>
  oracle: FeeOracle<TTx>
}

function requireCount(name: string, value: number): void {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new OracleFailureError(`Invalid ${name}: ${value}`, { [name]: value })
  }
}

/**
 * Size of the transaction once the announced witnesses are attached.
 */
export function estimatedTxSize(
  tx: CandidateTransaction,
  numShelleyWitnesses: number,
  numByronWitnesses: number
): number {
  return tx.bytes.length +
    numShelleyWitnesses * TRANSACTION.VKEY_WITNESS_SIZE +
    numByronWitnesses * TRANSACTION.BOOTSTRAP_WITNESS_SIZE
}

/**
 * `fee = txFeeFixed + txFeePerByte * size`
 *
 * @throws OracleFailureError on negative coefficients or counts
 */
export const linearFeeOracle: FeeOracle<CandidateTransaction> = {
  estimateTransactionFee(request) {
    if (request.txFeeFixed < 0n || request.txFeePerByte < 0n) {
      throw new OracleFailureError('Malformed protocol parameters: fee coefficients must be non-negative', {
        txFeeFixed: request.txFeeFixed.toString(),
        txFeePerByte: request.txFeePerByte.toString()
      })
    }
    requireCount('numInputs', request.numInputs)
    requireCount('numOutputs', request.numOutputs)
    requireCount('numShelleyWitnesses', request.numShelleyWitnesses)
    requireCount('numByronWitnesses', request.numByronWitnesses)

    const size = estimatedTxSize(request.tx, request.numShelleyWitnesses, request.numByronWitnesses)
    return request.txFeeFixed + request.txFeePerByte * BigInt(size)
  }
}

/** Reference builder and oracle, for use without a ledger library. */
export const candidateLedger: LedgerCapabilities<CandidateTxBody, CandidateTransaction> = {
  builder: candidateTransactionBuilder,
  oracle: linearFeeOracle
}
