/**
 * Transaction Builder
 *
 * The capability that assembles candidate vote transactions, and a
 * reference implementation of it. The reference builder produces an
 * unsigned-shape `CandidateTransaction` whose byte encoding is what the
 * bundled fee oracle measures. Deployments on a real ledger inject that
 * ledger's own builder instead.
 *
 * All functions are pure: no API calls, no storage, no logging.
 *
 * @module domain/transaction/builder
 */

import { Utils } from '@bsv/sdk'
import type { Money, TxIn } from '../types'
import { encodeMetadata, writeUInt64LE, type TxMetadata } from '../metadata'

// ============================================
// Types
// ============================================

export interface TxOut {
  /** Raw address bytes */
  address: number[]
  value: Money
}

export interface Withdrawal {
  stakeAddress: number[]
  amount: Money
}

/** A verification key and the signature it produced */
export interface ShelleyWitness {
  vkey: number[]
  signature: number[]
}

/**
 * Everything besides inputs and outputs. Vote transactions carry only
 * metadata; the other fields stay empty.
 */
export interface TxExtraContent {
  /** Pre-encoded certificates */
  certificates: readonly number[][]
  withdrawals: readonly Withdrawal[]
  metadata: TxMetadata | null
  /** Pre-encoded update proposal */
  updateProposal: number[] | null
}

export const txExtraContentEmpty: TxExtraContent = Object.freeze({
  certificates: [],
  withdrawals: [],
  metadata: null,
  updateProposal: null
})

export interface TxBodyContent extends TxExtraContent {
  inputs: readonly TxIn[]
  outputs: readonly TxOut[]
  /** Slot after which the transaction is invalid */
  ttl: number
  fee: Money
}

/**
 * Assembles transactions for a ledger. `TBody` and `TTx` are whatever the
 * ledger library uses; the estimator never looks inside them.
 */
export interface TransactionBuilder<TBody, TTx> {
  makeTransactionBody(content: TxBodyContent): TBody
  makeSignedTransaction(witnesses: readonly ShelleyWitness[], body: TBody): TTx
}

export interface CandidateTxBody {
  content: TxBodyContent
  bytes: number[]
}

export interface CandidateTransaction {
  body: CandidateTxBody
  witnesses: readonly ShelleyWitness[]
  /** Encoded body followed by the witness set */
  bytes: number[]
}

// ============================================
// Encoding
// ============================================

const TX_ID_PATTERN = /^[0-9a-fA-F]{64}$/

function writeBytes(writer: Utils.Writer, bytes: number[]): void {
  writer.writeVarIntNum(bytes.length)
  writer.write(bytes)
}

function writeOptional(writer: Utils.Writer, bytes: number[] | null): void {
  if (bytes === null) {
    writer.writeUInt8(0)
    return
  }
  writer.writeUInt8(1)
  writeBytes(writer, bytes)
}

/**
 * Encode a transaction body.
 *
 * @throws Error if an input reference, the ttl, or an amount is malformed
 */
export function encodeTxBody(content: TxBodyContent): number[] {
  if (!Number.isSafeInteger(content.ttl) || content.ttl < 0) {
    throw new Error(`Invalid ttl: ${content.ttl}`)
  }

  const writer = new Utils.Writer()

  writer.writeVarIntNum(content.inputs.length)
  for (const input of content.inputs) {
    if (!TX_ID_PATTERN.test(input.txId)) {
      throw new Error(`Invalid input transaction id: ${input.txId}`)
    }
    if (!Number.isSafeInteger(input.index) || input.index < 0) {
      throw new Error(`Invalid input index: ${input.index}`)
    }
    writer.write(Utils.toArray(input.txId, 'hex'))
    writer.writeVarIntNum(input.index)
  }

  writer.writeVarIntNum(content.outputs.length)
  for (const output of content.outputs) {
    writeBytes(writer, output.address)
    writeUInt64LE(writer, output.value)
  }

  writeUInt64LE(writer, content.fee)
  writer.writeVarIntNum(content.ttl)

  writer.writeVarIntNum(content.certificates.length)
  content.certificates.forEach(cert => writeBytes(writer, cert))

  writer.writeVarIntNum(content.withdrawals.length)
  for (const withdrawal of content.withdrawals) {
    writeBytes(writer, withdrawal.stakeAddress)
    writeUInt64LE(writer, withdrawal.amount)
  }

  writeOptional(writer, content.updateProposal)
  writeOptional(writer, content.metadata === null ? null : encodeMetadata(content.metadata))

  return writer.toArray()
}

// ============================================
// Reference Builder
// ============================================

export const candidateTransactionBuilder: TransactionBuilder<CandidateTxBody, CandidateTransaction> = {
  makeTransactionBody(content) {
    return { content, bytes: encodeTxBody(content) }
  },

  makeSignedTransaction(witnesses, body) {
    const writer = new Utils.Writer()
    writer.write(body.bytes)
    writer.writeVarIntNum(witnesses.length)
    for (const witness of witnesses) {
      writeBytes(writer, witness.vkey)
      writeBytes(writer, witness.signature)
    }
    return { body, witnesses, bytes: writer.toArray() }
  }
}
