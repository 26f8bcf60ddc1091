/**
 * Vote registration metadata payload.
 *
 * Registration map under label 61284 (1: vote public key, 2: stake public
 * key) and the signature map under label 61285 (1: signature). Signing is
 * done elsewhere; without a signature a zero placeholder of the same length
 * is embedded so fee estimates match the signed payload.
 *
 * @module domain/metadata/registration
 */

import { METADATA } from '../../config'
import { InvalidMetadataError } from '../errors'
import { makeTransactionMetadata, metaBytes, metaInt, metaMap, type TxMetadata } from './metadata'

export interface VoteRegistration {
  votePublicKey: number[]
  stakePublicKey: number[]
  signature?: number[]
}

function requireLength(name: string, bytes: number[], expected: number): void {
  if (bytes.length !== expected) {
    throw new InvalidMetadataError(
      `${name} must be ${expected} bytes, got ${bytes.length}`,
      { field: name, length: bytes.length }
    )
  }
}

export function voteRegistrationMetadata(registration: VoteRegistration): TxMetadata {
  const { votePublicKey, stakePublicKey } = registration
  const signature = registration.signature ?? new Array<number>(METADATA.SIGNATURE_BYTES).fill(0)

  requireLength('votePublicKey', votePublicKey, METADATA.PUBLIC_KEY_BYTES)
  requireLength('stakePublicKey', stakePublicKey, METADATA.PUBLIC_KEY_BYTES)
  requireLength('signature', signature, METADATA.SIGNATURE_BYTES)

  return makeTransactionMetadata([
    [METADATA.REGISTRATION_LABEL, metaMap([
      [metaInt(1), metaBytes(votePublicKey)],
      [metaInt(2), metaBytes(stakePublicKey)]
    ])],
    [METADATA.SIGNATURE_LABEL, metaMap([
      [metaInt(1), metaBytes(signature)]
    ])]
  ])
}
