/**
 * Deterministic Probe Identity
 *
 * A fixed key pair and address used only to give fee-probe transactions
 * a realistic shape. Keys come from hard-coded seeds, so every call
 * returns the same identity and estimation stays a pure function of its
 * inputs.
 *
 * Nothing here may be used to sign a real transaction. Real payment and
 * stake keys are supplied by the caller and never pass through this module.
 *
 * @module domain/wallet/probeIdentity
 */

import { Hash, PrivateKey, Utils } from '@bsv/sdk'
import { TRANSACTION } from '../../config'
import type { NetworkId, TxIn } from '../types'

/** Seed of the probe payment key: 32 bytes of 'x' */
const PAYMENT_SEED_HEX = '78'.repeat(32)
/** Seed of the probe stake key: 32 bytes of 'y' */
const STAKE_SEED_HEX = '79'.repeat(32)

/** Base address, key payment credential, key stake credential */
const BASE_ADDRESS_TYPE = 0b0000

export interface ProbeIdentity {
  paymentKey: PrivateKey
  stakeKey: PrivateKey
  paymentKeyHash: number[]
  stakeKeyHash: number[]
}

/**
 * Synthetic input reference for the marginal-fee probe. The id is an
 * arbitrary fixed 32-byte value (the SHA-256 of empty input) and refers to
 * nothing on chain; the oracle only looks at transaction shape.
 */
export const PROBE_TX_IN: Readonly<TxIn> = Object.freeze({
  txId: 'e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855',
  index: 1
})

let cached: ProbeIdentity | null = null

function keyHash(key: PrivateKey): number[] {
  const publicKey = Utils.toArray(key.toPublicKey().toString(), 'hex')
  return Hash.sha256(publicKey).slice(0, TRANSACTION.KEY_HASH_SIZE)
}

/**
 * The probe identity. Computed once and reused.
 */
export function probeIdentity(): ProbeIdentity {
  if (cached === null) {
    const paymentKey = PrivateKey.fromString(PAYMENT_SEED_HEX, 'hex')
    const stakeKey = PrivateKey.fromString(STAKE_SEED_HEX, 'hex')
    cached = {
      paymentKey,
      stakeKey,
      paymentKeyHash: keyHash(paymentKey),
      stakeKeyHash: keyHash(stakeKey)
    }
  }
  return cached
}

export function networkTag(network: NetworkId): number {
  return network.kind === 'mainnet' ? 1 : 0
}

/**
 * Base address of the probe identity on the given network:
 * header byte, payment key hash, stake key hash.
 */
export function probeAddress(network: NetworkId): number[] {
  const { paymentKeyHash, stakeKeyHash } = probeIdentity()
  const header = (BASE_ADDRESS_TYPE << 4) | networkTag(network)
  return [header, ...paymentKeyHash, ...stakeKeyHash]
}
