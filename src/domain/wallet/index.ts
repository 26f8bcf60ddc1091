/**
 * Wallet Domain - deterministic probe identity for fee estimation
 */

export {
  probeIdentity,
  probeAddress,
  networkTag,
  PROBE_TX_IN
} from './probeIdentity'

export type { ProbeIdentity } from './probeIdentity'
