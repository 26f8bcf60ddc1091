/**
 * Application Configuration
 *
 * Centralized constants for fee probing, metadata limits and logging.
 * Environment-driven values are resolved in services/config.
 *
 * @module config
 */

// ============================================
// Protocol Configuration
// ============================================

export const PROTOCOL = {
  /** Default per-byte fee coefficient (lovelace) */
  DEFAULT_MIN_FEE_A: 44n,

  /** Default constant fee (lovelace) */
  DEFAULT_MIN_FEE_B: 155381n,

  /** Testnet magic used when none is configured */
  DEFAULT_TESTNET_MAGIC: 1097911063,
} as const

// ============================================
// Transaction Configuration
// ============================================

export const TRANSACTION = {
  /** Expiry slot used for the fee probes */
  PROBE_TTL: 1,

  /** Default number of slots before a vote transaction times out */
  DEFAULT_TTL_SLOTS: 5000,

  /** Value paid to the synthetic address by the probes */
  PROBE_OUTPUT_VALUE: 0n,

  /** Signatures assumed when estimating (payment key) */
  SHELLEY_WITNESS_COUNT: 1,

  /** Bootstrap witnesses assumed when estimating */
  BYRON_WITNESS_COUNT: 0,

  /** Serialized size of a verification-key witness in bytes */
  VKEY_WITNESS_SIZE: 101,

  /** Serialized size of a bootstrap witness in bytes */
  BOOTSTRAP_WITNESS_SIZE: 140,

  /** Size of a key hash inside an address */
  KEY_HASH_SIZE: 28,
} as const

// ============================================
// Metadata Configuration
// ============================================

export const METADATA = {
  /** Label of the registration map (vote key, stake key) */
  REGISTRATION_LABEL: 61284,

  /** Label of the registration signature map */
  SIGNATURE_LABEL: 61285,

  /** Maximum length of a text or bytes chunk */
  MAX_CHUNK_BYTES: 64,

  /** Size of an ed25519 public key */
  PUBLIC_KEY_BYTES: 32,

  /** Size of an ed25519 signature */
  SIGNATURE_BYTES: 64,
} as const

// ============================================
// Logging Configuration
// ============================================

export const LOGGING = {
  /** Environment variable prefix for all settings */
  ENV_PREFIX: 'VOTE_FEES_',
} as const
