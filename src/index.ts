/**
 * Range Proof Verifier
 *
 * Verifies non-interactive range proofs over Pedersen commitments in Z_n^*
 * and records each accepted proof once.
 */

import { RangeProofVerifier, type VerifierOptions } from "./lib/verifier.js";

// Export types
export type {
  PublicParameters,
  Proof,
  ScalarField,
  RangeClaim,
  Subject,
  ProofIdentity,
  Challenges,
  VerificationEvent,
  VerificationResult,
  VerificationStage,
} from "./types/index.js";
export { SCALAR_FIELDS } from "./types/index.js";

// Export arithmetic and hashing utilities
export { modpow, mulmod, addmod, createModularRing } from "./lib/arith.js";
export { WORD_BYTES, WORD_LIMIT, hash, isWord, packWords, type HashFunction } from "./lib/crypto.js";
export type { ResidueRing } from "./math.js";

// Export the individual checks
export { buildChallenge, deriveChallenges } from "./lib/challenge.js";
export { pedersenCommit, verifyCommitments } from "./lib/commitment.js";
export { evaluateBlindingPolynomial, verifyPolynomialRelation } from "./lib/polynomial.js";
export {
  DEFAULT_IPP_DIMENSION,
  DEFAULT_IPP_ROUNDS,
  MAX_IPP_DIMENSION,
  ippRoundsForDimension,
  ippRoundsForBitWidth,
  verifyStructure,
} from "./lib/structure.js";
export { PROOF_ABI, encodeProof, proofIdentity } from "./lib/identity.js";

// Export ledger
export { MemoryLedgerStore, VerificationLedger, type LedgerStore } from "./lib/ledger.js";
export { SqliteLedgerStore } from "./lib/sqlite_ledger.js";

// Export codecs
export {
  decodeFlatProof,
  flattenProof,
  flatProofLength,
  parseParams,
  formatParams,
  parseProofText,
  formatProofText,
  parseProofJson,
  toProofJson,
  type ProofJson,
} from "./lib/codec.js";

// Export errors and verifier
export {
  VerificationError,
  isVerificationError,
  type RejectionKind,
  type RejectionCategory,
} from "./lib/errors.js";
export {
  RangeProofVerifier,
  isEmptySubject,
  validateParameters,
  type VerificationObserver,
  type VerifierOptions,
} from "./lib/verifier.js";
export { createLogger, getLogger } from "./lib/logger.js";
export { loadConfig, type Config } from "./config.js";

/**
 * Create a verifier with an in-memory ledger unless a store is given.
 */
export function createVerifier(options: VerifierOptions = {}): RangeProofVerifier {
  return new RangeProofVerifier(options);
}
