import type { Hex } from "viem";
import type { VerificationError } from "../lib/errors.js";

/**
 * Public parameters of the commitment scheme over Z_n^*.
 */
export interface PublicParameters {
  readonly g: bigint
  readonly h: bigint
  readonly n: bigint
}

/**
 * Non-interactive range proof as produced by the prover.
 * Scalars are unsigned 256-bit words, conventionally reduced mod n.
 */
export interface Proof {
  readonly A: bigint       // commitment to the square decomposition
  readonly S: bigint       // commitment to the blinding vectors
  readonly T1: bigint      // commitment to t1
  readonly T2: bigint      // commitment to t2
  readonly tau_x: bigint
  readonly mu: bigint
  readonly t_hat: bigint
  readonly C: bigint       // value commitment
  readonly C_v1: bigint    // commitment to 4v - 4a + 1
  readonly C_v2: bigint    // commitment to 4b - 4v + 1
  readonly t0: bigint
  readonly t1: bigint
  readonly t2: bigint
  readonly tau1: bigint
  readonly tau2: bigint
  readonly ipp_L: ReadonlyArray<bigint>
  readonly ipp_R: ReadonlyArray<bigint>
  readonly ipp_a: bigint
  readonly ipp_b: bigint
}

/**
 * The 15 named scalars in canonical order.
 */
export const SCALAR_FIELDS = [
  'A', 'S', 'T1', 'T2', 'tau_x', 'mu', 't_hat', 'C', 'C_v1', 'C_v2',
  't0', 't1', 't2', 'tau1', 'tau2',
] as const

export type ScalarField = (typeof SCALAR_FIELDS)[number]

/**
 * Inclusive range the hidden value is claimed to lie in.
 */
export interface RangeClaim {
  readonly min: bigint
  readonly max: bigint
}

/**
 * Opaque identifier of the claiming party.
 */
export type Subject = string

/**
 * Keccak-256 of the canonical proof encoding.
 */
export type ProofIdentity = Hex

export interface Challenges {
  y: bigint
  z: bigint
  x: bigint
}

/**
 * Record emitted once per accepted proof.
 */
export interface VerificationEvent {
  subject: Subject
  identity: ProofIdentity
  rangeMin: bigint
  rangeMax: bigint
  accepted: true
  timestamp: number
}

/**
 * Stage the verifier was in when it stopped.
 */
export type VerificationStage =
  | "Validating"
  | "ChallengeDerivation"
  | "CommitmentCheck"
  | "StructuralCheck"
  | "Committing";

export type VerificationResult =
  | {
      valid: true;
      identity: ProofIdentity;
      challenges: Challenges;
      event: VerificationEvent;
    }
  | {
      valid: false;
      error: VerificationError;
      stage: VerificationStage;
    };
