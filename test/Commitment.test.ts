import { describe, it } from "node:test";
import { expect } from "chai";
import { mulmod } from "../src/lib/arith.js";
import { deriveChallenges } from "../src/lib/challenge.js";
import { pedersenCommit, verifyCommitments } from "../src/lib/commitment.js";
import { evaluateBlindingPolynomial, verifyPolynomialRelation } from "../src/lib/polynomial.js";
import { expectRejection } from "./helpers/assert.js";
import { TEST_N, TEST_PARAMS, proveRange } from "./helpers/prover.js";

describe("Pedersen commitments", () => {
  const small = { g: 2n, h: 3n, n: 1000n };

  it("computes g^m * h^r mod n", () => {
    // 2^5 * 3^7 = 69984
    expect(pedersenCommit(small, 5n, 7n)).to.equal(984n);
  });

  it("is deterministic and depends on the blinding", () => {
    const c = pedersenCommit(TEST_PARAMS, 5n, 7n);
    expect(pedersenCommit(TEST_PARAMS, 5n, 7n)).to.equal(c);
    expect(pedersenCommit(TEST_PARAMS, 5n, 8n)).to.not.equal(c);
  });

  it("is additively homomorphic", () => {
    const c1 = pedersenCommit(TEST_PARAMS, 5n, 7n);
    const c2 = pedersenCommit(TEST_PARAMS, 11n, 3n);
    expect(mulmod(c1, c2, TEST_N)).to.equal(pedersenCommit(TEST_PARAMS, 16n, 10n));
  });

  describe("verifyCommitments", () => {
    const proof = proveRange(TEST_PARAMS, 42n, { min: 1n, max: 100n });

    it("accepts honest T1 and T2", () => {
      expect(() => verifyCommitments(TEST_PARAMS, proof)).to.not.throw();
    });

    it("rejects T1 that does not open to (t1, tau1)", () => {
      const bad = { ...proof, tau1: proof.tau1 + 1n };
      expectRejection(() => verifyCommitments(TEST_PARAMS, bad), "CommitmentMismatch", "T1");
    });

    it("rejects T2 that does not open to (t2, tau2)", () => {
      const bad = { ...proof, t2: proof.t2 + 1n };
      expectRejection(() => verifyCommitments(TEST_PARAMS, bad), "CommitmentMismatch", "T2");
    });
  });
});

describe("Blinding polynomial relation", () => {
  const proof = proveRange(TEST_PARAMS, 42n, { min: 1n, max: 100n });
  const { x } = deriveChallenges(proof, TEST_N);

  it("evaluates t0 + t1*x + t2*x^2 mod n", () => {
    const p = { ...proof, t0: 1n, t1: 2n, t2: 3n };
    expect(evaluateBlindingPolynomial(p, 10n, 1000n)).to.equal(321n);
    expect(evaluateBlindingPolynomial(p, 10n, 100n)).to.equal(21n);
  });

  it("accepts the honest t_hat", () => {
    expect(evaluateBlindingPolynomial(proof, x, TEST_N)).to.equal(proof.t_hat);
    expect(() => verifyPolynomialRelation(TEST_PARAMS, proof, x)).to.not.throw();
  });

  it("rejects a t_hat off by one", () => {
    const bad = { ...proof, t_hat: proof.t_hat + 1n };
    expectRejection(() => verifyPolynomialRelation(TEST_PARAMS, bad, x), "PolynomialMismatch");
  });

  it("rejects a t_hat that is congruent but not reduced", () => {
    const bad = { ...proof, t_hat: proof.t_hat + TEST_N };
    expectRejection(() => verifyPolynomialRelation(TEST_PARAMS, bad, x), "PolynomialMismatch");
  });

  it("rejects the wrong challenge", () => {
    expectRejection(() => verifyPolynomialRelation(TEST_PARAMS, proof, x + 1n), "PolynomialMismatch");
  });
});
