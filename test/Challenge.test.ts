import { describe, it } from "node:test";
import { expect } from "chai";
import { encodePacked, keccak256 } from "viem";
import { keccak_256 } from "@noble/hashes/sha3.js";
import { buildChallenge, deriveChallenges } from "../src/lib/challenge.js";
import { expectRejection } from "./helpers/assert.js";
import { TEST_N, TEST_PARAMS, proveRange } from "./helpers/prover.js";

// Zero digest for inputs of one byte length, Keccak-256 for the rest
function zeroDigestFor(length: number) {
  return (data: Uint8Array): Uint8Array =>
    data.length === length ? new Uint8Array(32) : keccak_256(data);
}

describe("Fiat-Shamir challenges", () => {
  describe("buildChallenge", () => {
    it("matches keccak256 over packed uint256 words", () => {
      const expected = BigInt(keccak256(encodePacked(["uint256", "uint256"], [123n, 456n]))) % TEST_N;
      expect(buildChallenge([123n, 456n], TEST_N)).to.equal(expected);
    });

    it("is deterministic and order sensitive", () => {
      const a = buildChallenge([123n, 456n], TEST_N);
      expect(buildChallenge([123n, 456n], TEST_N)).to.equal(a);
      expect(buildChallenge([456n, 123n], TEST_N)).to.not.equal(a);
      expect(buildChallenge([123n, 457n], TEST_N)).to.not.equal(a);
    });

    it("reduces the digest mod n", () => {
      const digest = BigInt(keccak256(encodePacked(["uint256"], [7n])));
      expect(buildChallenge([7n], 1000n)).to.equal(digest % 1000n);
    });

    it("returns 0 for a zero modulus", () => {
      expect(buildChallenge([1n], 0n)).to.equal(0n);
    });
  });

  describe("deriveChallenges", () => {
    const proof = proveRange(TEST_PARAMS, 50n, { min: 0n, max: 100n });

    it("derives y from the commitments, z from y and x from T1, T2", () => {
      const { y, z, x } = deriveChallenges(proof, TEST_N);
      expect(y).to.equal(buildChallenge([proof.A, proof.S, proof.C, proof.C_v1, proof.C_v2], TEST_N));
      expect(z).to.equal(buildChallenge([y], TEST_N));
      expect(x).to.equal(buildChallenge([proof.T1, proof.T2], TEST_N));
    });

    it("rejects a zero y", () => {
      // five 32-byte words
      expectRejection(() => deriveChallenges(proof, TEST_N, zeroDigestFor(160)), "InvalidChallengeY");
    });

    it("rejects a zero z", () => {
      expectRejection(() => deriveChallenges(proof, TEST_N, zeroDigestFor(32)), "InvalidChallengeZ");
    });

    it("rejects a zero x", () => {
      expectRejection(() => deriveChallenges(proof, TEST_N, zeroDigestFor(64)), "InvalidChallengeX");
    });
  });
});
