import { describe, it } from "node:test";
import { expect } from "chai";
import { addmod, createModularRing, modpow, mulmod } from "../src/lib/arith.js";
import { TEST_N } from "./helpers/prover.js";

describe("Modular arithmetic", () => {
  describe("modpow", () => {
    it("computes small powers", () => {
      expect(modpow(4n, 13n, 497n)).to.equal(445n);
      expect(modpow(2n, 10n, 1000n)).to.equal(24n);
    });

    it("returns 1 for a zero exponent", () => {
      expect(modpow(3n, 0n, 7n)).to.equal(1n);
      expect(modpow(TEST_N - 1n, 0n, TEST_N)).to.equal(1n);
    });

    it("returns 0 for a zero base, including exponent 0", () => {
      expect(modpow(0n, 5n, 7n)).to.equal(0n);
      expect(modpow(0n, 0n, 7n)).to.equal(0n);
    });

    it("returns 0 for a zero modulus", () => {
      expect(modpow(5n, 3n, 0n)).to.equal(0n);
      expect(modpow(5n, 0n, 0n)).to.equal(0n);
    });

    it("reduces 1 under modulus 1", () => {
      expect(modpow(7n, 0n, 1n)).to.equal(0n);
    });

    it("reduces a negative base first", () => {
      expect(modpow(-2n, 3n, 7n)).to.equal(6n);
    });

    it("rejects a negative exponent", () => {
      expect(() => modpow(2n, -1n, 7n)).to.throw(RangeError);
    });

    it("adds exponents under multiplication at 256 bits", () => {
      const a = (1n << 255n) + 12345n;
      const b = (1n << 200n) + 999n;
      const lhs = mulmod(modpow(3n, a, TEST_N), modpow(3n, b, TEST_N), TEST_N);
      expect(lhs).to.equal(modpow(3n, a + b, TEST_N));
    });
  });

  describe("mulmod / addmod", () => {
    it("reduces products of words without overflow", () => {
      expect(mulmod(TEST_N - 1n, TEST_N - 1n, TEST_N)).to.equal(1n);
    });

    it("wraps sums", () => {
      expect(addmod(TEST_N - 1n, 2n, TEST_N)).to.equal(1n);
      expect(addmod(-1n, 0n, 7n)).to.equal(6n);
    });

    it("returns 0 for a zero modulus", () => {
      expect(mulmod(5n, 5n, 0n)).to.equal(0n);
      expect(addmod(5n, 5n, 0n)).to.equal(0n);
    });
  });

  describe("createModularRing", () => {
    const ring = createModularRing(1000n);

    it("evaluates polynomials lowest coefficient first", () => {
      expect(ring.evalPolyAt([1n, 2n, 3n], 2n)).to.equal(17n);
      expect(ring.evalPolyAt([1n, 2n, 3n], 10n)).to.equal(321n);
      expect(ring.evalPolyAt([999n, 999n, 999n], 999n)).to.equal(999n);
    });

    it("compares residues", () => {
      expect(ring.eq(1003n, 3n)).to.equal(true);
      expect(ring.ne(1003n, 4n)).to.equal(true);
      expect(ring.isZero(2000n)).to.equal(true);
    });

    it("exposes the identities", () => {
      expect(ring.zero).to.equal(0n);
      expect(ring.one).to.equal(1n);
      expect(createModularRing(1n).one).to.equal(0n);
    });
  });
});
