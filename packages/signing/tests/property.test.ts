/**
 * Property-Based Tests for @splitpact/signing
 *
 * 1. Two different salts never produce the same digest
 * 2. Two different split IDs never produce the same digest
 * 3. The digest always equals viem's EIP-712 hash
 */

import { describe, it, expect } from "vitest";
import fc from "fast-check";
import { bytesToHex, hashTypedData } from "viem";
import { approvalDigest, approvalTypedData } from "../src/digest.js";
import { DOMAIN, aliceApproval } from "./fixtures.js";

// =============================================================================
// Arbitraries
// =============================================================================

const arbSalt = fc
  .uint8Array({ minLength: 32, maxLength: 32 })
  .map((bytes) => bytesToHex(bytes));

const arbSplitId = fc.bigInt({ min: 1n, max: (1n << 64n) - 1n });

const arbAmount = fc.bigInt({ min: 1n, max: (1n << 128n) - 1n });

// =============================================================================
// Properties
// =============================================================================

describe("digest injectivity", () => {
  it("different salts give different digests", () => {
    fc.assert(
      fc.property(arbSalt, arbSalt, (a, b) => {
        fc.pre(a !== b);
        expect(approvalDigest(DOMAIN, aliceApproval({ salt: a }))).not.toBe(
          approvalDigest(DOMAIN, aliceApproval({ salt: b })),
        );
      }),
      { numRuns: 100 },
    );
  });

  it("different splits give different digests", () => {
    fc.assert(
      fc.property(arbSplitId, arbSplitId, (a, b) => {
        fc.pre(a !== b);
        expect(approvalDigest(DOMAIN, aliceApproval({ splitId: a }))).not.toBe(
          approvalDigest(DOMAIN, aliceApproval({ splitId: b })),
        );
      }),
      { numRuns: 100 },
    );
  });
});

describe("EIP-712 compatibility", () => {
  it("matches hashTypedData for any amount, split and salt", () => {
    fc.assert(
      fc.property(arbAmount, arbSplitId, arbSalt, (amount, splitId, salt) => {
        const message = aliceApproval({ amount, splitId, salt });
        expect(approvalDigest(DOMAIN, message)).toBe(
          hashTypedData(approvalTypedData(DOMAIN, message)),
        );
      }),
      { numRuns: 50 },
    );
  });
});
