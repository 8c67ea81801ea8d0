import { describe, expect, it } from "vitest";
import { RandomSourceError } from "../../errors.js";
import { BOUNDARY_PREFIX, cryptoRandomSource, newBoundary } from "../boundary.js";

describe("newBoundary", () => {
  it("hex-encodes ten random bytes after the fixed prefix", () => {
    const random = { randomBytes: (size: number) => Buffer.from(Array.from({ length: size }, (_, i) => i * 17)) };
    expect(newBoundary(random)).toBe("snap-boundary-00112233445566778899");
  });

  it("produces distinct tokens of fixed shape from the crypto source", () => {
    const first = newBoundary(cryptoRandomSource);
    const second = newBoundary(cryptoRandomSource);

    expect(first).not.toBe(second);
    for (const token of [first, second]) {
      expect(token).toMatch(/^snap-boundary-[0-9a-f]{20}$/);
      expect(token.length).toBe(BOUNDARY_PREFIX.length + 20);
    }
  });

  it("wraps a failing random source", () => {
    const failure = new Error("entropy pool drained");
    const random = {
      randomBytes: (): Buffer => {
        throw failure;
      }
    };

    let caught: unknown;
    try {
      newBoundary(random);
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(RandomSourceError);
    expect(caught).toHaveProperty("cause", failure);
  });

  it("rejects a short read", () => {
    const random = { randomBytes: () => Buffer.alloc(4) };
    expect(() => newBoundary(random)).toThrow("Random source returned 4 bytes, expected 10");
  });
});
