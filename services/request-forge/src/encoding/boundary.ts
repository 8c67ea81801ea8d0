import { randomBytes } from "node:crypto";
import { RandomSourceError } from "../errors.js";
import type { RandomSource } from "../types/interfaces.js";

export const BOUNDARY_PREFIX = "snap-boundary-";
export const BOUNDARY_RANDOM_BYTES = 10;

export const cryptoRandomSource: RandomSource = {
  randomBytes: (size) => randomBytes(size)
};

export function newBoundary(random: RandomSource): string {
  let bytes: Buffer;
  try {
    bytes = random.randomBytes(BOUNDARY_RANDOM_BYTES);
  } catch (err) {
    throw new RandomSourceError("Random source failed while generating a multipart boundary", { cause: err });
  }
  if (bytes.length !== BOUNDARY_RANDOM_BYTES) {
    throw new RandomSourceError(`Random source returned ${bytes.length} bytes, expected ${BOUNDARY_RANDOM_BYTES}`);
  }
  return BOUNDARY_PREFIX + bytes.toString("hex");
}
