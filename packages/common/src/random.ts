import { webcrypto } from "one-webcrypto";

/**
 * Uniformly samples an integer in `[0, 2^bits)` from cryptographically
 * random bytes. Only tests and benchmarks draw operands this way.
 */
export function randomInteger(bits: number): bigint {
  if (!Number.isInteger(bits) || bits < 1) {
    throw new Error(`cannot sample an integer of ${bits} bits`);
  }

  const octets = new Uint8Array(Math.ceil(bits / 8));
  webcrypto.getRandomValues(octets);

  let n = 0n;
  for (const octet of octets) {
    n = (n << 8n) | BigInt(octet);
  }
  // drop the surplus high bits of the last octet
  return n >> BigInt(octets.length * 8 - bits);
}
