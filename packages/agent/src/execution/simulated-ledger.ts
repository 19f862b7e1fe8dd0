import type { BlockTag, NonceSource } from "./signer.js";

/**
 * Stand-in for the chain in dry-run mode: counts simulated transactions per
 * identity and refuses any number that is not the next one.
 */
export class SimulatedLedger implements NonceSource {
  private readonly counts = new Map<string, number>();

  constructor(initial: Record<string, number> = {}) {
    for (const [identity, count] of Object.entries(initial)) {
      this.counts.set(identity.toLowerCase(), count);
    }
  }

  async getSequence(identity: `0x${string}`, _tag: BlockTag): Promise<number> {
    return this.count(identity);
  }

  consume(identity: `0x${string}`, sequence: number): void {
    const expected = this.count(identity);
    if (sequence !== expected) {
      throw new Error(`Simulated nonce ${sequence} for ${identity} out of order (expected ${expected})`);
    }
    this.counts.set(identity.toLowerCase(), expected + 1);
  }

  count(identity: `0x${string}`): number {
    return this.counts.get(identity.toLowerCase()) ?? 0;
  }

  entries(): Record<string, number> {
    return Object.fromEntries(this.counts);
  }
}
