import { performance } from 'perf_hooks';

export function isTruthyFlag(raw: string | undefined): boolean {
  const v = (raw ?? '').toLowerCase().trim();
  return v === '1' || v === 'true' || v === 'yes' || v === 'on';
}

export function isFalsyFlag(raw: string | undefined): boolean {
  const v = (raw ?? '').toLowerCase().trim();
  return v === '0' || v === 'false' || v === 'no' || v === 'off';
}

export function elapsedSince(startMs: number): number {
  return Math.max(0, Math.round(performance.now() - startMs));
}

/**
 * Deterministic PRNG (mulberry32). Used by the demo runner so simulated
 * jitter is reproducible for a given seed.
 */
export function mulberry32(seed: number): () => number {
  let t = seed >>> 0;
  return () => {
    t += 0x6d2b79f5;
    let x = t;
    x = Math.imul(x ^ (x >>> 15), x | 1);
    x ^= x + Math.imul(x ^ (x >>> 7), x | 61);
    return ((x ^ (x >>> 14)) >>> 0) / 4294967296;
  };
}
