export type RandomSource = () => number;

// Small seedable PRNG, uniform in [0, 1).  Same seed, same sequence, on every platform.
export const mulberry32 = (seed: number): RandomSource => {
    let t = seed >>> 0;
    return () => {
        t += 0x6d2b79f5;
        let r = Math.imul(t ^ (t >>> 15), 1 | t);
        r ^= r + Math.imul(r ^ (r >>> 7), 61 | r);
        return ((r ^ (r >>> 14)) >>> 0) / 4294967296;
    };
};

/** Uniformly distributed unit vector */
export function randomUnitVector(rng: RandomSource): [number, number, number] {
    const z = 2 * rng() - 1;
    const phi = 2 * Math.PI * rng();
    const r = Math.sqrt(Math.max(0, 1 - z * z));
    return [r * Math.cos(phi), r * Math.sin(phi), z];
}
