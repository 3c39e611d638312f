import { Vec3 } from '../types/DataTypes';
import { RandomSource, mulberry32, randomUnitVector } from '../util/Random';
import { deg2rad } from '../geometry/SphereMath';
import { BrightnessLevels, DotLevel, DotOcclusion, DotSize, MotionSpec } from './PatternParams';

export interface Dot {
    pos: Vec3; // unit vector in the pattern frame (pole at +z)
    level: number;
    cosRadius: number; // cos of the dot's apparent radius
}

export interface DotStyle {
    how: DotLevel;
    levels: BrightnessLevels;
    radiusRad: number;
    size: DotSize;
}

// Depths for distance-relative dots are uniform in [1, MAX_DOT_DEPTH)
export const MAX_DOT_DEPTH = 3;

// Translated dots wrap in apparent distance between -/+ this (80 degrees either side of the equator)
const TRANSLATION_WRAP = Math.tan(deg2rad(80));

function dotLevel(rng: RandomSource, how: DotLevel, levels: BrightnessLevels): number {
    switch (how) {
        case 'fixed':
            return levels.high;
        case 'randomSpread': {
            const lo = Math.min(levels.low, levels.high),
                hi = Math.max(levels.low, levels.high);
            return lo + Math.floor(rng() * (hi - lo + 1));
        }
        case 'randomBinary':
            return rng() < 0.5 ? levels.high : levels.low;
    }
}

/**
 * Positions and levels first, then (distance mode only) one depth per dot,
 *  so both size modes place the same dots for a given seed.
 */
export function scatterDots(rng: RandomSource, count: number, style: DotStyle): Dot[] {
    const cosRadius = Math.cos(style.radiusRad);
    const dots: Dot[] = [];
    for (let i = 0; i < count; ++i) {
        const pos = randomUnitVector(rng);
        dots.push({ pos, level: dotLevel(rng, style.how, style.levels), cosRadius });
    }
    if (style.size === 'distance') {
        for (const d of dots) {
            const depth = 1 + (MAX_DOT_DEPTH - 1) * rng();
            d.cosRadius = Math.cos(style.radiusRad / depth);
        }
    }
    return dots;
}

/** Where a dot has moved to after `amount` radians of motion. */
export function moveDot(pos: Vec3, motion: MotionSpec, amount: number): Vec3 {
    const [x, y, z] = pos;
    const phi = Math.atan2(y, x);
    const theta = Math.acos(z > 1 ? 1 : z < -1 ? -1 : z);
    let nphi = phi,
        ntheta = theta;
    switch (motion.kind) {
        case 'rotation':
            nphi = phi + amount;
            break;
        case 'expansion': {
            const t = (theta + amount) % Math.PI;
            ntheta = t < 0 ? t + Math.PI : t;
            break;
        }
        case 'translation': {
            const span = 2 * TRANSLATION_WRAP;
            let d = Math.tan(theta - Math.PI / 2) + amount;
            d = ((((d + TRANSLATION_WRAP) % span) + span) % span) - TRANSLATION_WRAP;
            ntheta = Math.PI / 2 + Math.atan(d);
            break;
        }
    }
    const st = Math.sin(ntheta);
    return [st * Math.cos(nphi), st * Math.sin(nphi), Math.cos(ntheta)];
}

/**
 * Frame-by-frame dot sets.  With reRandomize every frame gets a fresh draw;
 *  otherwise the first draw is carried along by the motion.
 */
export function starfieldFrames(
    seed: number,
    count: number,
    style: DotStyle,
    motion: MotionSpec,
    stepRad: number,
    numFrames: number,
    reRandomize: boolean,
): Dot[][] {
    const rng = mulberry32(seed);
    const frames: Dot[][] = [];
    const base = scatterDots(rng, count, style);
    for (let f = 0; f < numFrames; ++f) {
        if (reRandomize) {
            frames.push(f === 0 ? base : scatterDots(rng, count, style));
        } else {
            frames.push(f === 0 ? base : base.map((d) => ({ ...d, pos: moveDot(d.pos, motion, f * stepRad) })));
        }
    }
    return frames;
}

/**
 * Intensity at one sample direction.  Which dot wins where dots overlap is the occlusion policy:
 *  closest - the dot whose center is nearest
 *  sum     - all overlapping levels added, clamped to maxLevel
 *  mean    - the average of the overlapping levels
 * Returns undefined where no dot covers the sample.
 */
export function dotIntensity(
    dots: Dot[],
    x: number,
    y: number,
    z: number,
    occlusion: DotOcclusion,
    maxLevel: number,
): number | undefined {
    let best = -2;
    let bestLevel = 0;
    let sum = 0;
    let n = 0;
    for (const d of dots) {
        const c = d.pos[0] * x + d.pos[1] * y + d.pos[2] * z;
        if (c < d.cosRadius) continue;
        ++n;
        sum += d.level;
        if (c > best) {
            best = c;
            bestLevel = d.level;
        }
    }
    if (!n) return undefined;
    switch (occlusion) {
        case 'closest':
            return bestLevel;
        case 'sum':
            return Math.min(sum, maxLevel);
        case 'mean':
            return sum / n;
    }
}
