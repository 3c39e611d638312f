import { GrayscaleMode, MAX_FRAMES, maxPixelValue } from '../types/DataTypes';
import { invalidParameter } from '../types/PatternError';

export type DotOcclusion = 'closest' | 'sum' | 'mean';
export type DotLevel = 'fixed' | 'randomSpread' | 'randomBinary';
// static: every dot dotRadiusDeg; distance: scaled down by a random depth
export type DotSize = 'static' | 'distance';

export type LoomProfile =
    | { kind: 'constantVelocity' }
    // l/v in seconds; frameRate in Hz, when omitted the approach is cut into ~60 frames
    | { kind: 'exponential'; lOverV: number; frameRate?: number };

export type PatternSpec =
    | { kind: 'squareGrating'; spatialFreqDeg: number; dutyCycle: number }
    | { kind: 'sineGrating'; spatialFreqDeg: number }
    | { kind: 'edge'; spatialFreqDeg: number }
    | { kind: 'reversePhi'; spatialFreqDeg: number }
    | { kind: 'offOn' }
    | {
          kind: 'starfield';
          numDots: number;
          dotRadiusDeg: number;
          occlusion: DotOcclusion;
          dotLevel: DotLevel;
          reRandomize: boolean;
          seed: number;
          dotSize?: DotSize; // default static
      }
    | { kind: 'looming'; initialSizeDeg: number; finalSizeDeg: number; profile: LoomProfile };

export type PatternKind = PatternSpec['kind'];

export type MotionSpec = { kind: 'rotation' } | { kind: 'translation' } | { kind: 'expansion' };

export type FieldOfView =
    | { kind: 'fullField'; poleLonDeg: number; poleLatDeg: number }
    // Anchored on the solid-angle mask center
    | { kind: 'local'; motionAngleDeg: number };

export interface SolidAngleMask {
    azDeg: number;
    elDeg: number;
    radiusDeg: number;
    invert: boolean;
}

export interface LonLatMask {
    lonMinDeg: number;
    lonMaxDeg: number;
    latMinDeg: number;
    latMaxDeg: number;
    invert: boolean;
}

export interface BrightnessLevels {
    high: number;
    low: number;
    background: number;
}

export interface PatternParams {
    pattern: PatternSpec;
    motion: MotionSpec;
    fov: FieldOfView;
    mode: GrayscaleMode;
    levels: BrightnessLevels;
    stepSizeDeg: number;
    stretch: number;
    arenaPitchDeg?: number;
    phaseShiftDeg?: number;
    aaSamples?: number; // per axis
    aaPoles?: boolean; // default true; gratings under rotation or translation
    saMask?: SolidAngleMask;
    lonLatMask?: LonLatMask;
}

export const DEFAULT_AA_SAMPLES = 3;
export const MAX_AA_SAMPLES = 16;

const finite = (v: number, what: string) => {
    if (!Number.isFinite(v)) invalidParameter(`${what} must be a finite number, got ${v}`);
};

function checkLevel(v: number, what: string, mode: GrayscaleMode) {
    const max = maxPixelValue(mode);
    if (!Number.isInteger(v) || v < 0 || v > max) {
        invalidParameter(`${what} level ${v} outside 0-${max} for ${mode}`);
    }
}

function checkSpatialFreq(sf: number) {
    finite(sf, 'Spatial frequency');
    if (sf <= 0) invalidParameter(`Spatial frequency must be > 0, got ${sf}`);
}

/**
 * Reject anything that cannot generate, before a single frame is built.
 */
export function validatePatternParams(p: PatternParams) {
    if (p.mode !== 'GS2' && p.mode !== 'GS16') invalidParameter(`Unknown grayscale mode ${String(p.mode)}`);
    checkLevel(p.levels.high, 'High', p.mode);
    checkLevel(p.levels.low, 'Low', p.mode);
    checkLevel(p.levels.background, 'Background', p.mode);

    if (!Number.isInteger(p.stretch) || p.stretch < 0 || p.stretch > 255) {
        invalidParameter(`Stretch ${p.stretch} outside 0-255`);
    }

    const aa = p.aaSamples ?? DEFAULT_AA_SAMPLES;
    if (!Number.isInteger(aa) || aa < 1 || aa > MAX_AA_SAMPLES) {
        invalidParameter(`aaSamples ${aa} outside 1-${MAX_AA_SAMPLES}`);
    }
    finite(p.arenaPitchDeg ?? 0, 'Arena pitch');
    finite(p.phaseShiftDeg ?? 0, 'Phase shift');

    const pat = p.pattern;
    const needsStep = pat.kind !== 'offOn' && !(pat.kind === 'looming' && pat.profile.kind === 'exponential');
    if (needsStep) {
        finite(p.stepSizeDeg, 'Step size');
        if (p.stepSizeDeg <= 0) invalidParameter(`Step size must be > 0, got ${p.stepSizeDeg}`);
    }

    switch (pat.kind) {
        case 'squareGrating':
            checkSpatialFreq(pat.spatialFreqDeg);
            if (!Number.isFinite(pat.dutyCycle) || pat.dutyCycle < 1 || pat.dutyCycle > 99) {
                invalidParameter(`Duty cycle ${pat.dutyCycle} outside 1-99`);
            }
            break;
        case 'sineGrating':
        case 'edge':
        case 'reversePhi':
            checkSpatialFreq(pat.spatialFreqDeg);
            break;
        case 'offOn':
            break;
        case 'starfield':
            if (!Number.isInteger(pat.numDots) || pat.numDots < 1) {
                invalidParameter(`numDots must be a positive integer, got ${pat.numDots}`);
            }
            finite(pat.dotRadiusDeg, 'Dot radius');
            if (pat.dotRadiusDeg <= 0 || pat.dotRadiusDeg > 180) {
                invalidParameter(`Dot radius ${pat.dotRadiusDeg} outside (0, 180]`);
            }
            if (!Number.isInteger(pat.seed)) invalidParameter(`Seed must be an integer, got ${pat.seed}`);
            if (pat.dotSize !== undefined && pat.dotSize !== 'static' && pat.dotSize !== 'distance') {
                invalidParameter(`Unknown dot size ${String(pat.dotSize)}`);
            }
            break;
        case 'looming':
            finite(pat.initialSizeDeg, 'Initial size');
            finite(pat.finalSizeDeg, 'Final size');
            if (pat.initialSizeDeg < 0 || pat.initialSizeDeg >= pat.finalSizeDeg) {
                invalidParameter('Looming needs 0 <= initial size < final size');
            }
            if (pat.finalSizeDeg > 360) invalidParameter(`Final size ${pat.finalSizeDeg} above 360`);
            if (pat.profile.kind === 'exponential') {
                if (!(pat.profile.lOverV > 0)) invalidParameter('Exponential looming needs lOverV > 0');
                if (pat.initialSizeDeg <= 0) invalidParameter('Exponential looming needs initial size > 0');
                if (pat.profile.frameRate !== undefined && !(pat.profile.frameRate > 0)) {
                    invalidParameter('frameRate must be > 0');
                }
            }
            break;
        default: {
            const never: never = pat;
            invalidParameter(`Unknown pattern ${JSON.stringify(never)}`);
        }
    }

    if (p.fov.kind === 'fullField') {
        finite(p.fov.poleLonDeg, 'Pole longitude');
        finite(p.fov.poleLatDeg, 'Pole latitude');
        if (Math.abs(p.fov.poleLatDeg) > 90) invalidParameter(`Pole latitude ${p.fov.poleLatDeg} outside [-90, 90]`);
    } else {
        finite(p.fov.motionAngleDeg, 'Motion angle');
        if (!p.saMask) invalidParameter('Local field of view needs a solid-angle mask to center on');
    }

    if (p.saMask) {
        const m = p.saMask;
        finite(m.azDeg, 'Mask azimuth');
        finite(m.elDeg, 'Mask elevation');
        finite(m.radiusDeg, 'Mask radius');
        if (m.radiusDeg < 0 || m.radiusDeg > 180) invalidParameter(`Mask radius ${m.radiusDeg} outside [0, 180]`);
    }
    if (p.lonLatMask) {
        const m = p.lonLatMask;
        [m.lonMinDeg, m.lonMaxDeg, m.latMinDeg, m.latMaxDeg].forEach((v) => finite(v, 'Lon/lat mask bound'));
        if (m.lonMinDeg >= m.lonMaxDeg || m.latMinDeg >= m.latMaxDeg) {
            invalidParameter('Lon/lat mask needs min < max on both axes');
        }
        if (m.lonMaxDeg - m.lonMinDeg > 360) {
            invalidParameter(`Lon/lat mask spans ${m.lonMaxDeg - m.lonMinDeg} degrees of longitude`);
        }
    }
}

export function checkFrameCount(n: number) {
    if (n < 1 || n > MAX_FRAMES) invalidParameter(`Pattern would have ${n} frames; allowed 1-${MAX_FRAMES}`);
}
