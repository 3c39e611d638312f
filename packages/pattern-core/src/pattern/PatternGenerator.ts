import { ArenaConfig, PatternSet, maxPixelValue } from '../types/DataTypes';
import { arenaDimensions, degreesPerPixel } from '../arena/ArenaModel';
import { SampleField, arenaSampleField } from '../geometry/ArenaGeometry';
import { Mat3, applyMat, deg2rad, equatorRotation, poleRotation } from '../geometry/SphereMath';
import { quantize } from '../util/Rounding';
import { maskVisibility } from './Masks';
import { DotStyle, dotIntensity, starfieldFrames } from './Starfield';
import { DEFAULT_AA_SAMPLES, LoomProfile, MotionSpec, PatternParams, checkFrameCount, validatePatternParams } from './PatternParams';

const TWO_PI = 2 * Math.PI;

/** Intensity of a visible sample in a given frame */
type SampleShader = (frame: number, sample: number) => number;

/**
 * Orientation of the pattern's own frame, in which the pole is +z.
 */
export function patternRotation(params: PatternParams): Mat3 {
    const fov = params.fov;
    if (fov.kind === 'fullField') {
        return poleRotation(deg2rad(fov.poleLonDeg), deg2rad(fov.poleLatDeg));
    }
    // validatePatternParams guarantees the mask for local patterns
    const az = deg2rad(params.saMask?.azDeg ?? 0);
    const el = deg2rad(params.saMask?.elDeg ?? 0);
    const angle = deg2rad(fov.motionAngleDeg);
    const kind = params.pattern.kind === 'looming' ? 'expansion' : params.motion.kind;
    switch (kind) {
        case 'expansion':
            return poleRotation(az, el, angle);
        case 'rotation':
            return equatorRotation(az, el, -angle);
        case 'translation':
            return equatorRotation(az, el, -angle - Math.PI / 2);
    }
}

interface PatternFrameCoords {
    xyz: Float64Array; // sample directions in the pattern frame
    phi: Float64Array; // azimuth about the pole
    theta: Float64Array; // angle from the pole
}

function toPatternFrame(field: SampleField, rot: Mat3): PatternFrameCoords {
    const n = field.xyz.length / 3;
    const xyz = new Float64Array(n * 3);
    const phi = new Float64Array(n);
    const theta = new Float64Array(n);
    for (let i = 0; i < n; ++i) {
        const [x, y, z] = applyMat(rot, field.xyz[i * 3], field.xyz[i * 3 + 1], field.xyz[i * 3 + 2]);
        xyz[i * 3] = x;
        xyz[i * 3 + 1] = y;
        xyz[i * 3 + 2] = z;
        phi[i] = Math.atan2(y, x);
        theta[i] = Math.acos(z > 1 ? 1 : z < -1 ? -1 : z);
    }
    return { xyz, phi, theta };
}

/** The coordinate the motion advances along */
export function motionCoordinate(motion: MotionSpec, pc: PatternFrameCoords): Float64Array {
    switch (motion.kind) {
        case 'rotation':
            return pc.phi;
        case 'expansion':
            return pc.theta;
        case 'translation':
            return pc.theta.map((t) => Math.tan(t - Math.PI / 2));
    }
}

/**
 * Angle from either pattern pole inside which a grating of period sfRad is finer than
 *  pixels of pixelRad can sample.  Undefined where nothing needs masking.
 */
export function poleAliasAngle(motion: MotionSpec, sfRad: number, pixelRad: number): number | undefined {
    const d = sfRad / 2;
    switch (motion.kind) {
        case 'expansion':
            return undefined;
        case 'rotation':
            return pixelRad / d;
        case 'translation': {
            const d1 = -d / 2 + Math.sqrt((d * d) / 4 + d / Math.tan(pixelRad) - 1);
            return Number.isFinite(d1) ? Math.PI / 2 - Math.atan(d1) - pixelRad / 2 : undefined;
        }
    }
}

function gratingFrames(sfRad: number, stepRad: number) {
    const n = Math.max(1, Math.round(sfRad / stepRad));
    return { n, trueStep: sfRad / n };
}

function frac(t: number) {
    return t - Math.floor(t);
}

export function loomingSizes(initialRad: number, finalRad: number, stepRad: number, profile: LoomProfile): number[] {
    const linspace = (a: number, b: number, n: number) =>
        Array.from({ length: n }, (_v, i) => (n === 1 ? a : a + ((b - a) * i) / (n - 1)));

    if (profile.kind === 'constantVelocity') {
        const n = Math.max(2, Math.round((finalRad - initialRad) / stepRad));
        checkFrameCount(n);
        return linspace(initialRad, finalRad, n);
    }
    const lv = profile.lOverV;
    const tauInitial = lv / (2 * Math.tan(initialRad / 2));
    let tauFinal = lv / (2 * Math.tan(finalRad / 2));
    // Past collision (final size of 180 degrees or more)
    if (!(tauFinal > 0)) tauFinal = 0.001;
    const dt = profile.frameRate ? 1 / profile.frameRate : (tauInitial - tauFinal) / 60;
    const n = Math.max(2, Math.ceil((tauInitial - tauFinal) / dt));
    checkFrameCount(n);
    return linspace(tauInitial, tauFinal, n).map((tau) => 2 * Math.atan(lv / (2 * tau)));
}

/**
 * Average each pixel's samples and quantize.  Masked-out samples show the background level.
 */
function renderFrames(
    field: SampleField,
    visibility: Uint8Array,
    background: number,
    maxLevel: number,
    numFrames: number,
    shade: SampleShader,
): Uint8Array[] {
    const npix = field.width * field.height;
    const spp = field.samplesPerPixel;
    const frames: Uint8Array[] = [];
    for (let f = 0; f < numFrames; ++f) {
        const frame = new Uint8Array(npix);
        for (let p = 0; p < npix; ++p) {
            let acc = 0;
            for (let s = p * spp; s < (p + 1) * spp; ++s) {
                acc += visibility[s] ? shade(f, s) : background;
            }
            frame[p] = quantize(acc / spp, maxLevel);
        }
        frames.push(frame);
    }
    return frames;
}

/**
 * Turn stimulus parameters into frames for one arena.  Pure; deterministic given the starfield seed.
 */
export function generate(params: PatternParams, arena: ArenaConfig): PatternSet {
    validatePatternParams(params);

    const dims = arenaDimensions(arena);
    const { high, low, background } = params.levels;
    const maxLevel = maxPixelValue(params.mode);
    const pat = params.pattern;

    const result = (frames: Uint8Array[]): PatternSet => ({
        mode: params.mode,
        width: dims.totalPixelsX,
        height: dims.totalPixelsY,
        frames,
        stretch: frames.map(() => params.stretch),
    });

    if (pat.kind === 'offOn') {
        const npix = dims.totalPixelsX * dims.totalPixelsY;
        return result([new Uint8Array(npix).fill(low), new Uint8Array(npix).fill(high)]);
    }

    const field = arenaSampleField(arena, params.aaSamples ?? DEFAULT_AA_SAMPLES, {
        arenaPitchRad: deg2rad(params.arenaPitchDeg ?? 0),
    });
    const visibility = maskVisibility(field, params.saMask, params.lonLatMask);
    const pc = toPatternFrame(field, patternRotation(params));
    const stepRad = deg2rad(params.stepSizeDeg);
    const phase = deg2rad(params.phaseShiftDeg ?? 0);
    const span = high - low;

    let numFrames: number;
    let shade: SampleShader;

    switch (pat.kind) {
        case 'squareGrating': {
            const sf = deg2rad(pat.spatialFreqDeg);
            const { n, trueStep } = gratingFrames(sf, stepRad);
            const coord = motionCoordinate(params.motion, pc);
            const duty = pat.dutyCycle / 100;
            numFrames = n;
            shade = (f, s) => (frac((coord[s] + phase - f * trueStep) / sf) < duty ? high : low);
            break;
        }
        case 'sineGrating': {
            const sf = deg2rad(pat.spatialFreqDeg);
            const { n, trueStep } = gratingFrames(sf, stepRad);
            const coord = motionCoordinate(params.motion, pc);
            numFrames = n;
            shade = (f, s) => low + (span * (Math.sin((TWO_PI * (coord[s] + phase - f * trueStep)) / sf) + 1)) / 2;
            break;
        }
        case 'edge': {
            const sf = deg2rad(pat.spatialFreqDeg);
            const { n, trueStep } = gratingFrames(sf, stepRad);
            const coord = motionCoordinate(params.motion, pc);
            numFrames = n + 1;
            shade = (f, s) => (frac((coord[s] + phase) / sf) * sf < f * trueStep ? high : low);
            break;
        }
        case 'reversePhi': {
            const sf = deg2rad(pat.spatialFreqDeg);
            const { n, trueStep } = gratingFrames(sf, stepRad);
            const coord = motionCoordinate(params.motion, pc);
            numFrames = n;
            // 50% duty grating whose contrast polarity flips every other frame
            shade = (f, s) => {
                const on = frac((coord[s] + phase - f * trueStep) / sf) < 0.5;
                return on !== (f % 2 === 1) ? high : low;
            };
            break;
        }
        case 'starfield': {
            numFrames = Math.max(1, Math.round(TWO_PI / stepRad));
            checkFrameCount(numFrames);
            const style: DotStyle = {
                how: pat.dotLevel,
                levels: params.levels,
                radiusRad: deg2rad(pat.dotRadiusDeg),
                size: pat.dotSize ?? 'static',
            };
            const dotFrames = starfieldFrames(pat.seed, pat.numDots, style, params.motion, stepRad, numFrames, pat.reRandomize);
            const xyz = pc.xyz;
            shade = (f, s) =>
                dotIntensity(dotFrames[f], xyz[s * 3], xyz[s * 3 + 1], xyz[s * 3 + 2], pat.occlusion, maxLevel) ?? low;
            break;
        }
        case 'looming': {
            const sizes = loomingSizes(deg2rad(pat.initialSizeDeg), deg2rad(pat.finalSizeDeg), stepRad, pat.profile);
            numFrames = sizes.length;
            shade = (f, s) => (pc.theta[s] < sizes[f] ? high : low);
            break;
        }
        default: {
            const never: never = pat;
            throw new Error(`Unhandled pattern ${JSON.stringify(never)}`);
        }
    }

    const gratingLike =
        pat.kind === 'squareGrating' || pat.kind === 'sineGrating' || pat.kind === 'edge' || pat.kind === 'reversePhi';
    if (gratingLike && (params.aaPoles ?? true)) {
        const ns = poleAliasAngle(params.motion, deg2rad(pat.spatialFreqDeg), deg2rad(degreesPerPixel(arena)));
        if (ns !== undefined) {
            const mid = (high + low) / 2;
            const inner = shade;
            shade = (f, s) => (pc.theta[s] < ns || pc.theta[s] > Math.PI - ns ? mid : inner(f, s));
        }
    }

    checkFrameCount(numFrames);
    return result(renderFrames(field, visibility, background, maxLevel, numFrames, shade));
}

/** How many frames generate() will produce, without rendering any. */
export function frameCountFor(params: PatternParams): number {
    validatePatternParams(params);
    const pat = params.pattern;
    const stepRad = deg2rad(params.stepSizeDeg);
    switch (pat.kind) {
        case 'offOn':
            return 2;
        case 'squareGrating':
        case 'sineGrating':
        case 'reversePhi':
            return gratingFrames(deg2rad(pat.spatialFreqDeg), stepRad).n;
        case 'edge':
            return gratingFrames(deg2rad(pat.spatialFreqDeg), stepRad).n + 1;
        case 'starfield':
            return Math.max(1, Math.round(TWO_PI / stepRad));
        case 'looming':
            return loomingSizes(deg2rad(pat.initialSizeDeg), deg2rad(pat.finalSizeDeg), stepRad, pat.profile).length;
    }
}
