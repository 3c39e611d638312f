import { ArenaConfig, PanelCoordinate } from '../types/DataTypes';
import { PatternError, invalidParameter } from '../types/PatternError';
import { arenaDimensions } from '../arena/ArenaModel';
import { Mat3, applyMat, deg2rad, eulerRotation, matMul, rotY, toCoordinate } from './SphereMath';

export interface ProjectionOptions {
    /** Observer-relative tilt about y, applied after the arena's own transforms */
    arenaPitchRad?: number;
}

/**
 * Everything needed to place a pixel, worked out once per arena.
 */
class ArenaLayout {
    readonly N: number;
    readonly W: number;
    readonly H: number;
    readonly pitch: number; // pixel pitch, in units of the apothem (poly) or radius (smooth)
    readonly dir: number; // +1 when pixel columns run counter-clockwise
    readonly colCenters: number[]; // center azimuth of each installed column
    readonly transform: Mat3;
    readonly translation: [number, number, number];

    constructor(readonly arena: ArenaConfig, opts?: ProjectionOptions) {
        const dims = arenaDimensions(arena);
        this.N = dims.pixelsPerPanel;
        this.W = dims.totalPixelsX;
        this.H = dims.totalPixelsY;

        const alpha = (2 * Math.PI) / arena.numColsFull;
        this.pitch = arena.model === 'poly' ? (2 * Math.tan(alpha / 2)) / this.N : alpha / this.N;

        // The c0 / cN-1 boundary is due south (-y); cw arenas count columns clockwise from it
        const offset = deg2rad(arena.angleOffsetDeg);
        this.dir = arena.columnOrder === 'cw' ? -1 : 1;
        this.colCenters = arena.columnsInstalled.map(
            (c) => -Math.PI / 2 + this.dir * (alpha / 2 + c * alpha) + offset,
        );

        const [yaw, pitch, roll] = arena.rotationsDeg;
        const arenaRot = eulerRotation(deg2rad(yaw), deg2rad(pitch), deg2rad(roll));
        this.transform = matMul(rotY(opts?.arenaPitchRad ?? 0), arenaRot);
        const [tx, ty, tz] = arena.translations;
        this.translation = applyMat(rotY(opts?.arenaPitchRad ?? 0), tx, ty, tz);
    }

    /**
     * Point on the arena surface for (fractional) pixel coordinates.
     *  u, v are pixel-unit offsets from the pixel center, each in (-0.5, 0.5).
     */
    point(row: number, col: number, du: number, dv: number): [number, number, number] {
        const k = Math.floor(col / this.N);
        const j = col - k * this.N;
        let lateral = (j + 0.5 + du - this.N / 2) * this.pitch * this.dir;
        let z = (row + 0.5 + dv - this.H / 2) * this.pitch;
        if (this.arena.orientation === 'flipped') {
            lateral = -lateral;
            z = -z;
        }

        const phic = this.colCenters[k];
        let x: number, y: number;
        if (this.arena.model === 'poly') {
            const c = Math.cos(phic),
                s = Math.sin(phic);
            x = c - lateral * s;
            y = s + lateral * c;
        } else {
            x = Math.cos(phic + lateral);
            y = Math.sin(phic + lateral);
        }

        const [rx, ry, rz] = applyMat(this.transform, x, y, z);
        return [rx + this.translation[0], ry + this.translation[1], rz + this.translation[2]];
    }

    checkPixel(row: number, col: number) {
        if (!Number.isInteger(row) || !Number.isInteger(col) || row < 0 || col < 0 || row >= this.H || col >= this.W) {
            throw new PatternError('DimensionMismatch', `Pixel (${row}, ${col}) outside ${this.H}x${this.W} arena`);
        }
    }
}

/** Sub-pixel offsets for s samples per axis: (i + 0.5) / s - 0.5 */
export function sampleOffsets(samplesPerAxis: number): number[] {
    if (!Number.isInteger(samplesPerAxis) || samplesPerAxis < 1) {
        invalidParameter(`Samples per axis must be a positive integer, got ${samplesPerAxis}`);
    }
    return Array.from({ length: samplesPerAxis }, (_v, i) => (i + 0.5) / samplesPerAxis - 0.5);
}

/** Direction of the center of one pixel, as seen by the observer at the origin. */
export function project(arena: ArenaConfig, pixelRow: number, pixelCol: number, opts?: ProjectionOptions): PanelCoordinate {
    const layout = new ArenaLayout(arena, opts);
    layout.checkPixel(pixelRow, pixelCol);
    return toCoordinate(...layout.point(pixelRow, pixelCol, 0, 0));
}

/** samplesPerAxis^2 directions spread over one pixel, row-of-samples major. */
export function projectSamples(
    arena: ArenaConfig,
    pixelRow: number,
    pixelCol: number,
    samplesPerAxis: number,
    opts?: ProjectionOptions,
): PanelCoordinate[] {
    const layout = new ArenaLayout(arena, opts);
    layout.checkPixel(pixelRow, pixelCol);
    const offs = sampleOffsets(samplesPerAxis);
    const res: PanelCoordinate[] = [];
    for (const dv of offs) {
        for (const du of offs) {
            res.push(toCoordinate(...layout.point(pixelRow, pixelCol, du, dv)));
        }
    }
    return res;
}

export interface SampleField {
    width: number;
    height: number;
    samplesPerPixel: number;
    // Unit vectors, xyz interleaved; pixel (r, c) sample s is at ((r * width + c) * samplesPerPixel + s) * 3
    xyz: Float64Array;
}

/** Every sample of every pixel, for the generator. */
export function arenaSampleField(arena: ArenaConfig, samplesPerAxis: number, opts?: ProjectionOptions): SampleField {
    const layout = new ArenaLayout(arena, opts);
    const offs = sampleOffsets(samplesPerAxis);
    const spp = offs.length * offs.length;
    const xyz = new Float64Array(layout.W * layout.H * spp * 3);
    let o = 0;
    for (let r = 0; r < layout.H; ++r) {
        for (let c = 0; c < layout.W; ++c) {
            for (const dv of offs) {
                for (const du of offs) {
                    const [x, y, z] = layout.point(r, c, du, dv);
                    const len = Math.hypot(x, y, z);
                    xyz[o++] = x / len;
                    xyz[o++] = y / len;
                    xyz[o++] = z / len;
                }
            }
        }
    }
    return { width: layout.W, height: layout.H, samplesPerPixel: spp, xyz };
}
