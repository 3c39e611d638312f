import { describe, it, expect } from 'vitest';

import { GenerationRegistry, builtinRegistryTable } from '../src/registry/GenerationRegistry';
import { resolveArenaConfig } from '../src/arena/ArenaModel';
import { arenaSampleField, project, projectSamples, sampleOffsets } from '../src/geometry/ArenaGeometry';
import { applyMat, deg2rad, lonLatToVector, poleRotation, rad2deg } from '../src/geometry/SphereMath';

const registry = new GenerationRegistry(builtinRegistryTable);

function smoothG6(extra: Record<string, unknown> = {}) {
    return resolveArenaConfig({ generation: 'G6', numRows: 2, numCols: 10, model: 'smooth', ...extra }, registry);
}

describe('project', () => {
    it('places the first pixel just past due south, in the column direction', () => {
        // 36 degree columns, 1.8 degrees per pixel; pixel 0 center is 9.5 pixels from its column center
        expect(rad2deg(project(smoothG6(), 0, 0).azimuth)).toBeCloseTo(-90.9, 9);
        expect(rad2deg(project(smoothG6({ columnOrder: 'ccw' }), 0, 0).azimuth)).toBeCloseTo(-89.1, 9);
    });

    it('steps one pixel pitch per column', () => {
        const a = smoothG6();
        const d = rad2deg(project(a, 0, 1).azimuth) - rad2deg(project(a, 0, 0).azimuth);
        expect(d).toBeCloseTo(-1.8, 9);
    });

    it('is symmetric about the equator', () => {
        const a = smoothG6();
        const below = project(a, 19, 5);
        const above = project(a, 20, 5);
        expect(below.elevation).toBeLessThan(0);
        expect(above.elevation).toBeCloseTo(-below.elevation, 12);
        expect(project(a, 0, 5).elevation).toBeCloseTo(-project(a, 39, 5).elevation, 12);
    });

    it('mirrors a flipped arena', () => {
        const normal = project(smoothG6(), 0, 0);
        const flipped = project(smoothG6({ orientation: 'flipped' }), 0, 0);
        expect(flipped.elevation).toBeCloseTo(-normal.elevation, 12);
        expect(rad2deg(flipped.azimuth)).toBeCloseTo(-125.1, 9);
    });

    it('returns unit vectors for the flat-panel model', () => {
        const a = resolveArenaConfig({ generation: 'G4', numRows: 4, numCols: 12 }, registry);
        const c = project(a, 10, 33);
        expect(Math.hypot(c.x, c.y, c.z)).toBeCloseTo(1, 12);
    });

    it('rejects pixels outside the arena', () => {
        const a = smoothG6();
        expect(() => project(a, 40, 0)).toThrowError(/^DimensionMismatch:/);
        expect(() => project(a, 0, 200)).toThrowError(/^DimensionMismatch:/);
        expect(() => project(a, -1, 0)).toThrowError(/^DimensionMismatch:/);
        expect(() => project(a, 1.5, 0)).toThrowError(/^DimensionMismatch:/);
    });
});

describe('arena placement', () => {
    it('turns the whole arena by its yaw', () => {
        expect(rad2deg(project(smoothG6({ rotationsDeg: [30, 0, 0] }), 0, 0).azimuth)).toBeCloseTo(-60.9, 9);
    });

    it('shifts the arena by its translation', () => {
        // Unit cylinder: a pixel's height is tan(elevation), so a lift of 0.5 adds 0.5 to it
        const base = project(smoothG6(), 3, 7);
        const lifted = project(smoothG6({ translations: [0, 0, 0.5] }), 3, 7);
        expect(lifted.elevation).toBeCloseTo(Math.atan(Math.tan(base.elevation) + 0.5), 12);
        expect(lifted.azimuth).toBeCloseTo(base.azimuth, 12);
    });

    it('tilts every pixel by the arena pitch about y', () => {
        const a = smoothG6();
        const p = deg2rad(10);
        for (const [r, c] of [
            [0, 0],
            [20, 55],
            [39, 199],
        ]) {
            const b = project(a, r, c);
            const x = Math.cos(p) * b.x + Math.sin(p) * b.z;
            const z = -Math.sin(p) * b.x + Math.cos(p) * b.z;
            const tilted = project(a, r, c, { arenaPitchRad: p });
            expect(tilted.elevation).toBeCloseTo(Math.atan2(z, Math.hypot(x, b.y)), 12);
            expect(tilted.azimuth).toBeCloseTo(Math.atan2(b.y, x), 12);
        }
    });
});

describe('projectSamples', () => {
    it('spreads s*s samples around the pixel center', () => {
        const a = smoothG6();
        const samples = projectSamples(a, 0, 0, 3);
        expect(samples).toHaveLength(9);
        const meanAz = samples.reduce((acc, s) => acc + rad2deg(s.azimuth), 0) / samples.length;
        expect(meanAz).toBeCloseTo(-90.9, 9);
    });

    it('needs a positive sample count', () => {
        expect(() => projectSamples(smoothG6(), 0, 0, 0)).toThrowError(/^InvalidParameter:/);
        expect(sampleOffsets(1)).toEqual([0]);
        expect(sampleOffsets(2)).toEqual([-0.25, 0.25]);
    });
});

describe('arenaSampleField', () => {
    it('matches project() at one sample per pixel', () => {
        const a = smoothG6({ columnsInstalled: [1, 2, 3, 4, 5, 6, 7, 8] });
        const field = arenaSampleField(a, 1);
        expect(field.width).toBe(160);
        expect(field.height).toBe(40);
        expect(field.xyz.length).toBe(160 * 40 * 3);
        const c = project(a, 3, 7);
        const o = (3 * 160 + 7) * 3;
        expect(field.xyz[o]).toBeCloseTo(c.x, 12);
        expect(field.xyz[o + 1]).toBeCloseTo(c.y, 12);
        expect(field.xyz[o + 2]).toBeCloseTo(c.z, 12);
    });
});

describe('poleRotation', () => {
    it('carries the chosen direction onto +z', () => {
        const lon = deg2rad(30),
            lat = deg2rad(20);
        const [x, y, z] = applyMat(poleRotation(lon, lat), ...lonLatToVector(lon, lat));
        expect(x).toBeCloseTo(0, 12);
        expect(y).toBeCloseTo(0, 12);
        expect(z).toBeCloseTo(1, 12);
    });
});
