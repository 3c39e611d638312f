import { describe, it, expect } from 'vitest';

import { GenerationRegistry, builtinRegistryTable } from '../src/registry/GenerationRegistry';
import {
    arenaDimensions,
    checkArenaConfig,
    countMaskPanels,
    degreesPerPixel,
    describeArena,
    innerRadiusMm,
    panelPresenceMask,
    registeredArena,
    resolveArenaConfig,
} from '../src/arena/ArenaModel';

const registry = new GenerationRegistry(builtinRegistryTable);

describe('resolveArenaConfig', () => {
    it('fills in defaults', () => {
        const a = resolveArenaConfig({ generation: 'G6', numRows: 2, numCols: 10 }, registry);
        expect(a.generation.name).toBe('G6');
        expect(a.columnsInstalled).toEqual([0, 1, 2, 3, 4, 5, 6, 7, 8, 9]);
        expect(a.orientation).toBe('normal');
        expect(a.columnOrder).toBe('cw');
        expect(a.model).toBe('poly');
        expect(a.angleOffsetDeg).toBe(0);
        expect(a.rotationsDeg).toEqual([0, 0, 0]);
        expect(a.translations).toEqual([0, 0, 0]);
        expect(a.name).toBe('unspecified');
        expect(a.arenaId).toBe(0);
    });

    it('sizes a partial arena by its installed columns', () => {
        const a = resolveArenaConfig(
            { generation: 'G6', numRows: 2, numCols: 10, columnsInstalled: [1, 2, 3, 4, 5, 6, 7, 8] },
            registry,
        );
        expect(arenaDimensions(a)).toEqual({
            pixelsPerPanel: 20,
            installedColumnCount: 8,
            totalPixelsX: 160,
            totalPixelsY: 40,
            numPanels: 16,
        });
    });

    it('sorts installed columns and takes "all" or null as every column', () => {
        const sorted = resolveArenaConfig({ generation: 'G4', numRows: 1, numCols: 12, columnsInstalled: [3, 1, 2] }, registry);
        expect(sorted.columnsInstalled).toEqual([1, 2, 3]);
        const all = resolveArenaConfig({ generation: 'G4', numRows: 1, numCols: 3, columnsInstalled: 'all' }, registry);
        expect(all.columnsInstalled).toEqual([0, 1, 2]);
        const nul = resolveArenaConfig({ generation: 'G4', numRows: 1, numCols: 3, columnsInstalled: null }, registry);
        expect(nul.columnsInstalled).toEqual([0, 1, 2]);
    });

    it('maps upside_down onto flipped', () => {
        const a = resolveArenaConfig({ generation: 'G4.1', numRows: 2, numCols: 12, orientation: 'upside_down' }, registry);
        expect(a.orientation).toBe('flipped');
        expect(a.generation.id).toBe(3);
    });

    it('fills in the registered id or name', () => {
        const byName = resolveArenaConfig({ name: 'G6_2x10', generation: 'G6', numRows: 2, numCols: 10 }, registry);
        expect(byName.arenaId).toBe(1);
        const byId = resolveArenaConfig(
            { arenaId: 2, generation: 4, numRows: 2, numCols: 10, columnsInstalled: [1, 2, 3, 4, 5, 6, 7, 8] },
            registry,
        );
        expect(byId.name).toBe('G6_2x8of10');
    });

    it('rejects bad configs', () => {
        const base = { generation: 'G6', numRows: 2, numCols: 10 };
        expect(() => resolveArenaConfig({ ...base, columnsInstalled: [1, 1] }, registry)).toThrowError(/^InvalidParameter:/);
        expect(() => resolveArenaConfig({ ...base, columnsInstalled: [10] }, registry)).toThrowError(/^InvalidParameter:/);
        expect(() => resolveArenaConfig({ ...base, columnsInstalled: [] }, registry)).toThrowError(/^InvalidParameter:/);
        expect(() => resolveArenaConfig({ ...base, numRows: 0 }, registry)).toThrowError(/^InvalidParameter:/);
        expect(() => resolveArenaConfig({ ...base, model: 'round' }, registry)).toThrowError(/^InvalidParameter:/);
        expect(() => resolveArenaConfig({ ...base, generation: 'G7' }, registry)).toThrowError(
            'InvalidParameter: Unknown generation G7',
        );
        expect(() => resolveArenaConfig({ ...base, generation: 'G5' }, registry)).toThrowError(/G5 panels are no longer supported/);
        expect(() => resolveArenaConfig('G6_2x10', registry)).toThrowError(/^InvalidParameter:/);
    });
});

describe('checkArenaConfig', () => {
    const good = resolveArenaConfig({ generation: 'G6', numRows: 2, numCols: 10 }, registry);

    it('holds hand-built arenas to the same grid rules', () => {
        expect(() => checkArenaConfig(good)).not.toThrow();
        expect(() => arenaDimensions({ ...good, columnsInstalled: [3, 3] })).toThrowError(
            'InvalidParameter: Installed column 3 listed twice',
        );
        expect(() => arenaDimensions({ ...good, columnsInstalled: [] })).toThrowError(
            'InvalidParameter: An arena needs at least one installed column',
        );
        expect(() => arenaDimensions({ ...good, columnsInstalled: [4, 2] })).toThrowError(
            'InvalidParameter: Installed columns must be in ascending order, got 4,2',
        );
        expect(() => arenaDimensions({ ...good, columnsInstalled: [-1] })).toThrowError(
            'InvalidParameter: Installed column -1 outside [0, 10)',
        );
        expect(() => arenaDimensions({ ...good, numRows: 0 })).toThrowError('InvalidParameter: Row count 0 outside 1-255');
        expect(() => arenaDimensions({ ...good, columnsInstalled: [1.5] })).toThrowError(/^InvalidParameter:/);
    });
});

describe('registeredArena', () => {
    it('resolves registered arenas by name', () => {
        const a = registeredArena(registry, 'G6', 'G6_2x8of10');
        expect(a.arenaId).toBe(2);
        expect(a.columnsInstalled).toEqual([1, 2, 3, 4, 5, 6, 7, 8]);
        expect(describeArena(a)).toBe('16 panels (2x8of10), 40x160 px, 1.800 deg/px');
    });

    it('reports names the registry does not have', () => {
        expect(() => registeredArena(registry, 'G6', 'G6_9x9')).toThrowError(/^UnregisteredId:/);
    });
});

describe('panelPresenceMask', () => {
    it('sets one bit per panel, LSB first', () => {
        expect(Array.from(panelPresenceMask(2, 8))).toEqual([0xff, 0xff, 0, 0, 0, 0]);
        expect(Array.from(panelPresenceMask(2, 10))).toEqual([0xff, 0xff, 0x0f, 0, 0, 0]);
        expect(Array.from(panelPresenceMask(1, 3))).toEqual([0x07, 0, 0, 0, 0, 0]);
        expect(Array.from(panelPresenceMask(3, 16))).toEqual([0xff, 0xff, 0xff, 0xff, 0xff, 0xff]);
        expect(countMaskPanels(panelPresenceMask(2, 10))).toBe(20);
    });

    it('refuses more than 48 panels', () => {
        expect(() => panelPresenceMask(7, 7)).toThrowError(/^InvalidParameter:/);
    });
});

describe('arena measurements', () => {
    const g6 = registeredArena(registry, 'G6', 'G6_2x10');

    it('computes degrees per pixel from the full column count', () => {
        expect(degreesPerPixel(g6)).toBeCloseTo(1.8, 12);
        expect(degreesPerPixel(registeredArena(registry, 'G6', 'G6_2x8of10'))).toBeCloseTo(1.8, 12);
    });

    it('computes the inscribed radius', () => {
        expect(innerRadiusMm(g6)).toBeCloseTo(69.8634163, 6);
    });
});
