import { describe, it, expect } from 'vitest';

import {
    GenerationRegistry,
    arenaIdCategory,
    builtinRegistryTable,
    normalizeGenerationName,
} from '../src/registry/GenerationRegistry';

const registry = new GenerationRegistry(builtinRegistryTable);

describe('GenerationRegistry', () => {
    it('looks generations up by id', () => {
        expect(registry.generationSpec(4)?.name).toBe('G6');
        expect(registry.generationSpec(4)?.pixelsPerPanel).toBe(20);
        expect(registry.generationSpec(1)?.fileFamily).toBe('compact');
        expect(registry.generationSpec(9)).toBeUndefined();
        expect(registry.generations().map((g) => g.id)).toEqual([1, 2, 3, 4]);
    });

    it('accepts both spellings of G4.1', () => {
        expect(normalizeGenerationName('g4.1')).toBe('G41');
        expect(registry.generationByName('G4.1')?.id).toBe(3);
        expect(registry.generationByName('G41')?.id).toBe(3);
        expect(registry.generationByName(' g6 ')?.id).toBe(4);
        expect(registry.generationByName('G5')).toBeUndefined();
    });

    it('resolves arena names and ids per generation', () => {
        expect(registry.resolveArenaName(4, 2)).toBe('G6_2x8of10');
        expect(registry.resolveArenaName(4, 0)).toBe('unspecified');
        expect(registry.resolveArenaName(4, 99)).toBeUndefined();
        expect(registry.arenaIdFor(2, 'G4_3x12of18')).toBe(2);
        // Ids are scoped to their generation
        expect(registry.arenaIdFor(4, 'G4_4x12')).toBeUndefined();
        expect(registry.arenaEntry(3, 2)?.name).toBe('G41_2x12_ccw');
    });

    it('hands out frozen generation specs', () => {
        const g = registry.generationSpec(1);
        expect(g && Object.isFrozen(g)).toBe(true);
    });

    it('categorizes arena ids', () => {
        expect(arenaIdCategory(0)).toBe('unspecified');
        expect(arenaIdCategory(1)).toBe('maintainer');
        expect(arenaIdCategory(10)).toBe('maintainer');
        expect(arenaIdCategory(11)).toBe('community');
        expect(arenaIdCategory(200)).toBe('community');
        expect(arenaIdCategory(201)).toBe('user');
        expect(arenaIdCategory(254)).toBe('user');
        expect(arenaIdCategory(255)).toBe('reserved');
    });

    it('ignores arena lists for generations it does not know', () => {
        const r = new GenerationRegistry({
            generations: builtinRegistryTable.generations.filter((g) => g.name !== 'G6'),
            arenas: builtinRegistryTable.arenas,
        });
        expect(r.resolveArenaName(4, 1)).toBeUndefined();
        expect(r.resolveArenaName(1, 1)).toBe('G3_4x12');
    });
});
