import { GenerationName, GenerationSpec } from '../types/DataTypes';
import { RawArenaConfig } from '../arena/ArenaSchema';

export interface RegisteredArena {
    id: number;
    name: string;
    arena?: RawArenaConfig;
}

export interface RegistryTable {
    generations: GenerationSpec[];
    // Keyed by generation name; ids are per-generation, G4 arena 1 has nothing to do with G6 arena 1
    arenas: Partial<Record<GenerationName, RegisteredArena[]>>;
}

export const UNSPECIFIED_ID = 0;
export const UNSPECIFIED_NAME = 'unspecified';

export type ArenaIdCategory = 'unspecified' | 'maintainer' | 'community' | 'user' | 'reserved';

/**
 * Documentation/tooling only.  The codecs never look at this.
 */
export function arenaIdCategory(id: number): ArenaIdCategory {
    if (id === 0) return 'unspecified';
    if (id <= 10) return 'maintainer';
    if (id <= 200) return 'community';
    if (id <= 254) return 'user';
    return 'reserved';
}

export function normalizeGenerationName(name: string): string {
    return name.trim().toUpperCase().replace('G4.1', 'G41').replace('.', '');
}

/**
 * Read-only lookups over an explicit table.  Instances never change after construction,
 *  so one can be shared by any number of encoders.
 */
export class GenerationRegistry {
    private readonly byId = new Map<number, GenerationSpec>();
    private readonly byKey = new Map<string, GenerationSpec>();
    private readonly arenas = new Map<number, RegisteredArena[]>();

    constructor(table: RegistryTable) {
        for (const g of table.generations) {
            const spec = Object.freeze({ ...g });
            this.byId.set(g.id, spec);
            this.byKey.set(normalizeGenerationName(g.name), spec);
        }
        for (const [gname, entries] of Object.entries(table.arenas)) {
            const gen = this.byKey.get(normalizeGenerationName(gname));
            if (!gen || !entries) continue;
            this.arenas.set(gen.id, entries.map((e) => Object.freeze({ ...e })));
        }
    }

    generationSpec(id: number): GenerationSpec | undefined {
        return this.byId.get(id);
    }

    generationByName(name: string): GenerationSpec | undefined {
        return this.byKey.get(normalizeGenerationName(name));
    }

    generations(): GenerationSpec[] {
        return [...this.byId.values()].sort((a, b) => a.id - b.id);
    }

    arenaEntry(generationId: number, arenaId: number): RegisteredArena | undefined {
        return this.arenas.get(generationId)?.find((a) => a.id === arenaId);
    }

    resolveArenaName(generationId: number, arenaId: number): string | undefined {
        if (arenaId === UNSPECIFIED_ID) return UNSPECIFIED_NAME;
        return this.arenaEntry(generationId, arenaId)?.name;
    }

    arenaIdFor(generationId: number, name: string): number | undefined {
        return this.arenas.get(generationId)?.find((a) => a.name === name)?.id;
    }
}

export const builtinGenerations: GenerationSpec[] = [
    { id: 1, name: 'G3', pixelsPerPanel: 8, panelWidthMm: 32, panelDepthMm: 18, fileFamily: 'compact' },
    { id: 2, name: 'G4', pixelsPerPanel: 16, panelWidthMm: 40.45, panelDepthMm: 18, fileFamily: 'compact' },
    { id: 3, name: 'G4.1', pixelsPerPanel: 16, panelWidthMm: 40, panelDepthMm: 6.35, fileFamily: 'compact' },
    { id: 4, name: 'G6', pixelsPerPanel: 20, panelWidthMm: 45.4, panelDepthMm: 3.45, fileFamily: 'extended' },
];

const range = (s: number, e: number) => Array.from({ length: e - s }, (_v, i) => s + i);

export const builtinRegistryTable: RegistryTable = {
    generations: builtinGenerations,
    arenas: {
        G3: [{ id: 1, name: 'G3_4x12', arena: { generation: 'G3', numRows: 4, numCols: 12 } }],
        G4: [
            { id: 1, name: 'G4_4x12', arena: { generation: 'G4', numRows: 4, numCols: 12 } },
            {
                id: 2,
                name: 'G4_3x12of18',
                arena: { generation: 'G4', numRows: 3, numCols: 18, columnsInstalled: range(0, 12) },
            },
        ],
        'G4.1': [
            { id: 1, name: 'G41_2x12_cw', arena: { generation: 'G4.1', numRows: 2, numCols: 12, columnOrder: 'cw' } },
            { id: 2, name: 'G41_2x12_ccw', arena: { generation: 'G4.1', numRows: 2, numCols: 12, columnOrder: 'ccw' } },
        ],
        G6: [
            { id: 1, name: 'G6_2x10', arena: { generation: 'G6', numRows: 2, numCols: 10 } },
            {
                id: 2,
                name: 'G6_2x8of10',
                arena: { generation: 'G6', numRows: 2, numCols: 10, columnsInstalled: range(1, 9) },
            },
            {
                id: 3,
                name: 'G6_3x12of18',
                arena: { generation: 'G6', numRows: 3, numCols: 18, columnsInstalled: range(0, 12) },
            },
        ],
    },
};
