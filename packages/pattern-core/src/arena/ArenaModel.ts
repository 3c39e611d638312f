import { ArenaConfig, ArenaDimensions, GenerationSpec, Vec3 } from '../types/DataTypes';
import { PatternError, invalidParameter } from '../types/PatternError';
import { GenerationRegistry, UNSPECIFIED_ID, UNSPECIFIED_NAME } from '../registry/GenerationRegistry';
import { RawArenaConfig, rawArenaConfigSchema } from './ArenaSchema';

// 6 mask bytes in the extended header
export const MAX_PANELS = 48;

function resolveGeneration(gen: string | number, registry: GenerationRegistry): GenerationSpec {
    const spec = typeof gen === 'number' ? registry.generationSpec(gen) : registry.generationByName(gen);
    if (!spec) {
        if (typeof gen === 'string' && gen.trim().toUpperCase() === 'G5') {
            invalidParameter('G5 panels are no longer supported; use G6 for 20x20 panels');
        }
        invalidParameter(`Unknown generation ${gen}`);
    }
    return spec;
}

/**
 * Normalize a loose arena description into a fully-resolved ArenaConfig.
 * "All columns" becomes an explicit list here and nowhere else.
 */
export function resolveArenaConfig(raw: unknown, registry: GenerationRegistry): ArenaConfig {
    const parsed = rawArenaConfigSchema.safeParse(raw);
    if (!parsed.success) {
        const issue = parsed.error.issues[0];
        invalidParameter(`Malformed arena config at '${issue?.path.join('.')}': ${issue?.message}`);
    }
    const r: RawArenaConfig = parsed.data;
    const generation = resolveGeneration(r.generation, registry);

    let columnsInstalled: number[];
    if (r.columnsInstalled === undefined || r.columnsInstalled === null || r.columnsInstalled === 'all') {
        columnsInstalled = Array.from({ length: r.numCols }, (_v, i) => i);
    } else {
        columnsInstalled = [...r.columnsInstalled].sort((a, b) => a - b);
    }

    const rotationsDeg: Vec3 = r.rotationsDeg ? [...r.rotationsDeg] : [0, 0, 0];
    const translations: Vec3 = r.translations ? [...r.translations] : [0, 0, 0];

    const arena: ArenaConfig = {
        name: r.name ?? UNSPECIFIED_NAME,
        arenaId: r.arenaId ?? UNSPECIFIED_ID,
        generation,
        numRows: r.numRows,
        numColsFull: r.numCols,
        columnsInstalled,
        orientation: r.orientation === 'flipped' || r.orientation === 'upside_down' ? 'flipped' : 'normal',
        columnOrder: r.columnOrder ?? 'cw',
        angleOffsetDeg: r.angleOffsetDeg ?? 0,
        model: r.model ?? 'poly',
        rotationsDeg,
        translations,
    };

    checkArenaConfig(arena);

    // Fill in whichever of name / id the registry knows
    if (arena.arenaId === UNSPECIFIED_ID && arena.name !== UNSPECIFIED_NAME) {
        arena.arenaId = registry.arenaIdFor(generation.id, arena.name) ?? UNSPECIFIED_ID;
    } else if (arena.arenaId !== UNSPECIFIED_ID && arena.name === UNSPECIFIED_NAME) {
        arena.name = registry.resolveArenaName(generation.id, arena.arenaId) ?? UNSPECIFIED_NAME;
    }
    return arena;
}

/** A registered arena by name, resolved. */
export function registeredArena(registry: GenerationRegistry, generation: string, name: string): ArenaConfig {
    const gen = resolveGeneration(generation, registry);
    const id = registry.arenaIdFor(gen.id, name);
    const entry = id === undefined ? undefined : registry.arenaEntry(gen.id, id);
    if (!entry?.arena) {
        throw new PatternError('UnregisteredId', `Arena ${name} is not registered for ${gen.name}`);
    }
    return resolveArenaConfig({ ...entry.arena, name: entry.name, arenaId: entry.id }, registry);
}

function checkCount(v: number, what: string) {
    if (!Number.isInteger(v) || v < 1 || v > 255) invalidParameter(`${what} ${v} outside 1-255`);
}

/**
 * The grid invariants every consumer relies on, for arenas that did not come through
 *  resolveArenaConfig.  Throws InvalidParameter.
 */
export function checkArenaConfig(arena: ArenaConfig) {
    checkCount(arena.numRows, 'Row count');
    checkCount(arena.numColsFull, 'Column count');
    const cols = arena.columnsInstalled;
    if (!cols.length) {
        invalidParameter('An arena needs at least one installed column');
    }
    for (let i = 0; i < cols.length; ++i) {
        const c = cols[i];
        if (!Number.isInteger(c) || c < 0 || c >= arena.numColsFull) {
            invalidParameter(`Installed column ${c} outside [0, ${arena.numColsFull})`);
        }
        if (i > 0 && cols[i - 1] === c) {
            invalidParameter(`Installed column ${c} listed twice`);
        }
        if (i > 0 && cols[i - 1] > c) {
            invalidParameter(`Installed columns must be in ascending order, got ${cols.join(',')}`);
        }
    }
}

export function arenaDimensions(arena: ArenaConfig): ArenaDimensions {
    checkArenaConfig(arena);
    const ppp = arena.generation.pixelsPerPanel;
    const installedColumnCount = arena.columnsInstalled.length;
    return {
        pixelsPerPanel: ppp,
        installedColumnCount,
        totalPixelsX: installedColumnCount * ppp,
        totalPixelsY: arena.numRows * ppp,
        numPanels: installedColumnCount * arena.numRows,
    };
}

/**
 * Panel presence bitmask: bit i (byte i>>3, bit i&7) is set for each of the
 *  rows * installedColumns panels, numbered row-major over installed panels.
 */
export function panelPresenceMask(rows: number, installedColumns: number): Uint8Array {
    const n = rows * installedColumns;
    if (n > MAX_PANELS) {
        invalidParameter(`${n} panels exceeds the ${MAX_PANELS} panel mask`);
    }
    const mask = new Uint8Array(MAX_PANELS / 8);
    for (let i = 0; i < n; ++i) {
        mask[i >> 3] |= 1 << (i & 7);
    }
    return mask;
}

export function countMaskPanels(mask: Uint8Array): number {
    let n = 0;
    for (const b of mask) {
        for (let v = b; v; v &= v - 1) ++n;
    }
    return n;
}

/** Radius of the circle inscribed in the full panel polygon */
export function innerRadiusMm(arena: ArenaConfig): number {
    const alpha = (2 * Math.PI) / arena.numColsFull;
    return arena.generation.panelWidthMm / (2 * Math.tan(alpha / 2));
}

/** Horizontal degrees per pixel at the equator */
export function degreesPerPixel(arena: ArenaConfig): number {
    return 360 / (arena.numColsFull * arena.generation.pixelsPerPanel);
}

/** Stand-in arena for a grid the registry could not identify: columns 0..cols-1 of cols. */
export function contiguousArena(generation: GenerationSpec, rows: number, cols: number): ArenaConfig {
    return {
        name: UNSPECIFIED_NAME,
        arenaId: UNSPECIFIED_ID,
        generation,
        numRows: rows,
        numColsFull: cols,
        columnsInstalled: Array.from({ length: cols }, (_v, i) => i),
        orientation: 'normal',
        columnOrder: 'cw',
        angleOffsetDeg: 0,
        model: 'poly',
        rotationsDeg: [0, 0, 0],
        translations: [0, 0, 0],
    };
}

export function describeArena(arena: ArenaConfig): string {
    const d = arenaDimensions(arena);
    const grid =
        d.installedColumnCount < arena.numColsFull
            ? `${arena.numRows}x${d.installedColumnCount}of${arena.numColsFull}`
            : `${arena.numRows}x${arena.numColsFull}`;
    return `${d.numPanels} panels (${grid}), ${d.totalPixelsY}x${d.totalPixelsX} px, ${degreesPerPixel(arena).toFixed(3)} deg/px`;
}
