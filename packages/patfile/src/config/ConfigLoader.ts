import { z } from 'zod';
import {
    ArenaConfig,
    GenerationRegistry,
    GenerationSpec,
    RegisteredArena,
    RegistryTable,
    arenaConfigFileSchema,
    builtinGenerations,
    invalidParameter,
    normalizeGenerationName,
    rawArenaConfigSchema,
    resolveArenaConfig,
} from '@arenapat/pattern-core';
import { readJsonFile } from '../util/FileUtil';
import { builtinRegistry } from '../formats/PatFile';

const generationSchema = z.object({
    id: z.number().int().min(1).max(7),
    name: z.enum(['G3', 'G4', 'G4.1', 'G6']),
    pixelsPerPanel: z.union([z.literal(8), z.literal(16), z.literal(20)]),
    panelWidthMm: z.number().positive(),
    panelDepthMm: z.number().positive(),
    fileFamily: z.enum(['compact', 'extended']),
});

const registeredArenaSchema = z.object({
    id: z.number().int().min(1).max(255),
    name: z.string().min(1),
    arena: rawArenaConfigSchema.optional(),
});

export const registryFileSchema = z.object({
    formatVersion: z.number().int().optional(),
    generations: z.array(generationSchema).optional(),
    arenas: z.record(z.string(), z.array(registeredArenaSchema)),
});

function issueText(path: string, error: z.ZodError) {
    const issue = error.issues[0];
    return `${path}: '${issue?.path.join('.')}' ${issue?.message}`;
}

/** Arena config JSON (`{ "arena": { ... } }`), validated and resolved. */
export async function loadArenaConfigFile(path: string, registry: GenerationRegistry = builtinRegistry): Promise<ArenaConfig> {
    const parsed = arenaConfigFileSchema.safeParse(await readJsonFile(path));
    if (!parsed.success) {
        invalidParameter(`Malformed arena config ${issueText(path, parsed.error)}`);
    }
    return resolveArenaConfig(parsed.data.arena, registry);
}

/**
 * Registry table JSON.  Generations default to the built-in four; arena lists are
 *  keyed by generation name.
 */
export async function loadRegistryFile(path: string): Promise<GenerationRegistry> {
    const parsed = registryFileSchema.safeParse(await readJsonFile(path));
    if (!parsed.success) {
        invalidParameter(`Malformed registry ${issueText(path, parsed.error)}`);
    }
    const generations: GenerationSpec[] = parsed.data.generations ?? builtinGenerations;
    const table: RegistryTable = { generations, arenas: {} };

    for (const [key, entries] of Object.entries(parsed.data.arenas)) {
        const gen = generations.find((g) => normalizeGenerationName(g.name) === normalizeGenerationName(key));
        if (!gen) invalidParameter(`${path}: arenas listed for unknown generation ${key}`);
        const seenIds = new Set<number>();
        const seenNames = new Set<string>();
        const list: RegisteredArena[] = [];
        for (const e of entries) {
            if (seenIds.has(e.id)) invalidParameter(`${path}: ${gen.name} arena id ${e.id} listed twice`);
            if (seenNames.has(e.name)) invalidParameter(`${path}: ${gen.name} arena name ${e.name} listed twice`);
            seenIds.add(e.id);
            seenNames.add(e.name);
            list.push(e);
        }
        table.arenas[gen.name] = list;
    }
    return new GenerationRegistry(table);
}
