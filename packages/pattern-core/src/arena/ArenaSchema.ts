import { z } from 'zod';

const vec3 = z.tuple([z.number(), z.number(), z.number()]);

// What arrives from a config file.  Everything beyond the grid shape is optional.
export const rawArenaConfigSchema = z.object({
    name: z.string().optional(),
    arenaId: z.number().int().min(0).max(255).optional(),
    generation: z.union([z.string(), z.number().int()]),
    numRows: z.number().int().min(1).max(255),
    numCols: z.number().int().min(1).max(255),
    columnsInstalled: z.union([z.literal('all'), z.null(), z.array(z.number().int())]).optional(),
    orientation: z.enum(['normal', 'flipped', 'upside_down']).optional(),
    columnOrder: z.enum(['cw', 'ccw']).optional(),
    angleOffsetDeg: z.number().finite().optional(),
    model: z.enum(['poly', 'smooth']).optional(),
    rotationsDeg: vec3.optional(),
    translations: vec3.optional(),
});

export type RawArenaConfig = z.infer<typeof rawArenaConfigSchema>;

export const arenaConfigFileSchema = z.object({
    formatVersion: z.number().int().optional(),
    description: z.string().optional(),
    arena: rawArenaConfigSchema,
});

export type ArenaConfigFile = z.infer<typeof arenaConfigFileSchema>;
