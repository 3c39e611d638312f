import { ArenaConfig, PatternSet, describeArena } from '@arenapat/pattern-core';
import { readFilePrefix, readWholeFile, writeFileExclusive } from '../util/FileUtil';
import { Logger, consoleLogger } from '../util/Logger';
import { DecodeOptions, DecodedPattern, EncodeOptions, decodePatternFile, encodePatternFile } from './PatFile';
import { MAX_HEADER_LENGTH, PatFileHeader, parseHeader } from './PatHeader';

export interface SaveOptions extends EncodeOptions {
    /** Replace an existing file; otherwise saving over one fails with EEXIST */
    overwrite?: boolean;
    logger?: Logger;
}

/**
 * Encode first, then write.  A pattern that fails to encode never touches the disk.
 */
export async function savePattern(
    set: PatternSet,
    arena: ArenaConfig,
    path: string,
    options: SaveOptions = {},
): Promise<number> {
    const bytes = encodePatternFile(set, arena, options);
    await writeFileExclusive(path, bytes, options.overwrite ?? false);
    (options.logger ?? consoleLogger).info(
        `Wrote ${path}: ${set.frames.length} ${set.mode} frames for ${arena.name}, ${describeArena(arena)}, ${bytes.length} bytes`,
    );
    return bytes.length;
}

export async function loadPattern(path: string, options: DecodeOptions = {}): Promise<DecodedPattern> {
    return decodePatternFile(await readWholeFile(path), options);
}

/** Just the header; frame data is not read. */
export async function readPatternHeader(path: string): Promise<PatFileHeader> {
    return parseHeader(await readFilePrefix(path, MAX_HEADER_LENGTH));
}
