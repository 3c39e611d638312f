import {
    ArenaConfig,
    GenerationRegistry,
    GenerationSpec,
    GrayscaleMode,
    MAX_FRAMES,
    MAX_PANELS,
    PatternError,
    PatternSet,
    arenaDimensions,
    builtinRegistryTable,
    contiguousArena,
    countMaskPanels,
    invalidParameter,
    isPatternError,
    panelPresenceMask,
    resolveArenaConfig,
} from '@arenapat/pattern-core';
import { Logger, consoleLogger } from '../util/Logger';
import { toDataView, xorBytes } from '../util/Utils';
import { DecodedPanel, decodePanel, encodePanel, panelBlockLength } from './PanelCodec';
import { FormatVersion, PatFileHeader, checksumOffset, detectFormat, parseHeader, writeHeader } from './PatHeader';

export const FRAME_MARKER = 'FR';
export const FRAME_HEADER_LENGTH = 4;
const FRAME_MARKER_0 = FRAME_MARKER.charCodeAt(0);
const FRAME_MARKER_1 = FRAME_MARKER.charCodeAt(1);

export interface EncodeOptions {
    formatVersion?: FormatVersion; // default 2
    observerId?: number; // extended v2 only
}

export interface DecodeOptions {
    registry?: GenerationRegistry;
    /** Newest header version this decoder accepts; 1 gives a v1-only reader */
    maxFormatVersion?: FormatVersion;
    logger?: Logger;
}

export interface DecodedPattern {
    patternSet: PatternSet;
    arena: ArenaConfig;
    header: PatFileHeader;
}

export const builtinRegistry = new GenerationRegistry(builtinRegistryTable);

export function frameByteLength(header: Pick<PatFileHeader, 'mode' | 'rows' | 'cols'>, panelSize: number) {
    return FRAME_HEADER_LENGTH + header.rows * header.cols * panelBlockLength(header.mode, panelSize);
}

export function expectedFileLength(header: PatFileHeader, panelSize: number) {
    return header.headerLength + header.numFrames * frameByteLength(header, panelSize);
}

function checkPatternSet(set: PatternSet, arena: ArenaConfig) {
    if (set.mode !== 'GS2' && set.mode !== 'GS16') invalidParameter(`Unknown grayscale mode ${String(set.mode)}`);
    const dims = arenaDimensions(arena);
    if (set.width !== dims.totalPixelsX || set.height !== dims.totalPixelsY) {
        throw new PatternError(
            'DimensionMismatch',
            `Pattern is ${set.height}x${set.width} px, arena ${arena.name} is ${dims.totalPixelsY}x${dims.totalPixelsX}`,
        );
    }
    if (set.frames.length < 1 || set.frames.length > MAX_FRAMES) {
        invalidParameter(`Pattern has ${set.frames.length} frames; allowed 1-${MAX_FRAMES}`);
    }
    if (set.stretch.length !== set.frames.length) {
        throw new PatternError(
            'DimensionMismatch',
            `${set.stretch.length} stretch values for ${set.frames.length} frames`,
        );
    }
    const npix = set.width * set.height;
    set.frames.forEach((fr, i) => {
        if (fr.length !== npix) {
            throw new PatternError('DimensionMismatch', `Frame ${i} has ${fr.length} pixels, expected ${npix}`);
        }
    });
    return dims;
}

/**
 * Whole pattern to file bytes.  The header family follows the arena's generation.
 * Panels go out top panel row first, installed columns in order; frames keep row 0 at the bottom.
 */
export function encodePatternFile(set: PatternSet, arena: ArenaConfig, options: EncodeOptions = {}): Uint8Array {
    const formatVersion = options.formatVersion ?? 2;
    if (formatVersion !== 1 && formatVersion !== 2) {
        throw new PatternError('UnsupportedVersion', `Cannot write format version ${String(formatVersion)}`);
    }
    const dims = checkPatternSet(set, arena);
    const family = arena.generation.fileFamily;
    const N = dims.pixelsPerPanel;
    const rows = arena.numRows;
    const cols = dims.installedColumnCount;

    const header = writeHeader({
        family,
        formatVersion,
        numFrames: set.frames.length,
        rows,
        cols,
        mode: set.mode,
        generationId: arena.generation.id,
        arenaId: arena.arenaId,
        observerId: options.observerId ?? 0,
        panelMask: family === 'extended' ? panelPresenceMask(rows, cols) : undefined,
    });

    const blockLen = panelBlockLength(set.mode, N);
    const frameLen = FRAME_HEADER_LENGTH + rows * cols * blockLen;
    const out = new Uint8Array(header.length + set.frames.length * frameLen);
    const dv = toDataView(out);
    out.set(header, 0);

    const panel = new Uint8Array(N * N);
    const W = set.width;
    let o = header.length;
    set.frames.forEach((frame, f) => {
        out[o] = FRAME_MARKER_0;
        out[o + 1] = FRAME_MARKER_1;
        dv.setUint16(o + 2, f, true);
        o += FRAME_HEADER_LENGTH;
        for (let pr = 0; pr < rows; ++pr) {
            const baseRow = (rows - 1 - pr) * N;
            for (let k = 0; k < cols; ++k) {
                for (let r = 0; r < N; ++r) {
                    panel.set(frame.subarray((baseRow + r) * W + k * N, (baseRow + r) * W + (k + 1) * N), r * N);
                }
                out.set(encodePanel(panel, set.stretch[f], set.mode, N), o);
                o += blockLen;
            }
        }
    });

    if (family === 'extended') {
        out[checksumOffset(formatVersion)] = xorBytes(out, header.length);
    }
    return out;
}

/**
 * Inside a file whose header has already been accepted, a panel block with the wrong
 *  version or command is a damaged block, not a newer format.
 */
function decodeFilePanel(block: Uint8Array, mode: GrayscaleMode, N: number, frame: number, panel: number): DecodedPanel {
    try {
        return decodePanel(block, mode, N);
    } catch (e) {
        if (isPatternError(e, 'UnsupportedVersion')) {
            throw new PatternError('ParityMismatch', `Frame ${frame} panel ${panel} is damaged (${e.message})`);
        }
        throw e;
    }
}

function inferCompactGeneration(
    header: PatFileHeader,
    byteLength: number,
    registry: GenerationRegistry,
    logger: Logger,
): GenerationSpec {
    const candidates = registry.generations().filter((g) => g.fileFamily === 'compact');
    const sizes = [...new Set(candidates.map((g) => g.pixelsPerPanel))];
    const size = sizes.find((n) => expectedFileLength(header, n) === byteLength);
    if (size === undefined) {
        throw new PatternError(
            'DimensionMismatch',
            `${byteLength} bytes fits no known panel size for ${header.numFrames} frames of ${header.rows}x${header.cols} panels`,
        );
    }
    const matches = candidates.filter((g) => g.pixelsPerPanel === size);
    const gen = matches[0];
    if (matches.length > 1) {
        logger.warn(`File does not name its generation; ${size} px panels, assuming ${gen.name}`);
    }
    return gen;
}

function fileGeneration(
    header: PatFileHeader,
    byteLength: number,
    registry: GenerationRegistry,
    logger: Logger,
): GenerationSpec {
    if (header.family === 'extended') {
        const gen = registry.generations().find((g) => g.fileFamily === 'extended');
        if (!gen) throw new PatternError('UnregisteredId', 'Registry has no generation for extended files');
        return gen;
    }
    if (header.formatVersion === 1) {
        return inferCompactGeneration(header, byteLength, registry, logger);
    }
    const gen = registry.generationSpec(header.generationId);
    if (gen) return gen;
    logger.warn(`Generation id ${header.generationId} is not registered; inferring panel size from file length`);
    return inferCompactGeneration(header, byteLength, registry, logger);
}

function fileArena(header: PatFileHeader, gen: GenerationSpec, registry: GenerationRegistry, logger: Logger): ArenaConfig {
    const fallback = contiguousArena(gen, header.rows, header.cols);
    if (!header.arenaId) return fallback;

    const entry = registry.arenaEntry(gen.id, header.arenaId);
    if (!entry) {
        logger.warn(`Arena id ${header.arenaId} is not registered for ${gen.name}; treating as unspecified`);
        return fallback;
    }
    if (!entry.arena) {
        return { ...fallback, name: entry.name, arenaId: entry.id };
    }
    const arena = resolveArenaConfig({ ...entry.arena, name: entry.name, arenaId: entry.id }, registry);
    if (
        arena.generation.id !== gen.id ||
        arena.numRows !== header.rows ||
        arena.columnsInstalled.length !== header.cols
    ) {
        logger.warn(
            `Registered arena ${entry.name} is ${arena.numRows}x${arena.columnsInstalled.length}, file is ${header.rows}x${header.cols}; treating as unspecified`,
        );
        return fallback;
    }
    return arena;
}

/**
 * Two passes: detect the family and version, then parse that version.
 * Length, mask and checksum are all checked before any panel is decoded.
 */
export function decodePatternFile(bytes: Uint8Array, options: DecodeOptions = {}): DecodedPattern {
    const registry = options.registry ?? builtinRegistry;
    const logger = options.logger ?? consoleLogger;
    const maxVersion = options.maxFormatVersion ?? 2;

    const fmt = detectFormat(bytes);
    if (fmt.formatVersion > maxVersion) {
        throw new PatternError(
            'UnsupportedVersion',
            `${fmt.family} v${fmt.formatVersion} file; this reader accepts up to v${maxVersion}`,
        );
    }
    const header = parseHeader(bytes);
    if (header.numFrames < 1) throw new PatternError('DimensionMismatch', 'File holds no frames');
    if (header.rows < 1 || header.cols < 1) {
        throw new PatternError('DimensionMismatch', `Panel grid ${header.rows}x${header.cols} is empty`);
    }

    const gen = fileGeneration(header, bytes.length, registry, logger);
    const N = gen.pixelsPerPanel;
    const expected = expectedFileLength(header, N);
    if (bytes.length !== expected) {
        throw new PatternError('DimensionMismatch', `File is ${bytes.length} bytes, header implies ${expected}`);
    }

    if (header.family === 'extended') {
        if (header.rows * header.cols > MAX_PANELS) {
            throw new PatternError('DimensionMismatch', `${header.rows}x${header.cols} panels do not fit the panel mask`);
        }
        // Panels 0..n-1, row-major over installed panels, and nothing else
        const expectedMask = panelPresenceMask(header.rows, header.cols);
        const mask = header.panelMask ?? new Uint8Array(expectedMask.length);
        if (!expectedMask.every((b, i) => mask[i] === b)) {
            throw new PatternError(
                'DimensionMismatch',
                `Panel mask marks ${countMaskPanels(mask)} panels, not the first ${header.rows * header.cols}`,
            );
        }
        const sum = xorBytes(bytes, header.headerLength);
        if (sum !== header.checksum) {
            throw new PatternError('ChecksumMismatch', `Checksum 0x${sum.toString(16)} != stored 0x${header.checksum?.toString(16)}`);
        }
    }

    const arena = fileArena(header, gen, registry, logger);
    const { rows, cols, mode } = header;
    const W = cols * N;
    const H = rows * N;
    const blockLen = panelBlockLength(mode, N);
    const frames: Uint8Array[] = [];
    const stretch: number[] = [];
    let mixedStretch = false;

    const dv = toDataView(bytes);
    let o = header.headerLength;
    for (let f = 0; f < header.numFrames; ++f) {
        if (bytes[o] !== FRAME_MARKER_0 || bytes[o + 1] !== FRAME_MARKER_1) {
            throw new PatternError('ChecksumMismatch', `Frame ${f} marker missing at offset ${o}`);
        }
        const idx = dv.getUint16(o + 2, true);
        if (idx !== f) {
            throw new PatternError('ChecksumMismatch', `Frame ${f} is labelled ${idx}`);
        }
        o += FRAME_HEADER_LENGTH;

        const frame = new Uint8Array(W * H);
        let frameStretch: number | undefined = undefined;
        for (let pr = 0; pr < rows; ++pr) {
            const baseRow = (rows - 1 - pr) * N;
            for (let k = 0; k < cols; ++k) {
                const panel = decodeFilePanel(bytes.subarray(o, o + blockLen), mode, N, f, pr * cols + k);
                o += blockLen;
                if (frameStretch === undefined) frameStretch = panel.stretch;
                else if (panel.stretch !== frameStretch) mixedStretch = true;
                for (let r = 0; r < N; ++r) {
                    frame.set(panel.pixels.subarray(r * N, (r + 1) * N), (baseRow + r) * W + k * N);
                }
            }
        }
        frames.push(frame);
        stretch.push(frameStretch ?? 0);
    }
    if (mixedStretch) {
        logger.warn('Panels within a frame carry different stretch values; using the first panel of each frame');
    }

    return {
        patternSet: { mode, width: W, height: H, frames, stretch },
        arena,
        header,
    };
}
