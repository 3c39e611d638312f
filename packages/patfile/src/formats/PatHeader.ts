import { FileFamily, GrayscaleMode, PatternError, invalidParameter } from '@arenapat/pattern-core';
import { toDataView } from '../util/Utils';
import { getBits, setBits } from './BitFields';

//
// Two header families share the .pat extension:
//  compact  - 7 bytes, no magic, used by the 8 and 16 pixel panel generations
//  extended - "G6PT" magic, 17 (v1) or 18 (v2) bytes, carries a checksum and panel mask
//

export const EXTENDED_MAGIC = 'G6PT';
export const COMPACT_HEADER_LENGTH = 7;
export const EXTENDED_V1_HEADER_LENGTH = 17;
export const EXTENDED_V2_HEADER_LENGTH = 18;
export const MAX_HEADER_LENGTH = EXTENDED_V2_HEADER_LENGTH;
export const PANEL_MASK_LENGTH = 6;

export const MAX_EXTENDED_ARENA_ID = 63;
export const MAX_OBSERVER_ID = 63;
export const MAX_COMPACT_ARENA_ID = 255;
export const MAX_COMPACT_GENERATION_ID = 7;

export type FormatVersion = 1 | 2;

export interface PatFormat {
    family: FileFamily;
    formatVersion: FormatVersion;
    headerLength: number;
}

export interface PatFileHeader extends PatFormat {
    numFrames: number;
    rows: number; // panel rows
    cols: number; // installed panel columns
    mode: GrayscaleMode;
    generationId: number; // 0 where the header does not say
    arenaId: number; // 0 = unspecified
    observerId: number; // extended v2 only
    panelMask?: Uint8Array; // extended only; compact files imply every panel
    checksum?: number; // extended only
}

const magicBytes = Uint8Array.from(EXTENDED_MAGIC, (c) => c.charCodeAt(0));

function hasMagic(bytes: Uint8Array) {
    return bytes.length >= 4 && magicBytes.every((b, i) => bytes[i] === b);
}

function needBytes(bytes: Uint8Array, n: number, what: string) {
    if (bytes.length < n) {
        throw new PatternError('DimensionMismatch', `${what} needs ${n} bytes, only ${bytes.length} available`);
    }
}

/**
 * First pass of a decode: which family and version, without trusting anything else.
 */
export function detectFormat(bytes: Uint8Array): PatFormat {
    if (hasMagic(bytes)) {
        needBytes(bytes, 5, 'Extended header');
        const b4 = bytes[4];
        // v1 stores the version as the whole byte; later versions keep it in the high nibble
        const version = b4 < 16 ? b4 : getBits(b4, 7, 4);
        if (version === 1) return { family: 'extended', formatVersion: 1, headerLength: EXTENDED_V1_HEADER_LENGTH };
        if (version === 2) return { family: 'extended', formatVersion: 2, headerLength: EXTENDED_V2_HEADER_LENGTH };
        throw new PatternError('UnsupportedVersion', `Extended header version ${version}`);
    }
    needBytes(bytes, COMPACT_HEADER_LENGTH, 'Compact header');
    const b2 = bytes[2];
    if (!getBits(b2, 7, 7)) {
        return { family: 'compact', formatVersion: 1, headerLength: COMPACT_HEADER_LENGTH };
    }
    if (getBits(b2, 3, 0) !== 0) {
        throw new PatternError('UnsupportedVersion', `Compact header reserved bits set (0x${b2.toString(16)})`);
    }
    return { family: 'compact', formatVersion: 2, headerLength: COMPACT_HEADER_LENGTH };
}

function extendedModeCode(mode: GrayscaleMode) {
    return mode === 'GS2' ? 1 : 2;
}

function modeFromExtendedCode(code: number): GrayscaleMode {
    if (code === 1) return 'GS2';
    if (code === 2) return 'GS16';
    throw new PatternError('UnsupportedVersion', `Unknown grayscale code ${code}`);
}

function modeFromLevels(levels: number): GrayscaleMode {
    if (levels === 2) return 'GS2';
    if (levels === 16) return 'GS16';
    throw new PatternError('UnsupportedVersion', `Unknown grayscale level count ${levels}`);
}

export function parseHeader(bytes: Uint8Array): PatFileHeader {
    const fmt = detectFormat(bytes);
    needBytes(bytes, fmt.headerLength, `${fmt.family} v${fmt.formatVersion} header`);
    const frames = toDataView(bytes).getUint16(fmt.family === 'extended' ? 6 : 0, true);

    if (fmt.family === 'compact') {
        const v2 = fmt.formatVersion === 2;
        return {
            ...fmt,
            numFrames: frames,
            mode: modeFromLevels(bytes[4]),
            rows: bytes[5],
            cols: bytes[6],
            generationId: v2 ? getBits(bytes[2], 6, 4) : 0,
            arenaId: v2 ? bytes[3] : 0,
            observerId: 0,
        };
    }

    if (fmt.formatVersion === 1) {
        return {
            ...fmt,
            numFrames: frames,
            mode: modeFromExtendedCode(bytes[5]),
            rows: bytes[8],
            cols: bytes[9],
            generationId: 0,
            arenaId: 0,
            observerId: 0,
            checksum: bytes[10],
            panelMask: bytes.slice(11, 11 + PANEL_MASK_LENGTH),
        };
    }

    // [4] VVVV AAAA  [5] AA OOOOOO
    const arenaId = (getBits(bytes[4], 3, 0) << 2) | getBits(bytes[5], 7, 6);
    return {
        ...fmt,
        numFrames: frames,
        rows: bytes[8],
        cols: bytes[9],
        mode: modeFromExtendedCode(bytes[10]),
        generationId: 0,
        arenaId,
        observerId: getBits(bytes[5], 5, 0),
        panelMask: bytes.slice(11, 11 + PANEL_MASK_LENGTH),
        checksum: bytes[17],
    };
}

function checkByte(v: number, what: string, max = 255) {
    if (!Number.isInteger(v) || v < 0 || v > max) invalidParameter(`${what} ${v} outside 0-${max}`);
}

/**
 * Header bytes for the given fields.  The checksum is written as given (0 if absent);
 *  the file encoder patches it once the frame data is known.
 */
export function writeHeader(h: Omit<PatFileHeader, 'headerLength'>): Uint8Array {
    checkByte(h.numFrames, 'Frame count', 0xffff);
    checkByte(h.rows, 'Row count');
    checkByte(h.cols, 'Column count');

    if (h.family === 'compact') {
        const out = new Uint8Array(COMPACT_HEADER_LENGTH);
        toDataView(out).setUint16(0, h.numFrames, true);
        if (h.formatVersion === 1) {
            // NumPatsY, always 1
            out[2] = 1;
            out[3] = 0;
        } else {
            checkByte(h.generationId, 'Generation id', MAX_COMPACT_GENERATION_ID);
            checkByte(h.arenaId, 'Arena id', MAX_COMPACT_ARENA_ID);
            out[2] = setBits(setBits(0, 7, 7, 1), 6, 4, h.generationId);
            out[3] = h.arenaId;
        }
        out[4] = h.mode === 'GS2' ? 2 : 16;
        out[5] = h.rows;
        out[6] = h.cols;
        return out;
    }

    const mask = h.panelMask ?? new Uint8Array(PANEL_MASK_LENGTH);
    if (mask.length !== PANEL_MASK_LENGTH) {
        invalidParameter(`Panel mask must be ${PANEL_MASK_LENGTH} bytes, got ${mask.length}`);
    }
    const checksum = h.checksum ?? 0;
    checkByte(checksum, 'Checksum');

    const out = new Uint8Array(h.formatVersion === 1 ? EXTENDED_V1_HEADER_LENGTH : EXTENDED_V2_HEADER_LENGTH);
    out.set(magicBytes, 0);
    toDataView(out).setUint16(6, h.numFrames, true);
    out[8] = h.rows;
    out[9] = h.cols;
    out.set(mask, 11);
    if (h.formatVersion === 1) {
        out[4] = 1;
        out[5] = extendedModeCode(h.mode);
        out[10] = checksum;
    } else {
        checkByte(h.arenaId, 'Arena id', MAX_EXTENDED_ARENA_ID);
        checkByte(h.observerId, 'Observer id', MAX_OBSERVER_ID);
        out[4] = setBits(setBits(0, 7, 4, 2), 3, 0, h.arenaId >> 2);
        out[5] = setBits(setBits(0, 7, 6, h.arenaId & 3), 5, 0, h.observerId);
        out[10] = extendedModeCode(h.mode);
        out[17] = checksum;
    }
    return out;
}

/** Offset of the checksum byte within an extended header */
export function checksumOffset(formatVersion: FormatVersion) {
    return formatVersion === 1 ? 10 : 17;
}
