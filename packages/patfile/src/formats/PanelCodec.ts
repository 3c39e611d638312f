import { GrayscaleMode, PatternError, invalidParameter, maxPixelValue } from '@arenapat/pattern-core';
import { popcount8 } from '../util/Utils';

export const PANEL_FORMAT_VERSION = 1;
export const CMD_GS2 = 0x10;
export const CMD_GS16 = 0x30;
export const DEFAULT_PANEL_SIZE = 20;

const commandFor = (mode: GrayscaleMode) => (mode === 'GS2' ? CMD_GS2 : CMD_GS16);

export function panelPayloadLength(mode: GrayscaleMode, panelSize = DEFAULT_PANEL_SIZE) {
    const n = panelSize * panelSize;
    return mode === 'GS2' ? Math.ceil(n / 8) : Math.ceil(n / 2);
}

/** header + command + payload + stretch; 53 (GS2) or 203 (GS16) bytes for 20x20 panels */
export function panelBlockLength(mode: GrayscaleMode, panelSize = DEFAULT_PANEL_SIZE) {
    return 3 + panelPayloadLength(mode, panelSize);
}

function checkPanelSize(panelSize: number) {
    if (!Number.isInteger(panelSize) || panelSize < 1) {
        invalidParameter(`Panel size must be a positive integer, got ${panelSize}`);
    }
}

// 1 when the bytes after the header hold an odd number of set bits
function parityOf(block: Uint8Array) {
    let ones = 0;
    for (let i = 1; i < block.length; ++i) ones += popcount8(block[i]);
    return ones & 1;
}

/**
 * One panel's pixels to a block.  `pixels` is panel-local, N*N long, index row * N + col
 *  with row 0 at the bottom of the panel.
 */
export function encodePanel(
    pixels: ArrayLike<number>,
    stretch: number,
    mode: GrayscaleMode,
    panelSize = DEFAULT_PANEL_SIZE,
): Uint8Array {
    checkPanelSize(panelSize);
    const npix = panelSize * panelSize;
    if (pixels.length !== npix) {
        throw new PatternError('DimensionMismatch', `Panel needs ${npix} pixels, got ${pixels.length}`);
    }
    if (!Number.isInteger(stretch) || stretch < 0 || stretch > 255) {
        invalidParameter(`Stretch ${stretch} outside 0-255`);
    }
    const max = maxPixelValue(mode);

    const block = new Uint8Array(panelBlockLength(mode, panelSize));
    block[1] = commandFor(mode);
    const payload = block.subarray(2, block.length - 1);

    for (let i = 0; i < npix; ++i) {
        const v = pixels[i];
        if (!Number.isInteger(v) || v < 0 || v > max) {
            throw new PatternError('InvalidPixelValue', `Pixel ${i} value ${v} outside 0-${max} for ${mode}`);
        }
        if (mode === 'GS2') {
            if (v) payload[i >> 3] |= 0x80 >> (i & 7);
        } else {
            payload[i >> 1] |= i & 1 ? v : v << 4;
        }
    }

    block[block.length - 1] = stretch;
    block[0] = PANEL_FORMAT_VERSION | (parityOf(block) << 7);
    return block;
}

export interface DecodedPanel {
    pixels: Uint8Array;
    stretch: number;
}

export function decodePanel(block: Uint8Array, mode: GrayscaleMode, panelSize = DEFAULT_PANEL_SIZE): DecodedPanel {
    checkPanelSize(panelSize);
    const expected = panelBlockLength(mode, panelSize);
    if (block.length !== expected) {
        throw new PatternError('DimensionMismatch', `${mode} panel block must be ${expected} bytes, got ${block.length}`);
    }
    if (parityOf(block) !== block[0] >> 7) {
        throw new PatternError('ParityMismatch', 'Panel block parity check failed');
    }
    const version = block[0] & 0x7f;
    if (version !== PANEL_FORMAT_VERSION) {
        throw new PatternError('UnsupportedVersion', `Panel block version ${version}`);
    }
    if (block[1] !== commandFor(mode)) {
        throw new PatternError(
            'UnsupportedVersion',
            `Panel command 0x${block[1].toString(16).padStart(2, '0')} is not a ${mode} block`,
        );
    }

    const npix = panelSize * panelSize;
    const pixels = new Uint8Array(npix);
    const payload = block.subarray(2, block.length - 1);
    for (let i = 0; i < npix; ++i) {
        if (mode === 'GS2') {
            pixels[i] = (payload[i >> 3] >> (7 - (i & 7))) & 1;
        } else {
            pixels[i] = i & 1 ? payload[i >> 1] & 0x0f : payload[i >> 1] >> 4;
        }
    }
    return { pixels, stretch: block[block.length - 1] };
}
