import { describe, it, expect } from 'vitest';
import { mulberry32 } from '@arenapat/pattern-core';
import { decodePanel, encodePanel, panelBlockLength } from './PanelCodec';

const N = 20;
const idx = (row: number, col: number) => row * N + col;

describe('panel block layout', () => {
    it('has the expected lengths', () => {
        expect(panelBlockLength('GS2')).toBe(53);
        expect(panelBlockLength('GS16')).toBe(203);
        expect(panelBlockLength('GS2', 16)).toBe(35);
        expect(panelBlockLength('GS16', 16)).toBe(131);
        expect(panelBlockLength('GS2', 8)).toBe(11);
    });

    it('packs the bottom-left pixel into the top bit of the first payload byte', () => {
        const px = new Uint8Array(N * N);
        px[idx(0, 0)] = 1;
        const block = encodePanel(px, 192, 'GS2');
        expect(block.length).toBe(53);
        expect(block[0]).toBe(0x01);
        expect(block[1]).toBe(0x10);
        expect(block[2]).toBe(0x80);
        expect(block[52]).toBe(192);
        expect(block.subarray(3, 52).every((b) => b === 0)).toBe(true);
    });

    it('packs the top-right pixel into bit 0 of payload byte 49', () => {
        const px = new Uint8Array(N * N);
        px[idx(19, 19)] = 1;
        const block = encodePanel(px, 0, 'GS2');
        expect(block[2 + 49]).toBe(0x01);
        expect(block[0]).toBe(0x01);
    });

    it('sets the parity bit when the set-bit count is odd', () => {
        // Only the command byte has a bit set
        const block = encodePanel(new Uint8Array(N * N), 0, 'GS2');
        expect(block[0]).toBe(0x81);
    });

    it('puts even GS16 pixels in the high nibble', () => {
        const px = new Uint8Array(N * N);
        px[0] = 0xa;
        px[1] = 0x5;
        px[2] = 0xf;
        const block = encodePanel(px, 0, 'GS16');
        expect(block.length).toBe(203);
        expect(block[1]).toBe(0x30);
        expect(block[2]).toBe(0xa5);
        expect(block[3]).toBe(0xf0);
        expect(block[0]).toBe(0x01);
    });
});

describe('decodePanel', () => {
    const rng = mulberry32(1234);
    const gs16 = Uint8Array.from({ length: N * N }, () => Math.floor(rng() * 16));
    const gs2 = gs16.map((v) => v & 1);

    it('returns what was encoded', () => {
        expect(decodePanel(encodePanel(gs16, 77, 'GS16'), 'GS16')).toEqual({ pixels: gs16, stretch: 77 });
        expect(decodePanel(encodePanel(gs2, 3, 'GS2'), 'GS2')).toEqual({ pixels: gs2, stretch: 3 });
        const small = gs2.slice(0, 64);
        expect(decodePanel(encodePanel(small, 9, 'GS2', 8), 'GS2', 8).pixels).toEqual(small);
    });

    it('catches any single flipped bit', () => {
        const block = encodePanel(gs2, 200, 'GS2');
        for (let i = 1; i < block.length; ++i) {
            for (let b = 0; b < 8; ++b) {
                const bad = block.slice();
                bad[i] ^= 1 << b;
                expect(() => decodePanel(bad, 'GS2')).toThrowError(/^ParityMismatch:/);
            }
        }
        const bad = block.slice();
        bad[0] ^= 0x80;
        expect(() => decodePanel(bad, 'GS2')).toThrowError(/^ParityMismatch:/);
    });

    it('rejects unknown versions and commands', () => {
        const block = encodePanel(gs2, 0, 'GS2');
        const v2 = block.slice();
        v2[0] = (v2[0] & 0x80) | 2;
        expect(() => decodePanel(v2, 'GS2')).toThrowError(/^UnsupportedVersion:/);

        // 0x30 has one more set bit than 0x10, so flip parity with it
        const cmd = block.slice();
        cmd[1] = 0x30;
        cmd[0] ^= 0x80;
        expect(() => decodePanel(cmd, 'GS2')).toThrowError(/^UnsupportedVersion:/);

        expect(() => decodePanel(block, 'GS16')).toThrowError(/^DimensionMismatch:/);
    });
});

describe('encodePanel input checks', () => {
    it('rejects bad pixels, sizes and stretch', () => {
        const px = new Uint8Array(N * N);
        px[7] = 2;
        expect(() => encodePanel(px, 0, 'GS2')).toThrowError(/^InvalidPixelValue:/);
        expect(() => encodePanel([16, ...new Array(N * N - 1).fill(0)], 0, 'GS16')).toThrowError(/^InvalidPixelValue:/);
        expect(() => encodePanel(new Uint8Array(399), 0, 'GS2')).toThrowError(/^DimensionMismatch:/);
        expect(() => encodePanel(new Uint8Array(N * N), 256, 'GS2')).toThrowError(/^InvalidParameter:/);
        expect(() => encodePanel(new Uint8Array(N * N), 1.5, 'GS2')).toThrowError(/^InvalidParameter:/);
    });
});
