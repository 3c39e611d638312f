import { invalidParameter } from '@arenapat/pattern-core';

// Bit positions are 0 = LSB, 7 = MSB; ranges are inclusive, hi >= lo.

function checkRange(hi: number, lo: number) {
    if (!Number.isInteger(hi) || !Number.isInteger(lo) || lo < 0 || hi > 7 || hi < lo) {
        invalidParameter(`Bad bit range ${hi}..${lo}`);
    }
}

export function fieldMask(hi: number, lo: number) {
    checkRange(hi, lo);
    return ((1 << (hi - lo + 1)) - 1) << lo;
}

export function getBits(byte: number, hi: number, lo: number): number {
    return (byte & fieldMask(hi, lo)) >> lo;
}

/** `byte` with bits hi..lo replaced by value; the other bits are kept. */
export function setBits(byte: number, hi: number, lo: number, value: number): number {
    const mask = fieldMask(hi, lo);
    const max = mask >> lo;
    if (!Number.isInteger(value) || value < 0 || value > max) {
        invalidParameter(`Value ${value} does not fit in bits ${hi}..${lo} (max ${max})`);
    }
    return ((byte & ~mask) | (value << lo)) & 0xff;
}
