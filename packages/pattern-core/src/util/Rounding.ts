// The one rounding rule for everything that turns a float into a pixel value:
//  round half to even, where anything within TIE_EPSILON of .5 counts as a tie.
export const TIE_EPSILON = 1e-9;

export function roundHalfEven(x: number): number {
    const fl = Math.floor(x);
    const diff = x - fl;
    if (Math.abs(diff - 0.5) <= TIE_EPSILON) {
        return fl % 2 === 0 ? fl : fl + 1;
    }
    return diff < 0.5 ? fl : fl + 1;
}

export function quantize(x: number, max: number): number {
    const v = roundHalfEven(x);
    return v < 0 ? 0 : v > max ? max : v;
}
