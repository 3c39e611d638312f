export function toDataView(buf: Uint8Array) {
    return new DataView(buf.buffer, buf.byteOffset, buf.byteLength);
}

export function popcount8(b: number) {
    let n = 0;
    for (let v = b & 0xff; v; v &= v - 1) ++n;
    return n;
}

export function xorBytes(buf: Uint8Array, start = 0, end = buf.length) {
    let x = 0;
    for (let i = start; i < end; ++i) x ^= buf[i];
    return x;
}
