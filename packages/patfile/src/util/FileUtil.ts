import * as fsp from 'fs/promises';

export async function readJsonFile(filePath: string): Promise<unknown> {
    let data: string;
    try {
        data = await fsp.readFile(filePath, { encoding: 'utf8' });
    } catch (error) {
        throw new Error(`Error reading JSON file ${filePath}: ${error}`, { cause: error });
    }
    try {
        return JSON.parse(data);
    } catch (error) {
        throw new Error(`Error parsing JSON file ${filePath}: ${error}`, { cause: error });
    }
}

/**
 * Up to `length` bytes from the start of a file; shorter if the file is.
 */
export async function readFilePrefix(path: string, length: number): Promise<Uint8Array> {
    const buf = new Uint8Array(length);
    const fh = await fsp.open(path, 'r');
    try {
        let total = 0;
        while (total < length) {
            const { bytesRead } = await fh.read(buf, total, length - total, total);
            if (bytesRead === 0) {
                // EOF
                break;
            }
            total += bytesRead;
        }
        return buf.subarray(0, total);
    } finally {
        await fh.close();
    }
}

export async function readWholeFile(path: string): Promise<Uint8Array> {
    const data = await fsp.readFile(path);
    return new Uint8Array(data.buffer, data.byteOffset, data.byteLength);
}

/**
 * Write a complete buffer through one handle.  Without `overwrite`, an existing
 *  file is an error (EEXIST) and is left untouched.
 */
export async function writeFileExclusive(path: string, data: Uint8Array, overwrite = false) {
    const fh = await fsp.open(path, overwrite ? 'w' : 'wx');
    try {
        let total = 0;
        while (total < data.length) {
            const { bytesWritten } = await fh.write(data, total, data.length - total, total);
            total += bytesWritten;
        }
    } finally {
        await fh.close();
    }
}
