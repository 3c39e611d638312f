import { PanelCoordinate, Vec3 } from '../types/DataTypes';

// Row-major 3x3
export type Mat3 = [number, number, number, number, number, number, number, number, number];

export const IDENTITY: Mat3 = [1, 0, 0, 0, 1, 0, 0, 0, 1];

export const deg2rad = (d: number) => (d * Math.PI) / 180;
export const rad2deg = (r: number) => (r * 180) / Math.PI;

export function rotX(a: number): Mat3 {
    const c = Math.cos(a),
        s = Math.sin(a);
    return [1, 0, 0, 0, c, -s, 0, s, c];
}

export function rotY(a: number): Mat3 {
    const c = Math.cos(a),
        s = Math.sin(a);
    return [c, 0, s, 0, 1, 0, -s, 0, c];
}

export function rotZ(a: number): Mat3 {
    const c = Math.cos(a),
        s = Math.sin(a);
    return [c, -s, 0, s, c, 0, 0, 0, 1];
}

/** a * b */
export function matMul(a: Mat3, b: Mat3): Mat3 {
    const r: Mat3 = [0, 0, 0, 0, 0, 0, 0, 0, 0];
    for (let i = 0; i < 3; ++i) {
        for (let j = 0; j < 3; ++j) {
            r[i * 3 + j] = a[i * 3] * b[j] + a[i * 3 + 1] * b[3 + j] + a[i * 3 + 2] * b[6 + j];
        }
    }
    return r;
}

export function applyMat(m: Mat3, x: number, y: number, z: number): Vec3 {
    return [m[0] * x + m[1] * y + m[2] * z, m[3] * x + m[4] * y + m[5] * z, m[6] * x + m[7] * y + m[8] * z];
}

/** Yaw about z, then pitch about y, then roll about x */
export function eulerRotation(yaw: number, pitch: number, roll: number): Mat3 {
    return matMul(rotX(roll), matMul(rotY(pitch), rotZ(yaw)));
}

/** Rotation carrying the direction (lon, lat) onto +z, followed by a roll of `roll` about +z. */
export function poleRotation(lon: number, lat: number, roll = 0): Mat3 {
    return matMul(rotZ(roll), matMul(rotY(lat - Math.PI / 2), rotZ(-lon)));
}

/**
 * Rotation carrying (lon, lat) onto +x, followed by a roll about +x.
 * The pole (+z) then sits 90 degrees from that direction.
 */
export function equatorRotation(lon: number, lat: number, roll = 0): Mat3 {
    return matMul(rotX(roll), matMul(rotY(lat), rotZ(-lon)));
}

export function lonLatToVector(lon: number, lat: number): Vec3 {
    const cl = Math.cos(lat);
    return [cl * Math.cos(lon), cl * Math.sin(lon), Math.sin(lat)];
}

export function toCoordinate(x: number, y: number, z: number): PanelCoordinate {
    const len = Math.hypot(x, y, z);
    const ux = x / len,
        uy = y / len,
        uz = z / len;
    return {
        x: ux,
        y: uy,
        z: uz,
        azimuth: Math.atan2(uy, ux),
        elevation: Math.atan2(uz, Math.hypot(ux, uy)),
    };
}

/** Great-circle angle between two unit vectors */
export function angleBetween(ax: number, ay: number, az: number, bx: number, by: number, bz: number): number {
    const d = ax * bx + ay * by + az * bz;
    return Math.acos(d > 1 ? 1 : d < -1 ? -1 : d);
}
