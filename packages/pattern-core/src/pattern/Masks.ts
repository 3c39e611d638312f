import { SampleField } from '../geometry/ArenaGeometry';
import { deg2rad, lonLatToVector } from '../geometry/SphereMath';
import { LonLatMask, SolidAngleMask } from './PatternParams';

const TWO_PI = 2 * Math.PI;

/**
 * Per-sample visibility, 1 where every mask lets the sample through.
 * The two masks are independent predicates; a sample must pass both.
 */
export function maskVisibility(field: SampleField, saMask?: SolidAngleMask, lonLatMask?: LonLatMask): Uint8Array {
    const n = field.xyz.length / 3;
    const vis = new Uint8Array(n).fill(1);
    const xyz = field.xyz;

    if (saMask) {
        const [cx, cy, cz] = lonLatToVector(deg2rad(saMask.azDeg), deg2rad(saMask.elDeg));
        const cosR = Math.cos(deg2rad(saMask.radiusDeg));
        for (let i = 0; i < n; ++i) {
            const d = xyz[i * 3] * cx + xyz[i * 3 + 1] * cy + xyz[i * 3 + 2] * cz;
            const inside = d >= cosR;
            if (inside === saMask.invert) vis[i] = 0;
        }
    }

    if (lonLatMask) {
        // Longitudes wrap into [lonMin, lonMin + 2pi), so a mask may straddle the +/-180 seam
        const lonMin = deg2rad(lonLatMask.lonMinDeg),
            lonSpan = deg2rad(lonLatMask.lonMaxDeg - lonLatMask.lonMinDeg);
        const latMin = deg2rad(lonLatMask.latMinDeg),
            latMax = deg2rad(lonLatMask.latMaxDeg);
        for (let i = 0; i < n; ++i) {
            const x = xyz[i * 3],
                y = xyz[i * 3 + 1],
                z = xyz[i * 3 + 2];
            let dLon = (Math.atan2(y, x) - lonMin) % TWO_PI;
            if (dLon < 0) dLon += TWO_PI;
            const lat = Math.atan2(z, Math.hypot(x, y));
            const inside = dLon <= lonSpan && lat >= latMin && lat <= latMax;
            if (inside === lonLatMask.invert) vis[i] = 0;
        }
    }

    return vis;
}
