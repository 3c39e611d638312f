export type GenerationName = 'G3' | 'G4' | 'G4.1' | 'G6';

// compact = 7-byte header family, extended = "G6PT" family
export type FileFamily = 'compact' | 'extended';

export type GrayscaleMode = 'GS2' | 'GS16';

export interface GenerationSpec {
    id: number;
    name: GenerationName;
    pixelsPerPanel: 8 | 16 | 20;
    panelWidthMm: number;
    panelDepthMm: number;
    fileFamily: FileFamily;
}

export type ArenaOrientation = 'normal' | 'flipped';
export type ColumnOrder = 'cw' | 'ccw';
export type PanelModel = 'poly' | 'smooth';

export type Vec3 = [number, number, number];

/**
 * A fully resolved arena.  Nothing in here is optional; loose configs go
 * through resolveArenaConfig first.
 */
export interface ArenaConfig {
    name: string;
    arenaId: number; // 0 = unspecified
    generation: GenerationSpec;
    numRows: number;
    numColsFull: number;
    columnsInstalled: number[]; // sorted, 0-based full-grid column indices
    orientation: ArenaOrientation;
    columnOrder: ColumnOrder;
    angleOffsetDeg: number;
    model: PanelModel;
    rotationsDeg: Vec3; // yaw, pitch, roll
    translations: Vec3;
}

export interface ArenaDimensions {
    pixelsPerPanel: number;
    installedColumnCount: number;
    totalPixelsX: number;
    totalPixelsY: number;
    numPanels: number;
}

/** Unit-sphere direction of one pixel (or one sub-pixel sample) */
export interface PanelCoordinate {
    x: number;
    y: number;
    z: number;
    azimuth: number; // radians, atan2(y, x)
    elevation: number; // radians, 0 at the equator
}

/**
 * Frames are row-major Uint8Arrays, height rows of width pixels.
 * Row 0 is the bottom pixel row; column 0 is the first pixel of the first installed column.
 */
export interface PatternSet {
    mode: GrayscaleMode;
    width: number;
    height: number;
    frames: Uint8Array[];
    stretch: number[];
}

export const MAX_FRAMES = 65535;

export function maxPixelValue(mode: GrayscaleMode): number {
    return mode === 'GS2' ? 1 : 15;
}
