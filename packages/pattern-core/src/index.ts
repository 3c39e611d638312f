export * from './types/DataTypes';
export * from './types/PatternError';
export * from './registry/GenerationRegistry';
export * from './arena/ArenaSchema';
export * from './arena/ArenaModel';
export * from './geometry/SphereMath';
export * from './geometry/ArenaGeometry';
export * from './pattern/PatternParams';
export * from './pattern/Masks';
export * from './pattern/Starfield';
export * from './pattern/PatternGenerator';
export * from './util/Rounding';
export * from './util/Random';
