// Shared runtime constants

// Timing
export const TICK_RATE = 20; // Server updates per second
export const TICK_MS = 1000 / TICK_RATE; // Milliseconds per tick (50ms)

// Kinematics
export const MIN_TRAVEL_SECONDS = 0.001; // Floor for zero-distance projectiles
export const DEFAULT_DRIFT_DAMPING = 5;

// Targeting
export const DEFAULT_PASSABLE_FOOTPRINT = "1by1";
export const MAX_TARGETER_RANGE = 256; // Bounds the reachable-point scan
export const SHAPE_ANGLE_TOLERANCE = 1e-9; // Radians of slack on cone edges
