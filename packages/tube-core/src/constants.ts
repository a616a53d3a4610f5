// Two floats closer than this are the same value, in every stage.
export const EPS_EQ = 1e-10;

// Half size used on an axis where the reference has no range.
export const TUBE_FLOOR = 1e-5;

// Slope stand-in for vertical reference segments
export const VERTICAL_SLOPE = 1e15;
