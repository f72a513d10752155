/**
 * Rotation module exports
 */

export { type PlanOptions, planRotation } from "./retention";
export { type RotateOptions, rotate } from "./rotator";
