export { POINTING_MODELS, lookAngles, lookAnglesEllipsoidal, lookAnglesSpherical } from './look-angles'
export { dot, multiply, norm, subtract } from './vector'
export type { Mat3, Vec3 } from './vector'
