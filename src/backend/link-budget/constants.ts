export const SPEED_OF_LIGHT = 299792458

/** Standard noise temperature in Kelvin */
export const T0 = 290

/** Boltzmann's constant (1.38e-23 W/Hz/K) in dB */
export const BOLTZMANN_DB = -228.6

/** Loss of RG6 coaxial line */
export const RG6_LOSS_DB_PER_FT = 0.08

/**
 * Parabolic dish gain factor: 4π·η·A/λ² with η = 0.56 and A = πr² collapses
 * to 7·A/λ².
 */
export const DISH_GAIN_FACTOR = 7

export const GEOSTATIONARY_ALTITUDE_M = 35786e3

export const EARTH = {
  /** GRS80 equatorial radius in meters */
  equatorialRadius: 6378.137e3,
  /** GRS80 reciprocal flattening */
  inverseFlattening: 298.257222100882711,
  /** Mean radius in meters */
  meanRadius: 6371e3,
} as const
