import { EARTH, GEOSTATIONARY_ALTITUDE_M } from '@backend/link-budget/constants'
import type { LinkGeometry, LookAngles, PointingModel } from '@backend/types'
import { type Mat3, type Vec3, multiply, norm, subtract } from './vector'

const DEG_TO_RAD = Math.PI / 180
const RAD_TO_DEG = 180 / Math.PI

type LookAngleSolver = (geometry: LinkGeometry) => LookAngles

/**
 * Rigorous solution on the GRS80 ellipsoid.
 *
 * The receiver's geodetic position is converted to Earth-centered Cartesian
 * coordinates and the receiver-to-satellite vector is rotated into the local
 * east-north-up frame. The satellite sits on the equatorial plane.
 */
export function lookAnglesEllipsoidal(geometry: LinkGeometry): LookAngles {
  const satLong = geometry.subLongitude * DEG_TO_RAD
  const rxLong = geometry.rxLongitude * DEG_TO_RAD
  const rxLat = geometry.rxLatitude * DEG_TO_RAD

  const f = 1 / EARTH.inverseFlattening
  const eSq = 2 * f - f ** 2
  const a = EARTH.equatorialRadius
  const r = a + geometry.altitude

  // Prime-vertical radius of curvature
  const n = a / Math.sqrt(1 - eSq * Math.sin(rxLat) ** 2)

  // Geoid undulation taken as zero, so ellipsoidal height = orthometric height
  const h = geometry.rxHeight ?? 0

  const receiver: Vec3 = [
    (n + h) * Math.cos(rxLong) * Math.cos(rxLat),
    (n + h) * Math.sin(rxLong) * Math.cos(rxLat),
    (n * (1 - eSq) + h) * Math.sin(rxLat),
  ]
  const satellite: Vec3 = [r * Math.cos(satLong), r * Math.sin(satLong), 0]

  const topocentric = subtract(satellite, receiver)

  const toEnu: Mat3 = [
    [-Math.sin(rxLong), Math.cos(rxLong), 0],
    [-Math.sin(rxLat) * Math.cos(rxLong), -Math.sin(rxLat) * Math.sin(rxLong), Math.cos(rxLat)],
    [Math.cos(rxLat) * Math.cos(rxLong), Math.cos(rxLat) * Math.sin(rxLong), Math.sin(rxLat)],
  ]
  const [east, north, up] = multiply(toEnu, topocentric)

  const azimuth = Math.atan2(east, north) * RAD_TO_DEG
  const elevation = Math.atan(up / Math.sqrt(east ** 2 + north ** 2)) * RAD_TO_DEG

  return {
    elevation,
    azimuth: normalizeAzimuth(azimuth),
    slantRange: norm(topocentric),
  }
}

/**
 * Approximation on a sphere of mean Earth radius.
 *
 * Undefined (NaN azimuth) when the receiver is directly below the satellite
 * or at a pole.
 */
export function lookAnglesSpherical(geometry: LinkGeometry): LookAngles {
  const satLong = geometry.subLongitude * DEG_TO_RAD
  const rxLong = geometry.rxLongitude * DEG_TO_RAD
  const rxLat = geometry.rxLatitude * DEG_TO_RAD

  const R = EARTH.meanRadius
  const r = EARTH.equatorialRadius + geometry.altitude

  // Geocentric angle between the receiver and the subsatellite point
  const cosGamma = Math.cos(rxLat) * Math.cos(satLong - rxLong)
  const gamma = Math.acos(cosGamma)

  const slantRange = r * Math.sqrt(1 + (R / r) ** 2 - 2 * (R / r) * cosGamma)

  const zenith = Math.asin((r / slantRange) * Math.sin(gamma))
  const elevation = 90 - zenith * RAD_TO_DEG

  // |φ| rather than φ: with a signed latitude β lands in the wrong half-plane
  // south of the equator
  const beta = Math.acos(Math.tan(Math.abs(rxLat)) / Math.tan(gamma)) * RAD_TO_DEG
  const satelliteWest = satLong < rxLong

  let azimuth: number
  if (rxLat > 0) {
    azimuth = satelliteWest ? 180 + beta : 180 - beta
  } else {
    azimuth = satelliteWest ? 360 - beta : beta
  }

  return { elevation, azimuth, slantRange }
}

const SOLVERS: Record<PointingModel, LookAngleSolver> = {
  ellipsoidal: lookAnglesEllipsoidal,
  spherical: lookAnglesSpherical,
}

export const POINTING_MODELS = ['ellipsoidal', 'spherical'] as const satisfies readonly PointingModel[]

/**
 * Elevation, azimuth and slant range from a ground station to a satellite or
 * radar object above the equator.
 *
 * Longitudes are east positive, latitudes north positive, all in degrees.
 */
export function lookAngles(
  subLongitude: number,
  rxLongitude: number,
  rxLatitude: number,
  altitude = GEOSTATIONARY_ALTITUDE_M,
  model: PointingModel = 'ellipsoidal',
  rxHeight = 0
): LookAngles {
  return SOLVERS[model]({ subLongitude, rxLongitude, rxLatitude, altitude, rxHeight })
}

function normalizeAzimuth(degrees: number): number {
  return ((degrees % 360) + 360) % 360
}
