export interface LookAngles {
  /** Elevation above the local horizon in degrees */
  elevation: number
  /** Azimuth clockwise from geodetic north in degrees, in [0, 360) */
  azimuth: number
  /** Straight-line distance between receiver and reflector in meters */
  slantRange: number
}

export type PointingModel = 'ellipsoidal' | 'spherical'

export interface LinkGeometry {
  /** Subsatellite (or subreflector) point longitude in degrees, east positive */
  subLongitude: number
  /** Receiver longitude in degrees, east positive */
  rxLongitude: number
  /** Receiver geodetic latitude in degrees, north positive */
  rxLatitude: number
  /** Receiver height above sea level in meters */
  rxHeight?: number
  /** Reflector altitude above the equator in meters */
  altitude: number
}

export interface CoaxLine {
  lossDb: number
  noiseFigureDb: number
}

export interface RadarOptions {
  /** Reflecting object altitude in meters */
  altitude: number
  /** Radar cross section in m² */
  crossSection: number
  bistatic: boolean
  /** Bistatic mode only: object-to-receiver distance in meters */
  rxDistance?: number
}

/**
 * Transmit side of the link. Either the EIRP is known directly or it is
 * derived from the power feeding the antenna plus the antenna gain.
 */
export type TransmitPower =
  | { kind: 'eirp'; eirpDbw: number }
  | { kind: 'txPower'; txPowerDbw: number; antenna: Antenna }

export type Antenna = { kind: 'dishSize'; diameter: number } | { kind: 'dishGain'; gainDb: number }

export type LnbNoise = { kind: 'noiseFigure'; noiseFigureDb: number } | { kind: 'noiseTemp'; noiseTempK: number }

export interface LinkBudgetInput {
  transmit: TransmitPower
  /** Carrier frequency in Hz */
  frequency: number
  /** IF bandwidth in Hz */
  bandwidth: number
  rxAntenna: Antenna
  antennaNoiseTempK: number
  lnb: {
    noise: LnbNoise
    gainDb: number
  }
  /** Coax line length between LNB and receiver in feet */
  coaxLengthFt: number
  rxNoiseFigureDb: number
  satLongitude: number
  rxLongitude: number
  rxLatitude: number
  /** Receiver height above sea level in meters */
  rxHeight?: number
  radar?: RadarOptions
}

export interface LinkBudgetResult {
  pointing: LookAngles
  eirpDb: number
  pathLossDb: number
  rxDishGainDb: number
  noiseFigureDb: {
    lnb: number
    coax: number
    total: number
  }
  noiseTempK: {
    effectiveInput: number
    system: number
  }
  rxPowerDbm: number
  gOverTDb: number
  cnrDb: number
  capacityBps: number
}

/**
 * Intermediate quantities reported after each pipeline stage, in the order
 * the orchestrator computes them.
 */
export type BudgetStageEvent =
  | { stage: 'pointing'; lookAngles: LookAngles }
  | { stage: 'txDishGain'; gainDb: number }
  | { stage: 'txPower'; txPowerDbw: number }
  | { stage: 'eirp'; eirpDbw: number }
  | { stage: 'pathLoss'; pathLossDb: number }
  | { stage: 'rxDishGain'; gainDb: number }
  | { stage: 'coax'; lossDb: number; noiseFigureDb: number }
  | { stage: 'lnbNoiseFigure'; noiseFigureDb: number }
  | { stage: 'totalNoiseFigure'; noiseFigureDb: number }
  | { stage: 'noiseTemp'; antennaK: number; effectiveInputK: number; systemK: number }
  | { stage: 'carrier'; rxPowerDbm: number; gOverTDb: number; cnrDb: number }
  | { stage: 'capacity'; capacityBps: number }

export type BudgetStage = BudgetStageEvent['stage']

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent'

export type OutputFormat = 'text' | 'json'

export interface CalculatorConfig {
  pointingModel: PointingModel
  coax: {
    lossDbPerFt: number
    lineTempK: number
  }
  output: OutputFormat
  logLevel: LogLevel
}
