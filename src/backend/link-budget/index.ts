export { dishGain, eirp } from './antenna'

export { freeSpacePathLoss, pathLoss, radarObjectGain } from './path-loss'
export type { PathLossOptions } from './path-loss'

export {
  coaxLossAndNoiseFigure,
  noiseFigureToNoiseTemp,
  noiseTempToNoiseFigure,
  systemNoiseTemp,
  totalNoiseFigure,
} from './noise'

export { capacity, cnr, gainOverTemperature, receivedPower } from './carrier'

export {
  BOLTZMANN_DB,
  DISH_GAIN_FACTOR,
  EARTH,
  GEOSTATIONARY_ALTITUDE_M,
  RG6_LOSS_DB_PER_FT,
  SPEED_OF_LIGHT,
  T0,
} from './constants'

export { dbToLinear, dbwToDbm, formatRate, linearToDb, wavelength } from './units'
