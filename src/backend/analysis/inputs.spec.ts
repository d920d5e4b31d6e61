import { TEST_LINK, TEST_LINK_ARGS } from '@/test-fixtures'
import { resolveLinkBudgetInput, toFlag, withoutBlankValues } from '@backend/analysis/inputs'
import { InvalidInputError } from '@backend/errors'
import { describe, expect, it } from 'vitest'

function issuesOf(raw: Record<string, unknown>): string[] {
  try {
    resolveLinkBudgetInput(raw)
  } catch (error) {
    if (error instanceof InvalidInputError) return error.issues
    throw error
  }
  return []
}

describe('link budget inputs', () => {
  describe('toFlag', () => {
    it('should convert option keys to command-line flags', () => {
      expect(toFlag('freq')).toBe('--freq')
      expect(toFlag('radarCrossSection')).toBe('--radar-cross-section')
    })
  })

  describe('withoutBlankValues', () => {
    it('should clear empty and blank strings only', () => {
      expect(withoutBlankValues({ freq: '', rxLat: ' \t', eirp: '50', radar: false })).toEqual({
        freq: undefined,
        rxLat: undefined,
        eirp: '50',
        radar: false,
      })
    })
  })

  describe('resolveLinkBudgetInput', () => {
    it('should resolve the reference link', () => {
      expect(resolveLinkBudgetInput(TEST_LINK_ARGS)).toEqual({
        ...TEST_LINK,
        rxHeight: 0,
        radar: undefined,
      })
    })

    it('should coerce numeric strings', () => {
      const input = resolveLinkBudgetInput({
        ...TEST_LINK_ARGS,
        freq: '12e9',
        satLong: '-95',
        rxLat: '33.5',
      })

      expect(input.frequency).toBe(12e9)
      expect(input.satLongitude).toBe(-95)
      expect(input.rxLatitude).toBe(33.5)
    })

    it('should resolve transmit power with a dish size', () => {
      const { eirp: _eirp, ...args } = TEST_LINK_ARGS
      const input = resolveLinkBudgetInput({ ...args, txPower: 20, txDishSize: 2.4 })

      expect(input.transmit).toEqual({
        kind: 'txPower',
        txPowerDbw: 20,
        antenna: { kind: 'dishSize', diameter: 2.4 },
      })
    })

    it('should resolve the LNB noise temperature and the rx dish size', () => {
      const { lnbNoiseFig: _nf, rxDishGain: _gain, ...args } = TEST_LINK_ARGS
      const input = resolveLinkBudgetInput({ ...args, lnbNoiseTemp: 50, rxDishSize: 0.6 })

      expect(input.lnb.noise).toEqual({ kind: 'noiseTemp', noiseTempK: 50 })
      expect(input.rxAntenna).toEqual({ kind: 'dishSize', diameter: 0.6 })
    })

    it('should resolve radar options', () => {
      const input = resolveLinkBudgetInput({
        ...TEST_LINK_ARGS,
        radar: true,
        radarAlt: 1000e3,
        radarCrossSection: 10,
      })

      expect(input.radar).toEqual({ altitude: 1000e3, crossSection: 10, bistatic: false })
    })

    it('should require one of EIRP or transmit power', () => {
      const { eirp: _eirp, ...args } = TEST_LINK_ARGS
      expect(issuesOf(args)).toEqual(['one of --eirp or --tx-power is required'])
    })

    it('should reject EIRP together with transmit power', () => {
      expect(issuesOf({ ...TEST_LINK_ARGS, txPower: 20 })).toEqual([
        '--eirp and --tx-power are mutually exclusive',
      ])
    })

    it('should require a transmit antenna with transmit power', () => {
      const { eirp: _eirp, ...args } = TEST_LINK_ARGS
      expect(issuesOf({ ...args, txPower: 20 })).toEqual([
        'one of --tx-dish-size or --tx-dish-gain is required',
      ])
    })

    it('should reject a transmit antenna alongside EIRP', () => {
      expect(issuesOf({ ...TEST_LINK_ARGS, txDishGain: 30 })).toEqual([
        '--tx-dish-size and --tx-dish-gain only apply with --tx-power',
      ])
    })

    it('should reject both LNB noise figure and temperature', () => {
      expect(issuesOf({ ...TEST_LINK_ARGS, lnbNoiseTemp: 50 })).toEqual([
        '--lnb-noise-fig and --lnb-noise-temp are mutually exclusive',
      ])
    })

    it('should require a receive antenna', () => {
      const { rxDishGain: _gain, ...args } = TEST_LINK_ARGS
      expect(issuesOf(args)).toEqual(['one of --rx-dish-size or --rx-dish-gain is required'])
    })

    it('should report every unresolved group at once', () => {
      const { eirp: _eirp, rxDishGain: _gain, lnbNoiseFig: _nf, ...args } = TEST_LINK_ARGS
      expect(issuesOf(args)).toHaveLength(3)
    })

    it('should require radar altitude and cross section in radar mode', () => {
      expect(issuesOf({ ...TEST_LINK_ARGS, radar: true })).toEqual([
        '--radar-alt is required in radar mode (--radar)',
        '--radar-cross-section is required in radar mode (--radar)',
      ])
    })

    it('should reject bistatic radar, whose receiver distance cannot be given', () => {
      const issues = issuesOf({
        ...TEST_LINK_ARGS,
        radar: true,
        radarAlt: 1000e3,
        radarCrossSection: 10,
        radarBistatic: true,
      })

      expect(issues).toHaveLength(1)
      expect(issues[0]).toMatch(/^--radar-bistatic needs the distance from the radar object to the receiver/)
    })

    it('should reject bistatic without radar mode', () => {
      expect(issuesOf({ ...TEST_LINK_ARGS, radarBistatic: true })).toEqual(['--radar-bistatic requires --radar'])
    })

    it('should report missing required values by flag', () => {
      const { freq: _freq, ...args } = TEST_LINK_ARGS
      expect(issuesOf(args)).toEqual(['--freq: is required and must be a number'])
    })

    it('should treat a blank required value as missing', () => {
      expect(issuesOf({ ...TEST_LINK_ARGS, rxLat: '' })).toEqual(['--rx-lat: is required and must be a number'])
    })

    it('should treat a blank optional value as not given', () => {
      expect(issuesOf({ ...TEST_LINK_ARGS, eirp: '  ' })).toEqual(['one of --eirp or --tx-power is required'])
    })

    it('should reject values that are not numbers', () => {
      expect(issuesOf({ ...TEST_LINK_ARGS, ifBw: 'wide' })).toEqual(['--if-bw: is required and must be a number'])
    })

    it('should reject out-of-range coordinates', () => {
      const issues = issuesOf({ ...TEST_LINK_ARGS, rxLat: 95, satLong: -200 })

      expect(issues).toHaveLength(2)
      expect(issues.some((issue) => issue.startsWith('--rx-lat:'))).toBe(true)
      expect(issues.some((issue) => issue.startsWith('--sat-long:'))).toBe(true)
    })

    it('should reject a non-positive frequency', () => {
      const issues = issuesOf({ ...TEST_LINK_ARGS, freq: 0 })

      expect(issues).toHaveLength(1)
      expect(issues[0]).toMatch(/^--freq:/)
    })
  })
})
