import { TEST_LINK } from '@/test-fixtures'
import { analyzeLinkBudget } from '@backend/analysis/analyze'
import { describeLookAngles, describeStage, toJsonRecord } from '@backend/analysis/report'
import type { BudgetStageEvent } from '@backend/types'
import { describe, expect, it } from 'vitest'

describe('report', () => {
  describe('describeLookAngles', () => {
    it('should align pointing lines', () => {
      expect(
        describeLookAngles({ elevation: 51.578437, azimuth: 176.328258, slantRange: 36975074.369 })
      ).toEqual([
        'Elevation:           51.58 degrees',
        'Azimuth:            176.33 degrees',
        'Distance:           36975.07 km',
      ])
    })
  })

  describe('describeStage', () => {
    it('should describe EIRP in dBW and kW', () => {
      expect(describeStage({ stage: 'eirp', eirpDbw: 50 })).toEqual([
        'EIRP:                50.00 dBW (100.00 kW)',
      ])
    })

    it('should describe transmit power in kW', () => {
      expect(describeStage({ stage: 'txPower', txPowerDbw: 20 })).toEqual(['Tx Power:             0.10 kW'])
    })

    it('should describe dish gains', () => {
      expect(describeStage({ stage: 'txDishGain', gainDb: 47.053315 })).toEqual([
        'Tx dish gain:        47.05 dB',
      ])
      expect(describeStage({ stage: 'rxDishGain', gainDb: 35.012115 })).toEqual([
        'Rx dish gain:        35.01 dB',
      ])
    })

    it('should describe the coax line', () => {
      expect(describeStage({ stage: 'coax', lossDb: 0.8, noiseFigureDb: 0.8 })).toEqual([
        'Coax loss:            0.80 dB',
        'Coax noise figure:    0.80 dB',
      ])
    })

    it('should describe the full reference link in order', () => {
      const lines: string[] = []
      analyzeLinkBudget(TEST_LINK, {
        onStage: (event: BudgetStageEvent) => lines.push(...describeStage(event)),
      })

      expect(lines).toEqual([
        'Elevation:           51.58 degrees',
        'Azimuth:            176.33 degrees',
        'Distance:           36975.07 km',
        'EIRP:                50.00 dBW (100.00 kW)',
        'Path loss:          205.39 dB',
        'Coax loss:            0.80 dB',
        'Coax noise figure:    0.80 dB',
        'LNB noise figure:     1.00 dB',
        'Rx noise figure:      1.00 dB',
        'Antenna noise temp:  30.00 K',
        'Input-noise temp:    75.09 K',
        'System noise temp:  105.09 K',
        'Rx Power:           -90.39 dBm',
        '(G/T):               14.78 dB/K',
        '(C/N):               27.99 dB',
        'Capacity:           9.30 Mbps',
      ])
    })
  })

  describe('toJsonRecord', () => {
    it('should flatten the result into snake-case keys', () => {
      const result = analyzeLinkBudget(TEST_LINK)
      const record = toJsonRecord(result)

      expect(Object.keys(record)).toEqual([
        'pointing',
        'eirp_db',
        'path_loss_db',
        'rx_dish_gain_db',
        'noise_fig_db',
        'noise_temp_k',
        'cnr_db',
        'capacity_bps',
      ])
      expect(record.pointing.slant_range).toBe(result.pointing.slantRange)
      expect(record.noise_fig_db).toEqual(result.noiseFigureDb)
      expect(record.noise_temp_k.effective_input).toBe(result.noiseTempK.effectiveInput)
      expect(record.cnr_db).toBeCloseTo(27.994615, 5)
    })

    it('should serialize an undefined azimuth as null', () => {
      const result = analyzeLinkBudget(TEST_LINK)
      const record = toJsonRecord({ ...result, pointing: { ...result.pointing, azimuth: Number.NaN } })

      expect(JSON.parse(JSON.stringify(record)).pointing.azimuth).toBeNull()
    })

    it('should survive a JSON round trip', () => {
      const record = toJsonRecord(analyzeLinkBudget(TEST_LINK))
      expect(JSON.parse(JSON.stringify(record))).toEqual(record)
    })
  })
})
