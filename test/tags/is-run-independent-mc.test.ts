import { describe, expect, it } from 'vitest'

import { isRunIndependentMc } from '../../core/tags/is-run-independent-mc'

describe('isRunIndependentMc', () => {
  it('returns false without metadata', () => {
    expect(isRunIndependentMc(null)).toBeFalsy()
    expect(isRunIndependentMc([])).toBeFalsy()
  })

  it('returns true for a single reserved experiment', () => {
    for (let experiment of [0, 1002, 1003]) {
      expect(
        isRunIndependentMc([
          { experimentHigh: experiment, experimentLow: experiment },
        ]),
      ).toBeTruthy()
    }
  })

  it('returns false for experiment ranges', () => {
    expect(
      isRunIndependentMc([{ experimentHigh: 1003, experimentLow: 1002 }]),
    ).toBeFalsy()
  })

  it('returns false for regular experiments', () => {
    expect(
      isRunIndependentMc([{ experimentHigh: 12, experimentLow: 12 }]),
    ).toBeFalsy()
  })

  it('returns false when experiments are missing', () => {
    expect(isRunIndependentMc([{ isMC: true }])).toBeFalsy()
  })

  it('only looks at the first record', () => {
    expect(
      isRunIndependentMc([
        { experimentHigh: 12, experimentLow: 12 },
        { experimentHigh: 0, experimentLow: 0 },
      ]),
    ).toBeFalsy()
  })
})
