import { describe, expect, it } from 'vitest'

import { parseLooseVersion } from '../../core/releases/parse-loose-version'

describe('parseLooseVersion', () => {
  it('splits dotted numbers', () => {
    expect(parseLooseVersion('08.02.02')).toEqual([8, 2, 2])
  })

  it('keeps words as separate segments', () => {
    expect(parseLooseVersion('2409.toyger')).toEqual([2409, 'toyger'])
    expect(parseLooseVersion('1.2rc3')).toEqual([1, 2, 'rc', 3])
  })

  it('returns no segments for an empty version', () => {
    expect(parseLooseVersion('')).toEqual([])
  })
})
