import { describe, expect, it } from 'vitest'

import { parseTagList } from '../../cli/parse-tag-list'

describe('parseTagList', () => {
  it('returns an empty list without a value', () => {
    expect(parseTagList(undefined)).toEqual([])
  })

  it('splits comma-separated lists', () => {
    expect(parseTagList('main_MC15, online,')).toEqual(['main_MC15', 'online'])
  })

  it('joins repeated options in order', () => {
    expect(parseTagList(['mc_old,data_old', 'main_MC15'])).toEqual([
      'mc_old',
      'data_old',
      'main_MC15',
    ])
  })
})
