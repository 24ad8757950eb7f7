import { describe, expect, it } from 'vitest'

import { isStringRecord } from '../../../core/schema/guards/is-string-record'
import { isPlainObject } from '../../../core/schema/guards/is-plain-object'
import { isStringList } from '../../../core/schema/guards/is-string-list'

describe('isPlainObject', () => {
  it('accepts objects only', () => {
    expect(isPlainObject({})).toBeTruthy()
    expect(isPlainObject([])).toBeFalsy()
    expect(isPlainObject(null)).toBeFalsy()
    expect(isPlainObject('object')).toBeFalsy()
  })
})

describe('isStringList', () => {
  it('accepts arrays of strings', () => {
    expect(isStringList([])).toBeTruthy()
    expect(isStringList(['a', 'b'])).toBeTruthy()
    expect(isStringList(['a', 1])).toBeFalsy()
    expect(isStringList('a')).toBeFalsy()
  })
})

describe('isStringRecord', () => {
  it('accepts objects with string values', () => {
    expect(isStringRecord({ a: 'b' })).toBeTruthy()
    expect(isStringRecord({ a: 1 })).toBeFalsy()
    expect(isStringRecord(['a'])).toBeFalsy()
  })
})
