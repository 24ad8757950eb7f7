import { describe, expect, it } from 'vitest'

import * as advisor from '../core/index'

describe('library entry', () => {
  it('exposes the release resolver and tag composer', () => {
    expect(advisor.resolveRelease('release-06-01-00')).toBe('release-06-01-15')
    expect(
      advisor.composeTags('release-08-02-02', ['main_MC15'], null, []).tags,
    ).toEqual(['B2BII'])
  })

  it('exposes the task lookups and configuration helpers', () => {
    expect(advisor.getUploadGlobalTag('prompt')).toBeNull()
    expect(advisor.jiraTicketSpec('validation')?.assignee).toEqual({
      name: 'validation-conditions',
    })
    expect(advisor.createReleaseTable({})).toEqual(
      advisor.DEFAULT_RELEASE_TABLE,
    )
    expect(new advisor.ReleaseTableError('x').name).toBe('ReleaseTableError')
  })
})
