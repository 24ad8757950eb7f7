import { describe, expect, it } from 'vitest'

import { getUploadGlobalTag } from '../../core/tasks/get-upload-global-tag'
import { CONDITIONS_TASKS } from '../../core/constants'

describe('getUploadGlobalTag', () => {
  it('creates a new tag per upload request for every task', () => {
    for (let task of CONDITIONS_TASKS) {
      expect(getUploadGlobalTag(task)).toBeNull()
    }
  })
})
