import { beforeEach, describe, expect, it, vi } from 'vitest'
import { createSpinner } from 'nanospinner'

import { DEFAULT_RELEASE_TABLE } from '../../core/config/default-release-table'
import { loadReleaseTable } from '../../core/config/load-release-table'
import { ReleaseTableError } from '../../core/config/release-table-error'
import { loadCliReleaseTable } from '../../cli/load-cli-release-table'

vi.mock(import('nanospinner'), () => ({
  createSpinner: vi.fn(),
}))

vi.mock(import('../../core/config/load-release-table'), () => ({
  loadReleaseTable: vi.fn(),
}))

describe('loadCliReleaseTable', () => {
  let spinner = {
    success: vi.fn(),
    error: vi.fn(),
    start: vi.fn(),
  }

  beforeEach(() => {
    vi.clearAllMocks()
    spinner.start.mockReturnValue(spinner)
    vi.mocked(createSpinner).mockReturnValue(spinner as never)
  })

  it('returns the bundled table without a path', async () => {
    await expect(loadCliReleaseTable(undefined)).resolves.toBe(
      DEFAULT_RELEASE_TABLE,
    )
    expect(createSpinner).not.toHaveBeenCalled()
  })

  it('loads the table from the given file', async () => {
    vi.mocked(loadReleaseTable).mockResolvedValue(DEFAULT_RELEASE_TABLE)

    await expect(loadCliReleaseTable('conditions.yml')).resolves.toBe(
      DEFAULT_RELEASE_TABLE,
    )
    expect(loadReleaseTable).toHaveBeenCalledWith('conditions.yml')
    expect(spinner.success).toHaveBeenCalledTimes(1)
  })

  it('marks the spinner as failed and rethrows', async () => {
    vi.mocked(loadReleaseTable).mockRejectedValue(
      new ReleaseTableError('Invalid release table in conditions.yml'),
    )

    await expect(loadCliReleaseTable('conditions.yml')).rejects.toThrowError(
      'Invalid release table in conditions.yml',
    )
    expect(spinner.error).toHaveBeenCalledWith('Failed')
  })
})
