import type { ConditionsTask } from '../../types/conditions-task'

import { CONDITIONS_TASKS } from '../constants'

/**
 * Type guard for task identifiers.
 *
 * @param value - The value to check.
 * @returns True if the value names a known task.
 */
export function isConditionsTask(value: unknown): value is ConditionsTask {
  return CONDITIONS_TASKS.some(task => task === value)
}
