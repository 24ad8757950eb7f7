import type { ConditionsTask } from '../types/conditions-task'

import { isConditionsTask } from '../core/tasks/is-conditions-task'
import { CONDITIONS_TASKS } from '../core/constants'

/**
 * Normalizes the task argument.
 *
 * @param task - Raw task argument.
 * @returns Normalized task.
 */
export function normalizeConditionsTask(task: string): ConditionsTask {
  let normalized = task.trim().toLowerCase()
  if (isConditionsTask(normalized)) {
    return normalized
  }
  throw new Error(
    `Invalid task "${task}". Expected one of: ${CONDITIONS_TASKS.join(', ')}.`,
  )
}
