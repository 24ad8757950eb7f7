import type { ConditionsTask } from '../../types/conditions-task'

import { UPLOAD_GLOBAL_TAGS } from './task-tables'

/**
 * Get the global tag that uploads of a task go to.
 *
 * @param task - Task identifier.
 * @returns Global tag name, or null when every upload request gets a new tag.
 */
export function getUploadGlobalTag(task: ConditionsTask): string | null {
  return UPLOAD_GLOBAL_TAGS[task]
}
