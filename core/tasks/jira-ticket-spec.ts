import type { ConditionsTask } from '../../types/conditions-task'
import type { TicketIssue } from '../../types/ticket-issue'

import { getTicketRoute } from './get-ticket-route'
import { toTicketIssue } from './to-ticket-issue'

/**
 * Get the complete ticket-tracker issue record for a task's global tag
 * requests.
 *
 * @param task - Task identifier.
 * @returns Issue record, or null when no ticket is wanted.
 */
export function jiraTicketSpec(task: ConditionsTask): TicketIssue | null {
  return toTicketIssue(getTicketRoute(task))
}
