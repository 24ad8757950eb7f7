import type { TicketIssue } from '../../types/ticket-issue'
import type { TicketRoute } from '../../types/ticket-route'

import {
  DEFAULT_TICKET_PROJECT,
  DEFAULT_ISSUE_TYPE,
  SUB_ISSUE_TYPE_ID,
} from '../constants'

/**
 * Express a ticket route as a complete issue record, for clients that can
 * only create issues.
 *
 * Comments become sub-issues of the issue they would comment on, description
 * overrides are dropped, and the project and issue type get their defaults.
 *
 * @param route - Ticket route.
 * @returns Issue record, or null when no ticket is wanted.
 */
export function toTicketIssue(route: TicketRoute): TicketIssue | null {
  let issue = getRoutedIssue(route)
  if (!issue) {
    return null
  }
  return {
    ...issue,
    issuetype: issue.issuetype ?? { name: DEFAULT_ISSUE_TYPE },
    project: issue.project ?? { key: DEFAULT_TICKET_PROJECT },
  }
}

function getRoutedIssue(route: TicketRoute): TicketIssue | null {
  switch (route.kind) {
    case 'create-issue-with-description':
    case 'create-issue':
      return route.issue
    case 'comment':
      return {
        issuetype: { id: SUB_ISSUE_TYPE_ID },
        parent: { key: route.issueKey },
      }
    case 'none':
      return null
  }
}
