/** Fields of a ticket-tracker issue created for a global tag request. */
export interface TicketIssue {
  /** Issue type, by numeric id (`5` is a sub-issue) or by name. */
  issuetype?: { name: string } | { id: string }

  /** Project the issue is filed in. */
  project?: { key: string }

  /** Person the issue is assigned to. */
  assignee?: { name: string }

  /** Parent issue, for sub-issues. */
  parent?: { key: string }

  /** Summary format string. */
  summary?: string
}
