import type { TicketIssue } from './ticket-issue'

/** How a global tag request is reported to the ticket tracker. */
export type TicketRoute =
  | {
      /** Description format string replacing the default one. */
      description?: string

      /** Key of the issue to comment on. */
      issueKey: string
      kind: 'comment'
    }
  | {
      kind: 'create-issue-with-description'

      /** Description format string replacing the default one. */
      description: string
      issue: TicketIssue
    }
  | {
      kind: 'create-issue'
      issue: TicketIssue
    }
  | {
      kind: 'none'
    }

/**
 * Shorthand accepted in routing tables: nothing, an issue key to comment on,
 * an issue to create, or either of those paired with a description.
 */
export type LegacyTicketRoute =
  | [TicketIssue | string, string]
  | TicketIssue
  | string
  | null
