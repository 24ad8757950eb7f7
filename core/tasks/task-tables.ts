import type { LegacyTicketRoute } from '../../types/ticket-route'
import type { ConditionsTask } from '../../types/conditions-task'

/**
 * Global tag used for uploads of each task. Null means a new tag is created
 * for every upload request.
 */
export const UPLOAD_GLOBAL_TAGS: Readonly<
  Record<ConditionsTask, string | null>
> = {
  validation: null,
  analysis: null,
  master: null,
  online: null,
  prompt: null,
  main: null,
  data: null,
  mc: null,
}

/**
 * Ticket routing of global tag requests per task, in shorthand form.
 *
 * An issue record creates a new issue (an empty record creates an unassigned
 * task in the default project), a string comments on that issue, and a pair
 * adds a description format string to either. The summary and description
 * may use the `{tag}`, `{user}`, `{reason}`, `{release}`, `{request}`,
 * `{task}` and `{time}` fields.
 */
export const TICKET_ROUTES: Readonly<
  Record<ConditionsTask, LegacyTicketRoute>
> = {
  validation: { assignee: { name: 'validation-conditions' } },
  analysis: { assignee: { name: 'analysis-conditions' } },
  master: { assignee: { name: 'main-conditions' } },
  online: { assignee: { name: 'online-conditions' } },
  prompt: { assignee: { name: 'prompt-conditions' } },
  main: { assignee: { name: 'main-conditions' } },
  data: { assignee: { name: 'prompt-conditions' } },
  mc: { assignee: { name: 'mc-conditions' } },
}
