import type { ConditionsTask } from '../../types/conditions-task'
import type { TicketRoute } from '../../types/ticket-route'

import { normalizeTicketRoute } from './normalize-ticket-route'
import { TICKET_ROUTES } from './task-tables'

/**
 * Get how global tag requests of a task are reported to the ticket tracker.
 *
 * @param task - Task identifier.
 * @returns Ticket route.
 */
export function getTicketRoute(task: ConditionsTask): TicketRoute {
  return normalizeTicketRoute(TICKET_ROUTES[task])
}
