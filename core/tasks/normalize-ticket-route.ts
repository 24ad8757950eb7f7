import type { LegacyTicketRoute, TicketRoute } from '../../types/ticket-route'

/**
 * Turn a shorthand ticket routing entry into a tagged route.
 *
 * @param raw - Routing entry: null, an issue key, an issue record, or one of
 *   the latter two paired with a description format string.
 * @returns Normalized route.
 */
export function normalizeTicketRoute(raw: LegacyTicketRoute): TicketRoute {
  if (raw === null) {
    return { kind: 'none' }
  }

  if (Array.isArray(raw)) {
    let [target, description] = raw
    if (typeof target === 'string') {
      return { kind: 'comment', issueKey: target, description }
    }
    return {
      kind: 'create-issue-with-description',
      issue: structuredClone(target),
      description,
    }
  }

  if (typeof raw === 'string') {
    return { kind: 'comment', issueKey: raw }
  }

  return { kind: 'create-issue', issue: structuredClone(raw) }
}
