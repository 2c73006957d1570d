/**
 * User-facing labels for the agents the router can pick.
 * Used for clarification buttons and to describe candidates to the model.
 */

export const AGENT_LABELS: Readonly<Record<string, string>> = {
  equipment_checkout: 'Borrow equipment (laptops, chargers, cameras, etc.)',
  libcal_hours: 'Library hours or room reservations',
  subject_librarian: 'Find a subject librarian or research guide',
  libguide: 'Course guides or research resources',
  google_site: 'Library policies, services, or website info',
  libchat_handoff: 'Talk to a librarian',
  ticket_request: 'Submit a help ticket',
  out_of_scope: 'This is not a library question',
};

export const OTHER_OPTION_LABEL = 'None of these (type more details)';

/**
 * Label for an agent id; unknown agents are shown by id
 */
export function agentLabel(agentId: string): string {
  return Object.prototype.hasOwnProperty.call(AGENT_LABELS, agentId) ? AGENT_LABELS[agentId] : agentId;
}
