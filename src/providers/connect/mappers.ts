import type { FetchedContact } from '../../services/contact-search/types.js';
import type { ConnectContactSummary } from './types.js';

export function mapConnectContact(
  raw: ConnectContactSummary,
  contactAttributes: Record<string, string> = {},
): FetchedContact {
  const system: Record<string, string | undefined> = {
    channel: raw.Channel,
    initiationMethod: raw.InitiationMethod,
    initialContactId: raw.InitialContactId,
    previousContactId: raw.PreviousContactId,
    enqueuedAt: raw.QueueInfo?.EnqueueTimestamp?.toISOString(),
    connectedToAgentAt: raw.AgentInfo?.ConnectedToAgentTimestamp?.toISOString(),
    disconnectedAt: raw.DisconnectTimestamp?.toISOString(),
  };

  // Custom contact attributes keep their values when a key collides with a system field.
  const attributes: Record<string, string> = { ...contactAttributes };
  for (const [key, value] of Object.entries(system)) {
    if (value != null && value !== '' && !Object.hasOwn(attributes, key)) attributes[key] = value;
  }

  return {
    contactId: raw.Id,
    initiatedAt: raw.InitiationTimestamp?.getTime(),
    queue: raw.QueueInfo?.Id,
    agent: raw.AgentInfo?.Id,
    attributes,
  };
}
