import type {
  DirectoryProvider,
  InstanceSummary,
  QueueSummary,
  UserSummary,
} from '../../providers/types.js';
import type { Criterion, FetchedContact, FilterSpec } from '../contact-search/types.js';
import type { FilterResolver } from '../contact-search/index.js';
import { NotFoundError } from '../../lib/errors.js';
import { logger } from '../../lib/logger.js';

export interface DirectorySnapshot {
  instance: InstanceSummary;
  queues: QueueSummary[];
  users: UserSummary[];
  loadedAt: string;
}

export interface UserStatus {
  userName: string;
  statusName: string;
}

/**
 * Caches the instance's standard queues and users so the search form can work
 * with names while the provider filters on ids.
 */
export class DirectoryService implements FilterResolver {
  private snapshot?: DirectorySnapshot;
  private loading?: Promise<DirectorySnapshot>;

  constructor(private readonly provider: DirectoryProvider) {}

  async loadConfiguration(): Promise<DirectorySnapshot> {
    if (this.snapshot) return this.snapshot;
    this.loading ??= this.fetchSnapshot().finally(() => {
      this.loading = undefined;
    });
    return this.loading;
  }

  async refresh(): Promise<DirectorySnapshot> {
    this.snapshot = undefined;
    return this.loadConfiguration();
  }

  async resolveQueueIds(names: string[]): Promise<string[]> {
    const { queues } = await this.loadConfiguration();
    return names.map(name => {
      const queue = queues.find(q => q.name === name || q.id === name);
      if (!queue) throw new NotFoundError('Queue', name);
      return queue.id;
    });
  }

  async resolveFilterSpec(spec: FilterSpec): Promise<FilterSpec> {
    // Criteria on queue or agent that stay names are matched in memory through
    // describeContact, which reads the same snapshot.
    const needsLookup = spec.criteria.some(c => c.attribute === 'queue' || c.attribute === 'agent');
    if (!needsLookup) return spec;

    const { queues, users } = await this.loadConfiguration();
    const queueIds = new Map(queues.map(q => [q.name, q.id]));
    const userIds = new Map(users.map(u => [u.username, u.id]));

    const criteria = spec.criteria.map((c): Criterion => {
      if (c.operator !== 'equals') return c;
      const lookup = c.attribute === 'queue' ? queueIds : c.attribute === 'agent' ? userIds : undefined;
      const id = lookup?.get(c.value);
      return id ? Object.freeze({ ...c, value: id }) : c;
    });

    return Object.freeze({ ...spec, criteria: Object.freeze(criteria) });
  }

  /**
   * Fills in queue and agent names from the loaded directory. Contacts pass
   * through unchanged until the directory has been loaded.
   */
  describeContact(contact: FetchedContact): FetchedContact {
    if (!this.snapshot) return contact;
    const queueName = contact.queue ? this.snapshot.queues.find(q => q.id === contact.queue)?.name : undefined;
    const agentName = contact.agent ? this.snapshot.users.find(u => u.id === contact.agent)?.username : undefined;
    if (!queueName && !agentName) return contact;
    return {
      ...contact,
      ...(queueName ? { queueName } : {}),
      ...(agentName ? { agentName } : {}),
    };
  }

  /** Agents currently serving any of the named queues, with their routing status. */
  async getCurrentUserStatuses(queueNames: string[]): Promise<UserStatus[]> {
    const queueIds = await this.resolveQueueIds(queueNames);
    const { users } = await this.loadConfiguration();
    const usernames = new Map(users.map(u => [u.id, u.username]));

    const statuses = await this.provider.getCurrentUserData(queueIds);
    return statuses.map(s => ({
      userName: usernames.get(s.userId) ?? s.userId,
      statusName: s.statusName,
    }));
  }

  private async fetchSnapshot(): Promise<DirectorySnapshot> {
    const [instance, queues, users] = await Promise.all([
      this.provider.describeInstance(),
      this.provider.listQueues(),
      this.provider.listUsers(),
    ]);
    this.snapshot = { instance, queues, users, loadedAt: new Date().toISOString() };
    logger.info({ instanceId: instance.id, queues: queues.length, users: users.length }, 'Directory loaded');
    return this.snapshot;
  }
}
