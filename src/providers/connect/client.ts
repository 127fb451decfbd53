import {
  ConnectClient,
  DescribeInstanceCommand,
  GetContactAttributesCommand,
  GetCurrentUserDataCommand,
  ListQueuesCommand,
  ListUsersCommand,
  SearchContactsCommand,
} from '@aws-sdk/client-connect';
import type { ConnectApi } from './types.js';

/**
 * Wraps an authenticated ConnectClient. The client (and its credential chain)
 * is built by the caller; nothing here reads or refreshes credentials.
 */
export function createConnectApi(client: ConnectClient): ConnectApi {
  return {
    searchContacts: (input, signal) =>
      client.send(new SearchContactsCommand(input), { abortSignal: signal }),
    getContactAttributes: (input, signal) =>
      client.send(new GetContactAttributesCommand(input), { abortSignal: signal }),
    describeInstance: input => client.send(new DescribeInstanceCommand(input)),
    listQueues: input => client.send(new ListQueuesCommand(input)),
    listUsers: input => client.send(new ListUsersCommand(input)),
    getCurrentUserData: input => client.send(new GetCurrentUserDataCommand(input)),
  };
}

export function createConnectClient(region?: string): ConnectClient {
  return new ConnectClient(region ? { region } : {});
}
