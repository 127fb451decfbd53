import type {
  DescribeInstanceCommandInput,
  DescribeInstanceCommandOutput,
  GetContactAttributesCommandInput,
  GetContactAttributesCommandOutput,
  GetCurrentUserDataCommandInput,
  GetCurrentUserDataCommandOutput,
  ListQueuesCommandInput,
  ListQueuesCommandOutput,
  ListUsersCommandInput,
  ListUsersCommandOutput,
  SearchContactsCommandInput,
  SearchContactsCommandOutput,
} from '@aws-sdk/client-connect';

/** The slice of the Amazon Connect API this service calls. */
export interface ConnectApi {
  searchContacts(input: SearchContactsCommandInput, signal?: AbortSignal): Promise<SearchContactsCommandOutput>;
  getContactAttributes(
    input: GetContactAttributesCommandInput,
    signal?: AbortSignal,
  ): Promise<GetContactAttributesCommandOutput>;
  describeInstance(input: DescribeInstanceCommandInput): Promise<DescribeInstanceCommandOutput>;
  listQueues(input: ListQueuesCommandInput): Promise<ListQueuesCommandOutput>;
  listUsers(input: ListUsersCommandInput): Promise<ListUsersCommandOutput>;
  getCurrentUserData(input: GetCurrentUserDataCommandInput): Promise<GetCurrentUserDataCommandOutput>;
}

export type ConnectContactSummary = NonNullable<SearchContactsCommandOutput['Contacts']>[number];
