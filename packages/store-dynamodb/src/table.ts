import {
  CreateTableCommand,
  DescribeTableCommand,
  ResourceNotFoundException,
  UpdateTimeToLiveCommand,
  type DynamoDBClient,
  type TableStatus,
} from '@aws-sdk/client-dynamodb';

export const DEFAULT_TABLE_NAME = 'window-guard';

/** Attribute DynamoDB's TTL sweeper reads (epoch seconds). */
export const TTL_ATTRIBUTE = 'ttl';

export interface TableWaitOptions {
  /** Status polls before giving up. */
  attempts?: number;
  intervalMs?: number;
}

async function describeStatus(
  client: DynamoDBClient,
  tableName: string,
): Promise<TableStatus | undefined> {
  const { Table } = await client.send(
    new DescribeTableCommand({ TableName: tableName }),
  );
  return Table?.TableStatus;
}

async function waitUntilActive(
  client: DynamoDBClient,
  tableName: string,
  { attempts = 30, intervalMs = 1000 }: TableWaitOptions,
): Promise<void> {
  for (let poll = 1; poll <= attempts; poll++) {
    if ((await describeStatus(client, tableName)) === 'ACTIVE') return;
    if (poll < attempts) {
      await new Promise((resolve) => setTimeout(resolve, intervalMs));
    }
  }
  throw new Error(
    `Table ${tableName} is not ACTIVE after ${attempts} status checks`,
  );
}

/**
 * Create the counter table (`pk`/`sk` strings, on-demand billing) and turn on
 * DynamoDB TTL for `ttl` once the table is ACTIVE.
 */
export async function createTable(
  client: DynamoDBClient,
  tableName: string = DEFAULT_TABLE_NAME,
  wait: TableWaitOptions = {},
): Promise<void> {
  await client.send(
    new CreateTableCommand({
      TableName: tableName,
      BillingMode: 'PAY_PER_REQUEST',
      KeySchema: [
        { AttributeName: 'pk', KeyType: 'HASH' },
        { AttributeName: 'sk', KeyType: 'RANGE' },
      ],
      AttributeDefinitions: [
        { AttributeName: 'pk', AttributeType: 'S' },
        { AttributeName: 'sk', AttributeType: 'S' },
      ],
    }),
  );

  // TTL cannot be configured while the table is CREATING
  await waitUntilActive(client, tableName, wait);

  await client.send(
    new UpdateTimeToLiveCommand({
      TableName: tableName,
      TimeToLiveSpecification: { AttributeName: TTL_ATTRIBUTE, Enabled: true },
    }),
  );
}

/**
 * Make sure the counter table exists and is ACTIVE, creating it when missing.
 */
export async function ensureTable(
  client: DynamoDBClient,
  tableName: string = DEFAULT_TABLE_NAME,
  wait: TableWaitOptions = {},
): Promise<void> {
  let status: TableStatus | undefined;
  try {
    status = await describeStatus(client, tableName);
  } catch (error: unknown) {
    if (!(error instanceof ResourceNotFoundException)) throw error;
    await createTable(client, tableName, wait);
    return;
  }

  if (status !== 'ACTIVE') {
    await waitUntilActive(client, tableName, wait);
  }
}
