import {
  BatchWriteCommand,
  ScanCommand,
  type DynamoDBDocumentClient,
  type ScanCommandInput,
} from '@aws-sdk/lib-dynamodb';

type DynamoItem = Record<string, unknown>;

/** BatchWriteItem accepts at most 25 requests. */
const BATCH_WRITE_LIMIT = 25;
const MAX_BATCH_WRITE_RETRIES = 8;
const MAX_DYNAMO_KEY_PART_BYTES = 1024;

function retryDelayMs(retry: number): number {
  const base = 50 * 2 ** retry;
  return Math.min(1000, base) + Math.floor((Math.random() * base) / 2);
}

async function sendDeletes(
  docClient: DynamoDBDocumentClient,
  tableName: string,
  keys: Array<DynamoItem>,
): Promise<Array<DynamoItem>> {
  const { UnprocessedItems } = await docClient.send(
    new BatchWriteCommand({
      RequestItems: {
        [tableName]: keys.map((Key) => ({ DeleteRequest: { Key } })),
      },
    }),
  );
  return (UnprocessedItems?.[tableName] ?? []).flatMap((request) => {
    const key = request.DeleteRequest?.Key;
    return key ? [key] : [];
  });
}

/**
 * Delete `keys` in BatchWrite chunks, resending the deletes DynamoDB leaves
 * unprocessed with exponential backoff.
 */
export async function deleteItems(
  docClient: DynamoDBDocumentClient,
  tableName: string,
  keys: Array<DynamoItem>,
  maxRetries: number = MAX_BATCH_WRITE_RETRIES,
): Promise<void> {
  for (let start = 0; start < keys.length; start += BATCH_WRITE_LIMIT) {
    let pending = keys.slice(start, start + BATCH_WRITE_LIMIT);

    for (let retry = 0; ; retry++) {
      pending = await sendDeletes(docClient, tableName, pending);
      if (pending.length === 0) break;
      if (retry === maxRetries) {
        throw new Error(
          `Unprocessed deletes remain in "${tableName}" after ${maxRetries} retries`,
        );
      }
      await new Promise((resolve) => setTimeout(resolve, retryDelayMs(retry)));
    }
  }
}

export async function scanItemsAllPages(
  docClient: DynamoDBDocumentClient,
  input: ScanCommandInput,
): Promise<Array<DynamoItem>> {
  const items: Array<DynamoItem> = [];
  let lastEvaluatedKey: DynamoItem | undefined;

  do {
    const result = await docClient.send(
      new ScanCommand({
        ...input,
        ExclusiveStartKey: lastEvaluatedKey,
      }),
    );

    if (result.Items?.length) {
      items.push(...result.Items);
    }

    lastEvaluatedKey = result.LastEvaluatedKey;
  } while (lastEvaluatedKey);

  return items;
}

export function isConditionalCheckFailure(error: unknown): boolean {
  return (
    error instanceof Error && error.name === 'ConditionalCheckFailedException'
  );
}

export function assertDynamoKeyPart(
  value: string,
  label: string,
  maxBytes = MAX_DYNAMO_KEY_PART_BYTES,
): void {
  if (value.length === 0) {
    throw new Error(`${label} must not be empty`);
  }

  for (let i = 0; i < value.length; i++) {
    const charCode = value.charCodeAt(i);
    if (charCode < 0x20 || charCode === 0x7f) {
      throw new Error(`${label} contains unsupported control characters`);
    }
  }

  if (Buffer.byteLength(value, 'utf8') > maxBytes) {
    throw new Error(`${label} exceeds maximum length of ${maxBytes} bytes`);
  }
}
