import {
  DynamoDBClient,
  type DynamoDBClientConfig,
} from '@aws-sdk/client-dynamodb';
import {
  DeleteCommand,
  DynamoDBDocumentClient,
  GetCommand,
  PutCommand,
  UpdateCommand,
} from '@aws-sdk/lib-dynamodb';
import type {
  AtomicTtlStore,
  InspectableTtlStore,
  TtlEntryInfo,
  TtlStoreStats,
} from '@window-guard/core';
import {
  assertDynamoKeyPart,
  deleteItems,
  isConditionalCheckFailure,
  scanItemsAllPages,
} from './dynamodb-utils.js';
import { DEFAULT_TABLE_NAME, ensureTable } from './table.js';

export interface DynamoDBTtlStoreOptions {
  client?: DynamoDBDocumentClient | DynamoDBClient;
  region?: string;
  tableName?: string;
  ensureTableExists?: boolean;
}

const KEY_PREFIX = 'TTL#';
const COUNTER_SK = 'COUNTER';
const MAX_INCREMENT_ATTEMPTS = 3;

const ATTRIBUTE_NAMES = {
  '#value': 'value',
  '#expiresAt': 'expiresAt',
  '#ttl': 'ttl',
} as const;

function readNumber(
  item: Record<string, unknown>,
  name: string,
): number | undefined {
  const value = item[name];
  return typeof value === 'number' ? value : undefined;
}

/**
 * Counters stored as `{ pk: "TTL#<key>", sk: "COUNTER" }` items. DynamoDB's
 * TTL sweeper deletes expired items lazily, so every read also compares
 * `expiresAt` against the clock.
 */
export class DynamoDBTtlStore implements AtomicTtlStore, InspectableTtlStore {
  private readonly docClient: DynamoDBDocumentClient;
  private readonly rawClient: DynamoDBClient | undefined;
  private readonly isClientManaged: boolean;
  private readonly tableName: string;
  private readonly readyPromise: Promise<void>;
  private isDestroyed = false;

  constructor({
    client,
    region,
    tableName = DEFAULT_TABLE_NAME,
    ensureTableExists = false,
  }: DynamoDBTtlStoreOptions = {}) {
    this.tableName = tableName;

    if (client instanceof DynamoDBDocumentClient) {
      this.docClient = client;
      this.isClientManaged = false;
    } else if (client instanceof DynamoDBClient) {
      this.docClient = DynamoDBDocumentClient.from(client);
      this.isClientManaged = false;
    } else {
      const config: DynamoDBClientConfig = {};
      if (region) config.region = region;
      this.rawClient = new DynamoDBClient(config);
      this.docClient = DynamoDBDocumentClient.from(this.rawClient);
      this.isClientManaged = true;
    }

    if (ensureTableExists) {
      const rawForTable =
        this.rawClient ??
        (client instanceof DynamoDBClient
          ? client
          : new DynamoDBClient(region ? { region } : {}));
      this.readyPromise = ensureTable(rawForTable, this.tableName);
    } else {
      this.readyPromise = Promise.resolve();
    }
  }

  async get(key: string): Promise<number | undefined> {
    await this.ready();

    const result = await this.docClient.send(
      new GetCommand({
        TableName: this.tableName,
        Key: this.itemKey(key),
        ConsistentRead: true,
      }),
    );

    const item = result.Item;
    if (!item) return undefined;

    const expiresAt = readNumber(item, 'expiresAt');
    if (expiresAt === undefined || expiresAt <= Date.now()) {
      return undefined;
    }
    return readNumber(item, 'value');
  }

  async set(key: string, value: number, ttlSeconds: number): Promise<void> {
    await this.ready();

    await this.docClient.send(
      new PutCommand({
        TableName: this.tableName,
        Item: { ...this.itemKey(key), value, ...this.expiry(ttlSeconds) },
      }),
    );
  }

  async delete(key: string): Promise<void> {
    await this.ready();

    await this.docClient.send(
      new DeleteCommand({
        TableName: this.tableName,
        Key: this.itemKey(key),
      }),
    );
  }

  /**
   * Conditional update of a live counter, falling back to a conditional put
   * that (re)creates an absent or expired one. Both writes are guarded, so
   * concurrent callers cannot push the counter past `max`.
   */
  async incrementBelow(
    key: string,
    max: number,
    ttlSeconds: number,
  ): Promise<number | undefined> {
    await this.ready();

    if (max <= 0) return undefined;

    for (let attempt = 0; attempt < MAX_INCREMENT_ATTEMPTS; attempt++) {
      const now = Date.now();
      const { expiresAt, ttl } = this.expiry(ttlSeconds);

      try {
        const result = await this.docClient.send(
          new UpdateCommand({
            TableName: this.tableName,
            Key: this.itemKey(key),
            UpdateExpression:
              'SET #value = #value + :one, #expiresAt = :expiresAt, #ttl = :ttl',
            ConditionExpression:
              'attribute_exists(pk) AND #expiresAt > :now AND #value < :max',
            ExpressionAttributeNames: ATTRIBUTE_NAMES,
            ExpressionAttributeValues: {
              ':one': 1,
              ':expiresAt': expiresAt,
              ':ttl': ttl,
              ':now': now,
              ':max': max,
            },
            ReturnValues: 'UPDATED_NEW',
          }),
        );
        const updated = result.Attributes
          ? readNumber(result.Attributes, 'value')
          : undefined;
        if (updated === undefined) {
          throw new Error(`Counter "${key}" returned no value after update`);
        }
        return updated;
      } catch (error: unknown) {
        if (!isConditionalCheckFailure(error)) throw error;
      }

      try {
        await this.docClient.send(
          new PutCommand({
            TableName: this.tableName,
            Item: { ...this.itemKey(key), value: 1, expiresAt, ttl },
            ConditionExpression:
              'attribute_not_exists(pk) OR #expiresAt <= :now',
            ExpressionAttributeNames: { '#expiresAt': 'expiresAt' },
            ExpressionAttributeValues: { ':now': now },
          }),
        );
        return 1;
      } catch (error: unknown) {
        if (!isConditionalCheckFailure(error)) throw error;
      }

      // Both guards failed: either the counter is live and full, or another
      // writer recreated it between the two calls.
      const current = await this.get(key);
      if (current !== undefined && current >= max) {
        return undefined;
      }
    }

    return undefined;
  }

  async getStats(): Promise<TtlStoreStats> {
    const items = await this.scanCounters();
    const now = Date.now();
    const expiredEntries = items.filter((item) => {
      const expiresAt = readNumber(item, 'expiresAt');
      return expiresAt === undefined || expiresAt <= now;
    }).length;
    return { totalEntries: items.length, expiredEntries };
  }

  async listEntries(): Promise<Array<TtlEntryInfo>> {
    const items = await this.scanCounters();
    const now = Date.now();
    const entries: Array<TtlEntryInfo> = [];
    for (const item of items) {
      const pk = item['pk'];
      const value = readNumber(item, 'value');
      const expiresAt = readNumber(item, 'expiresAt');
      if (
        typeof pk === 'string' &&
        value !== undefined &&
        expiresAt !== undefined &&
        expiresAt > now
      ) {
        entries.push({ key: pk.slice(KEY_PREFIX.length), value, expiresAt });
      }
    }
    return entries.sort((a, b) => a.key.localeCompare(b.key));
  }

  async clear(): Promise<void> {
    await this.ready();

    const items = await scanItemsAllPages(this.docClient, {
      TableName: this.tableName,
      FilterExpression: 'begins_with(pk, :prefix)',
      ExpressionAttributeValues: { ':prefix': KEY_PREFIX },
      ProjectionExpression: 'pk, sk',
    });

    await deleteItems(
      this.docClient,
      this.tableName,
      items.map((item) => ({ pk: item['pk'], sk: item['sk'] })),
    );
  }

  async close(): Promise<void> {
    this.destroy();
  }

  destroy(): void {
    this.isDestroyed = true;

    if (this.isClientManaged && this.rawClient) {
      this.rawClient.destroy();
    }
  }

  private async scanCounters(): Promise<Array<Record<string, unknown>>> {
    await this.ready();

    return scanItemsAllPages(this.docClient, {
      TableName: this.tableName,
      FilterExpression: 'begins_with(pk, :prefix)',
      ExpressionAttributeValues: { ':prefix': KEY_PREFIX },
      ProjectionExpression: 'pk, #value, #expiresAt',
      ExpressionAttributeNames: {
        '#value': 'value',
        '#expiresAt': 'expiresAt',
      },
    });
  }

  private async ready(): Promise<void> {
    if (this.isDestroyed) {
      throw new Error('TTL store has been destroyed');
    }
    await this.readyPromise;
  }

  private itemKey(key: string): { pk: string; sk: string } {
    assertDynamoKeyPart(key, 'TTL key');
    return { pk: `${KEY_PREFIX}${key}`, sk: COUNTER_SK };
  }

  private expiry(ttlSeconds: number): { expiresAt: number; ttl: number } {
    const expiresAt = Date.now() + ttlSeconds * 1000;
    return { expiresAt, ttl: Math.ceil(expiresAt / 1000) };
  }
}
