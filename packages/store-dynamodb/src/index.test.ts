import * as dynamodb from './index.js';

describe('store-dynamodb index exports', () => {
  it('re-exports the store class and table helpers', () => {
    expect(dynamodb.DynamoDBTtlStore).toBeTypeOf('function');
    expect(dynamodb.ensureTable).toBeTypeOf('function');
    expect(dynamodb.DEFAULT_TABLE_NAME).toBe('window-guard');
  });
});
