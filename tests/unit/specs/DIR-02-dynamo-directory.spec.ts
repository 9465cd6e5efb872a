/**
 * DIR-02: DynamoDB User Directory
 *
 * Key layout, email lock transactions and error mapping, against a mocked
 * document client. No AWS endpoint is contacted.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mockClient } from 'aws-sdk-client-mock';
import { DynamoDBClient, TransactionCanceledException } from '@aws-sdk/client-dynamodb';
import {
  DynamoDBDocumentClient,
  GetCommand,
  QueryCommand,
  ScanCommand,
  TransactWriteCommand,
} from '@aws-sdk/lib-dynamodb';
import { DynamoUserDirectory, storage } from '@account-service/shared';
import type { EmailLockItem, UserItem, UserRecord } from '../../../modules/shared_types/user';
import { captureConsole } from '../support/console';
import type { ConsoleCapture } from '../support/console';

const TABLE = 'account-service-test';
const NOW = '2025-01-01T00:00:00.000Z';

const ddbMock = mockClient(DynamoDBDocumentClient);

function record(overrides: Partial<UserRecord> = {}): UserRecord {
  return {
    id: 'user-1',
    email: 'Ada@Example.com',
    firstName: 'Ada',
    lastName: 'Lovelace',
    passwordHash: 'test-hash',
    isDeleted: false,
    deletedAt: null,
    createdAt: '2024-12-01T00:00:00.000Z',
    updatedAt: '2024-12-01T00:00:00.000Z',
    ...overrides,
  };
}

/** Raw item as the document client returns it */
function raw(item: UserItem | EmailLockItem): Record<string, unknown> {
  return { ...item };
}

function userItem(user: UserRecord): Record<string, unknown> {
  return raw(storage.toUserItem(user));
}

function cancelled(...codes: string[]): TransactionCanceledException {
  return new TransactionCanceledException({
    message: 'Transaction cancelled',
    $metadata: {},
    CancellationReasons: codes.map(Code => ({ Code })),
  });
}

describe('DIR-02: DynamoDB User Directory', () => {
  let directory: DynamoUserDirectory;
  let logs: ConsoleCapture;

  beforeEach(() => {
    logs = captureConsole();
    ddbMock.reset();
    const client = DynamoDBDocumentClient.from(new DynamoDBClient({ region: 'us-east-1' }));
    directory = new DynamoUserDirectory(client, { tableName: TABLE, clock: () => new Date(NOW) });
  });

  afterEach(() => {
    logs.spy.mockRestore();
  });

  describe('item mapping', () => {
    it('should key profiles by id and index them by normalized email', () => {
      const item = storage.toUserItem(record());

      expect(item.PK).toBe('USER#user-1');
      expect(item.SK).toBe('PROFILE');
      expect(item.GSI1PK).toBe('EMAIL#Ada@Example.com');
      expect(item.GSI1SK).toBe('USER');
      expect(storage.toUserRecord(raw(item))).toEqual(record());
    });

    it('should move deleted profiles out of the active index slot', () => {
      const item = storage.toUserItem(record({ isDeleted: true, deletedAt: NOW }));

      expect(item.GSI1SK).toBe(`DELETED#${NOW}`);
    });

    it('should not read lock items or incomplete profiles as users', () => {
      expect(storage.toUserRecord(raw(storage.toEmailLockItem('ada@example.com', 'user-1', NOW)))).toBeNull();
      expect(storage.toUserRecord({ entityType: 'USER', id: 'user-1' })).toBeNull();
      expect(storage.toUserRecord(undefined)).toBeNull();
    });
  });

  describe('findByEmail', () => {
    it('should query the active slot of the email index', async () => {
      ddbMock.on(QueryCommand).resolves({ Items: [userItem(record())] });

      const result = await directory.findByEmail('Ada@Example.com');

      expect(result).toEqual({ ok: true, value: record() });
      const [call] = ddbMock.commandCalls(QueryCommand);
      expect(call.args[0].input).toEqual({
        TableName: TABLE,
        IndexName: 'GSI1',
        KeyConditionExpression: 'GSI1PK = :pk AND GSI1SK = :sk',
        ExpressionAttributeValues: { ':pk': 'EMAIL#Ada@Example.com', ':sk': 'USER' },
      });
    });

    it('should key the lookup on the email exactly as given', async () => {
      ddbMock.on(QueryCommand).resolves({ Items: [] });

      const result = await directory.findByEmail('ADA@example.com');

      expect(result).toEqual({ ok: true, value: null });
      const values = ddbMock.commandCalls(QueryCommand)[0].args[0].input.ExpressionAttributeValues;
      expect(values?.[':pk']).toBe('EMAIL#ADA@example.com');
    });

    it('should return the most recently created deleted match when deleted users are included', async () => {
      const older = record({ id: 'user-1', isDeleted: true, deletedAt: NOW, createdAt: '2024-01-01T00:00:00.000Z' });
      const newer = record({ id: 'user-2', isDeleted: true, deletedAt: NOW, createdAt: '2024-06-01T00:00:00.000Z' });
      ddbMock.on(QueryCommand).resolves({ Items: [userItem(newer), userItem(older)] });

      const result = await directory.findByEmail('ada@example.com', { includeDeleted: true });

      expect(result.ok && result.value?.id).toBe('user-2');
      expect(ddbMock.commandCalls(QueryCommand)[0].args[0].input.KeyConditionExpression).toBe('GSI1PK = :pk');
    });

    it('should report unavailable when the query fails', async () => {
      ddbMock.on(QueryCommand).rejects(new Error('AccessDeniedException'));

      const result = await directory.findByEmail('ada@example.com');

      expect(result).toEqual({
        ok: false,
        error: { kind: 'unavailable', message: 'findByEmail failed: Error: AccessDeniedException' },
      });
    });
  });

  describe('create', () => {
    it('should write the email lock and the profile in one transaction', async () => {
      ddbMock.on(TransactWriteCommand).resolves({});

      const result = await directory.create({ email: 'Ada@Example.com', firstName: 'Ada', passwordHash: 'test-hash' });

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.value.id).toMatch(/^[0-9a-f-]{36}$/);
      expect(result.value.createdAt).toBe(NOW);

      const items = ddbMock.commandCalls(TransactWriteCommand)[0].args[0].input.TransactItems ?? [];
      expect(items).toHaveLength(2);
      expect(items[0].Put?.Item).toEqual({
        PK: 'EMAIL#Ada@Example.com',
        SK: 'USER',
        entityType: 'EMAIL_LOCK',
        userId: result.value.id,
        createdAt: NOW,
      });
      expect(items[0].Put?.ConditionExpression).toBe('attribute_not_exists(PK)');
      expect(items[1].Put?.Item).toEqual(storage.toUserItem(result.value));
    });

    it('should report conflict when the email lock already exists', async () => {
      ddbMock.on(TransactWriteCommand).rejects(cancelled('ConditionalCheckFailed', 'None'));

      const result = await directory.create({ email: 'ada@example.com', firstName: 'Ada', passwordHash: 'test-hash' });

      expect(result).toEqual({ ok: false, error: { kind: 'conflict', message: 'email already registered' } });
    });
  });

  describe('update', () => {
    it('should move the email lock when the email changes', async () => {
      ddbMock.on(GetCommand).resolves({ Item: userItem(record()) });
      ddbMock.on(TransactWriteCommand).resolves({});

      const result = await directory.update('user-1', { email: 'augusta@example.com' });

      expect(result.ok && result.value.email).toBe('augusta@example.com');
      const items = ddbMock.commandCalls(TransactWriteCommand)[0].args[0].input.TransactItems ?? [];
      expect(items).toHaveLength(3);
      expect(items[0].Put?.Item?.PK).toBe('EMAIL#augusta@example.com');
      expect(items[1].Put?.ConditionExpression).toBe('attribute_exists(PK) AND isDeleted = :false');
      expect(items[2].Delete?.Key).toEqual({ PK: 'EMAIL#Ada@Example.com', SK: 'USER' });
    });

    it('should treat a change of case as a new email and move the lock', async () => {
      ddbMock.on(GetCommand).resolves({ Item: userItem(record()) });
      ddbMock.on(TransactWriteCommand).resolves({});

      const result = await directory.update('user-1', { email: 'ada@example.com' });

      expect(result.ok && result.value.email).toBe('ada@example.com');
      const items = ddbMock.commandCalls(TransactWriteCommand)[0].args[0].input.TransactItems ?? [];
      expect(items).toHaveLength(3);
      expect(items[0].Put?.Item?.PK).toBe('EMAIL#ada@example.com');
      expect(items[2].Delete?.Key).toEqual({ PK: 'EMAIL#Ada@Example.com', SK: 'USER' });
    });

    it('should write only the profile when the email is unchanged', async () => {
      ddbMock.on(GetCommand).resolves({ Item: userItem(record()) });
      ddbMock.on(TransactWriteCommand).resolves({});

      const result = await directory.update('user-1', { firstName: 'Augusta', email: 'Ada@Example.com' });

      expect(result.ok && result.value.firstName).toBe('Augusta');
      const items = ddbMock.commandCalls(TransactWriteCommand)[0].args[0].input.TransactItems ?? [];
      expect(items).toHaveLength(1);
    });

    it('should report conflict when the new email is taken', async () => {
      ddbMock.on(GetCommand).resolves({ Item: userItem(record()) });
      ddbMock.on(TransactWriteCommand).rejects(cancelled('ConditionalCheckFailed', 'None', 'None'));

      const result = await directory.update('user-1', { email: 'alan@example.com' });

      expect(!result.ok && result.error.kind).toBe('conflict');
    });

    it('should report not_found and deleted without writing', async () => {
      ddbMock.on(GetCommand, { Key: { PK: 'USER#missing', SK: 'PROFILE' } }).resolves({});
      ddbMock
        .on(GetCommand, { Key: { PK: 'USER#gone', SK: 'PROFILE' } })
        .resolves({ Item: userItem(record({ id: 'gone', isDeleted: true, deletedAt: NOW })) });

      const missing = await directory.update('missing', { firstName: 'X' });
      const gone = await directory.update('gone', { firstName: 'X' });

      expect(!missing.ok && missing.error.kind).toBe('not_found');
      expect(!gone.ok && gone.error.kind).toBe('deleted');
      expect(ddbMock.commandCalls(TransactWriteCommand)).toHaveLength(0);
    });
  });

  describe('softDelete', () => {
    it('should flag the profile and release the email lock', async () => {
      ddbMock.on(GetCommand).resolves({ Item: userItem(record()) });
      ddbMock.on(TransactWriteCommand).resolves({});

      const result = await directory.softDelete('user-1');

      expect(result).toEqual({ ok: true, value: undefined });
      const items = ddbMock.commandCalls(TransactWriteCommand)[0].args[0].input.TransactItems ?? [];
      expect(items[0].Update?.Key).toEqual({ PK: 'USER#user-1', SK: 'PROFILE' });
      expect(items[0].Update?.ExpressionAttributeValues?.[':deletedSk']).toBe(`DELETED#${NOW}`);
      expect(items[1].Delete?.Key).toEqual({ PK: 'EMAIL#Ada@Example.com', SK: 'USER' });
    });

    it('should report deleted when the record was deleted concurrently', async () => {
      ddbMock.on(GetCommand).resolves({ Item: userItem(record()) });
      ddbMock.on(TransactWriteCommand).rejects(cancelled('ConditionalCheckFailed', 'None'));

      const result = await directory.softDelete('user-1');

      expect(!result.ok && result.error.kind).toBe('deleted');
    });
  });

  describe('list', () => {
    it('should follow pagination and sort by creation time', async () => {
      const first = record({ id: 'user-1', createdAt: '2024-01-01T00:00:00.000Z' });
      const second = record({ id: 'user-2', email: 'alan@example.com', createdAt: '2024-02-01T00:00:00.000Z' });
      ddbMock
        .on(ScanCommand)
        .resolvesOnce({ Items: [userItem(second)], LastEvaluatedKey: { PK: 'USER#user-2', SK: 'PROFILE' } })
        .resolvesOnce({ Items: [userItem(first)] });

      const result = await directory.list();

      expect(result.ok && result.value.map(user => user.id)).toEqual(['user-1', 'user-2']);
      expect(ddbMock.commandCalls(ScanCommand)).toHaveLength(2);
      expect(ddbMock.commandCalls(ScanCommand)[1].args[0].input.ExclusiveStartKey).toEqual({
        PK: 'USER#user-2',
        SK: 'PROFILE',
      });
    });

    it('should apply the filter to scanned items', async () => {
      ddbMock.on(ScanCommand).resolves({
        Items: [
          userItem(record({ id: 'user-1' })),
          userItem(record({ id: 'user-2', email: 'alan@example.com', firstName: 'Alan' })),
        ],
      });

      const result = await directory.list({ firstName: 'al' });

      expect(result.ok && result.value.map(user => user.id)).toEqual(['user-2']);
    });
  });

  describe('retries', () => {
    it('should retry a throttled call and log the retry', async () => {
      const throttled = Object.assign(new Error('Rate of requests exceeds the allowed throughput'), {
        name: 'ThrottlingException',
      });
      ddbMock.on(GetCommand).rejectsOnce(throttled).resolves({ Item: userItem(record()) });

      const result = await directory.findById('user-1');

      expect(result).toEqual({ ok: true, value: record() });
      expect(ddbMock.commandCalls(GetCommand)).toHaveLength(2);
      const [retry] = logs.records().filter(line => line.message === 'Retrying DynamoDB call');
      expect(retry.data).toMatchObject({ operation: 'findById', attempt: 1, error: 'ThrottlingException' });
    });

    it('should not retry a failure that is not transient', async () => {
      ddbMock.on(GetCommand).rejects(new Error('AccessDeniedException'));

      const result = await directory.findById('user-1');

      expect(result).toEqual({
        ok: false,
        error: { kind: 'unavailable', message: 'findById failed: Error: AccessDeniedException' },
      });
      expect(ddbMock.commandCalls(GetCommand)).toHaveLength(1);
    });
  });
});
