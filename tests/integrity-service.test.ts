import { createHash } from 'crypto';
import { IntegrityService, INTEGRITY_MESSAGES } from '../src/application/integrity-service';
import { LookupService } from '../src/application/lookup-service';
import { MemoryRecordStore } from '../src/store/memory-record-store';
import { ContentHash } from '../src/domain-types';
import { HELLO_SHA256, makeRecord } from './test-utils';

const HELLO_BANG_SHA256 = createHash('sha256').update('hello!').digest('hex');

describe('IntegrityService', () => {
  let store: MemoryRecordStore;
  let integrity: IntegrityService;

  beforeEach(async () => {
    jest.spyOn(console, 'log').mockImplementation(() => {});
    store = new MemoryRecordStore();
    integrity = new IntegrityService(new LookupService(store));
    await store.put(makeRecord({ contentHash: HELLO_SHA256 as ContentHash }), false);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  test('unchanged bytes verify as authentic', async () => {
    const outcome = await integrity.verifyIntegrity('CM-A1B2C3D4E5F6', Buffer.from('hello'));

    expect(outcome).toEqual({
      status: 'VERIFIED',
      result: {
        valid: true,
        hashCode: 'CM-A1B2C3D4E5F6',
        calculatedHash: HELLO_SHA256,
        storedHash: HELLO_SHA256,
        message: INTEGRITY_MESSAGES.AUTHENTIC,
      },
    });
  });

  test('modified bytes report both digests', async () => {
    const outcome = await integrity.verifyIntegrity('CM-A1B2C3D4E5F6', Buffer.from('hello!'));

    expect(outcome).toEqual({
      status: 'VERIFIED',
      result: {
        valid: false,
        hashCode: 'CM-A1B2C3D4E5F6',
        calculatedHash: HELLO_BANG_SHA256,
        storedHash: HELLO_SHA256,
        message: 'Document has been modified or is not authentic',
      },
    });
  });

  test('accepts a short code', async () => {
    const outcome = await integrity.verifyIntegrity('abcdef', Buffer.from('hello'));

    expect(outcome.status).toBe('VERIFIED');
    if (outcome.status !== 'VERIFIED') return;
    expect(outcome.result.valid).toBe(true);
  });

  test('compares against an uppercase stored digest', async () => {
    const upper = new MemoryRecordStore();
    await upper.put(makeRecord({ contentHash: HELLO_SHA256.toUpperCase() as ContentHash }), false);

    const outcome = await new IntegrityService(new LookupService(upper))
      .verifyIntegrity('CM-A1B2C3D4E5F6', Buffer.from('hello'));

    expect(outcome.status).toBe('VERIFIED');
    if (outcome.status !== 'VERIFIED') return;
    expect(outcome.result.valid).toBe(true);
  });

  test('a record without a stored digest is never valid', async () => {
    const bare = new MemoryRecordStore();
    await bare.put(makeRecord(), false);

    const outcome = await new IntegrityService(new LookupService(bare))
      .verifyIntegrity('CM-A1B2C3D4E5F6', Buffer.from('hello'));

    expect(outcome).toEqual({
      status: 'VERIFIED',
      result: {
        valid: false,
        hashCode: 'CM-A1B2C3D4E5F6',
        calculatedHash: HELLO_SHA256,
        storedHash: '',
        message: INTEGRITY_MESSAGES.NO_STORED_HASH,
      },
    });
  });

  test('an unknown code is NOT_FOUND', async () => {
    const outcome = await integrity.verifyIntegrity('IA-ZZZZZZZZZZZZ', Buffer.from('hello'));
    expect(outcome.status).toBe('NOT_FOUND');
  });

  test('a malformed code is INVALID_FORMAT', async () => {
    const outcome = await integrity.verifyIntegrity('not-a-code', Buffer.from('hello'));
    expect(outcome.status).toBe('INVALID_FORMAT');
  });
});
