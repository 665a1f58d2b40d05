import { describe, it, expect, vi } from 'vitest';
import { Types } from 'mongoose';
import type { RegistrationModel, RegistrationRecord } from '../db/models/registration.model.js';
import { queryReturning } from '../../test/helpers/fakes.js';
import { MongoRegistrationRepository } from './registration.repository.js';

const CLAIM_FILTER = {
  code: '4821',
  status: 'pending',
  $expr: { $gt: ['$expiresAt', '$$NOW'] },
};

function completedRecord(overrides: Partial<RegistrationRecord> = {}): RegistrationRecord {
  return {
    _id: new Types.ObjectId('65f0000000000000000000a1'),
    code: '4821',
    status: 'completed',
    expiresAt: new Date('2026-03-01T11:00:00.000Z'),
    shopId: 'shop-42',
    shopName: 'Noodle House',
    lineUserId: 'U-test-1',
    completedAt: new Date('2026-03-01T10:00:00.000Z'),
    ...overrides,
  };
}

describe('MongoRegistrationRepository.claim', () => {
  it('claims with a single conditional update evaluated on the server clock', async () => {
    const query = queryReturning<RegistrationRecord | null>(completedRecord());
    const model = { findOneAndUpdate: vi.fn(() => query) };
    const repository = new MongoRegistrationRepository(model as unknown as RegistrationModel);

    await repository.claim({
      code: '4821',
      lineUserId: 'U-test-1',
      displayName: 'Somchai',
      pictureUrl: 'https://example.com/somchai.png',
    });

    expect(model.findOneAndUpdate).toHaveBeenCalledTimes(1);
    expect(model.findOneAndUpdate).toHaveBeenCalledWith(
      CLAIM_FILTER,
      [
        {
          $set: {
            status: 'completed',
            lineUserId: { $literal: 'U-test-1' },
            completedAt: '$$NOW',
            lineDisplayName: { $literal: 'Somchai' },
            linePictureUrl: { $literal: 'https://example.com/somchai.png' },
          },
        },
      ],
      { new: true }
    );
  });

  it('omits profile fields that were not supplied', async () => {
    const query = queryReturning<RegistrationRecord | null>(completedRecord());
    const model = { findOneAndUpdate: vi.fn(() => query) };
    const repository = new MongoRegistrationRepository(model as unknown as RegistrationModel);

    await repository.claim({ code: '4821', lineUserId: 'U-test-1' });

    expect(model.findOneAndUpdate).toHaveBeenCalledWith(
      CLAIM_FILTER,
      [{ $set: { status: 'completed', lineUserId: { $literal: 'U-test-1' }, completedAt: '$$NOW' } }],
      { new: true }
    );
  });

  it('maps the updated document to a Registration', async () => {
    const model = { findOneAndUpdate: vi.fn(() => queryReturning<RegistrationRecord | null>(completedRecord())) };
    const repository = new MongoRegistrationRepository(model as unknown as RegistrationModel);

    const registration = await repository.claim({ code: '4821', lineUserId: 'U-test-1' });

    expect(registration?.id).toBe('65f0000000000000000000a1');
    expect(registration?.status).toBe('completed');
    expect(registration?.lineUserId).toBe('U-test-1');
    expect(registration?.contextName()).toBe('Noodle House');
  });

  it('falls back to the shop id when the shop has no name', async () => {
    const model = {
      findOneAndUpdate: vi.fn(() => queryReturning<RegistrationRecord | null>(completedRecord({ shopName: null }))),
    };
    const repository = new MongoRegistrationRepository(model as unknown as RegistrationModel);

    const registration = await repository.claim({ code: '4821', lineUserId: 'U-test-1' });

    expect(registration?.contextName()).toBe('shop-42');
  });

  it('returns null when nothing matched', async () => {
    const model = { findOneAndUpdate: vi.fn(() => queryReturning<RegistrationRecord | null>(null)) };
    const repository = new MongoRegistrationRepository(model as unknown as RegistrationModel);

    await expect(repository.claim({ code: '0000', lineUserId: 'U-test-1' })).resolves.toBeNull();
  });
});
