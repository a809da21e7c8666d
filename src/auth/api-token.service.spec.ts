import { DataSource } from 'typeorm';
import { ApiTokenService, TOKEN_PREFIX } from './api-token.service';
import { ApiToken } from './api-token.entity';
import { User } from '../users/user.entity';
import { createTestDataSource, freezeTime, testConfig, unfreezeTime } from '../testing/test-data-source';
import { saveBuilding, saveUser } from '../testing/fixtures';

describe('ApiTokenService', () => {
  let ds: DataSource;
  let service: ApiTokenService;
  let owner: User;

  beforeEach(async () => {
    freezeTime('2025-06-01T10:00:00');
    ds = await createTestDataSource();
    service = new ApiTokenService(ds.getRepository(ApiToken), testConfig({ API_TOKEN_TTL_DAYS: '10' }));
    owner = await saveUser(ds, await saveBuilding(ds), { role: 'admin' });
  });

  afterEach(async () => {
    await ds.destroy();
    unfreezeTime();
  });

  it('returns the secret once and stores only its hash', async () => {
    const issued = await service.issue(owner, { label: ' sync job ' });

    expect(issued.token.startsWith(TOKEN_PREFIX)).toBe(true);
    expect(issued.label).toBe('sync job');
    expect(issued.expiresAt.toISOString()).toBe('2025-06-11T04:30:00.000Z');

    const stored = await ds.getRepository(ApiToken).findOneByOrFail({ id: issued.id });
    expect(stored.tokenHash).toBe(ApiTokenService.hashToken(issued.token));
    expect(stored.tokenHash).not.toContain(issued.token);
  });

  it('verifies a live token and stamps its last use', async () => {
    const issued = await service.issue(owner);

    const user = await service.verify(issued.token);

    expect(user?.id).toBe(owner.id);
    const stored = await ds.getRepository(ApiToken).findOneByOrFail({ id: issued.id });
    expect(stored.lastUsedAt?.toISOString()).toBe('2025-06-01T04:30:00.000Z');
  });

  it('rejects unknown, expired and inactive-owner tokens', async () => {
    const issued = await service.issue(owner, { ttlDays: 1 });

    expect(await service.verify(`${TOKEN_PREFIX}not-a-token`)).toBeNull();
    expect(await service.verify('missing-prefix')).toBeNull();

    freezeTime('2025-06-02T10:00:01');
    expect(await service.verify(issued.token)).toBeNull();

    freezeTime('2025-06-01T10:00:00');
    await ds.getRepository(User).update({ id: owner.id }, { isActive: false });
    expect(await service.verify(issued.token)).toBeNull();
  });

  it('limits the lifetime to a year', async () => {
    await expect(service.issue(owner, { ttlDays: 366 })).rejects.toThrow('invalid_ttl');
  });

  it('revokes tokens', async () => {
    const issued = await service.issue(owner);

    await service.revoke(issued.id);

    expect(await service.verify(issued.token)).toBeNull();
    await expect(service.revoke(issued.id)).rejects.toThrow('api_token_not_found');
  });
});
