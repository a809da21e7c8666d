import { DataSource } from 'typeorm';
import { JwtStrategy } from './jwt.strategy';
import { UsersService } from '../users/users.service';
import { User } from '../users/user.entity';
import { Building } from '../buildings/building.entity';
import { Course } from '../courses/course.entity';
import { createTestDataSource, testConfig } from '../testing/test-data-source';
import { saveBuilding, saveUser } from '../testing/fixtures';

describe('JwtStrategy', () => {
  let ds: DataSource;
  let strategy: JwtStrategy;
  let warden: User;

  beforeEach(async () => {
    ds = await createTestDataSource();
    const cfg = testConfig();
    const users = new UsersService(ds.getRepository(User), ds.getRepository(Building), ds.getRepository(Course), cfg);
    strategy = new JwtStrategy(cfg, users);
    warden = await saveUser(ds, await saveBuilding(ds), { username: 'warden', role: 'admin' });
  });

  afterEach(() => ds.destroy());

  it('takes the role from the stored account, not the token', async () => {
    await ds.getRepository(User).update({ id: warden.id }, { role: 'user' });

    await expect(strategy.validate({ sub: warden.id, username: 'warden', role: 'admin' })).resolves.toEqual({
      userId: warden.id,
      username: 'warden',
      role: 'user',
      via: 'jwt',
    });
  });

  it('refuses a token whose account was deactivated', async () => {
    await ds.getRepository(User).update({ id: warden.id }, { isActive: false });

    await expect(strategy.validate({ sub: warden.id, username: 'warden', role: 'admin' })).rejects.toThrow(
      'user_inactive',
    );
  });

  it('refuses a token whose account is gone', async () => {
    await ds.getRepository(User).delete({ id: warden.id });

    await expect(strategy.validate({ sub: warden.id, username: 'warden', role: 'admin' })).rejects.toThrow(
      'user_inactive',
    );
  });
});
