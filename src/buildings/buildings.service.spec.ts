import { DataSource } from 'typeorm';
import { BuildingsService } from './buildings.service';
import { Building } from './building.entity';
import { User } from '../users/user.entity';
import { Machine } from '../machines/machine.entity';
import { createTestDataSource } from '../testing/test-data-source';
import { saveMachine } from '../testing/fixtures';

describe('BuildingsService', () => {
  let ds: DataSource;
  let service: BuildingsService;

  beforeEach(async () => {
    ds = await createTestDataSource();
    service = new BuildingsService(ds.getRepository(Building), ds.getRepository(User), ds.getRepository(Machine));
  });

  afterEach(() => ds.destroy());

  it('stores trimmed names and upper-cased codes', async () => {
    const building = await service.create('  North Block ', 'nb');

    expect([building.name, building.code]).toEqual(['North Block', 'NB']);
  });

  it('keeps names and codes unique', async () => {
    const north = await service.create('North Block', 'NB');
    const south = await service.create('South Block', 'SB');

    await expect(service.create('North Block')).rejects.toThrow('building_name_taken');
    await expect(service.update(south.id, { code: 'nb' })).rejects.toThrow('building_code_taken');
    expect((await service.update(north.id, { name: 'North Block', code: 'NB' })).name).toBe('North Block');
  });

  it('refuses to delete a building that still has machines', async () => {
    const building = await service.create('North Block');
    await saveMachine(ds, building);

    await expect(service.remove(building.id)).rejects.toThrow('building_in_use');
  });

  it('deletes an empty building', async () => {
    const building = await service.create('Annexe');

    await service.remove(building.id);

    expect(await service.list()).toEqual([]);
  });
});
