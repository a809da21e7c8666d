import { DataSource } from 'typeorm';
import { Building } from '../buildings/building.entity';
import { Course } from '../courses/course.entity';
import { Machine, MachineStatus, TimeRange } from '../machines/machine.entity';
import { User } from '../users/user.entity';

export const THREE_SLOTS: TimeRange[] = [
  { start: '07:00', end: '08:30' },
  { start: '08:30', end: '10:00' },
  { start: '10:00', end: '11:30' },
];

let counter = 0;
const next = () => ++counter;

export function saveBuilding(ds: DataSource, name = `Block ${next()}`) {
  const repo = ds.getRepository(Building);
  return repo.save(repo.create({ name, code: null }));
}

export function saveCourse(ds: DataSource, overrides: Partial<Course> = {}) {
  const repo = ds.getRepository(Course);
  const n = next();
  return repo.save(
    repo.create({
      code: `C${n}`,
      name: `Course ${n}`,
      shortName: null,
      level: 'PG',
      department: 'Statistics',
      isActive: true,
      ...overrides,
    }),
  );
}

export async function saveUser(ds: DataSource, building: Building, overrides: Partial<User> = {}) {
  const repo = ds.getRepository(User);
  const n = next();
  const saved = await repo.save(
    repo.create({
      username: `user${n}`,
      firstName: `First${n}`,
      email: `user${n}@example.test`,
      passwordHash: 'not-a-real-hash',
      role: 'user',
      building,
      isActive: true,
      reminderEnabled: false,
      reminderLeadHours: 2,
      ...overrides,
    }),
  );
  return repo.findOneOrFail({ where: { id: saved.id }, relations: { building: true, course: true } });
}

export function saveMachine(
  ds: DataSource,
  building: Building,
  overrides: { name?: string; code?: string; status?: MachineStatus; slotTemplate?: TimeRange[] } = {},
) {
  const repo = ds.getRepository(Machine);
  const n = next();
  const template = overrides.slotTemplate ?? THREE_SLOTS;
  return repo.save(
    repo.create({
      name: overrides.name ?? `Machine ${n}`,
      code: overrides.code ?? `M${n}`,
      building,
      status: overrides.status ?? 'available',
      slotCount: template.length,
      slotTemplate: template,
    }),
  );
}
