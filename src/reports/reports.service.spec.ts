import { DataSource } from 'typeorm';
import { ReportsService, csvEsc } from './reports.service';
import { Booking } from '../bookings/booking.entity';
import { Building } from '../buildings/building.entity';
import { Course } from '../courses/course.entity';
import { EnrolledStudent } from '../enrolled-students/enrolled-student.entity';
import { Machine } from '../machines/machine.entity';
import { User } from '../users/user.entity';
import { createTestDataSource, testConfig } from '../testing/test-data-source';
import { saveBuilding, saveMachine, saveUser } from '../testing/fixtures';

describe('ReportsService', () => {
  let ds: DataSource;
  let service: ReportsService;
  let washer: Machine;

  beforeEach(async () => {
    ds = await createTestDataSource();
    service = new ReportsService(
      ds.getRepository(Booking),
      ds.getRepository(Building),
      ds.getRepository(Course),
      ds.getRepository(Machine),
      ds.getRepository(User),
      ds.getRepository(EnrolledStudent),
      testConfig(),
    );

    const building = await saveBuilding(ds, 'North Block, East');
    washer = await saveMachine(ds, building, { name: 'Washer A', code: 'WA' });
    const uma = await saveUser(ds, building, {
      username: 'uma',
      firstName: 'Uma',
      lastName: 'Rao',
      email: 'uma@example.test',
      roomNo: 'B-12',
      contactNo: '9000000001',
    });
    const kiran = await saveUser(ds, building, { username: 'kiran', firstName: 'Kiran', email: 'kiran@example.test' });
    const bookings = ds.getRepository(Booking);
    await bookings.save([
      { machine: washer, user: uma, date: '2025-06-10', slotNumber: 2 },
      { machine: washer, user: kiran, date: '2025-06-03', slotNumber: 1 },
      { machine: washer, user: uma, date: '2025-07-01', slotNumber: 1 },
    ]);
  });

  afterEach(() => ds.destroy());

  it('writes one CSV line per booking of the month, in date order', async () => {
    const rows = await service.monthBookings(2025, 6);

    expect(service.toCsv(rows).split('\n')).toEqual([
      'Date,Slot,Time,Machine,Code,Building,Username,Name,Email,Room,Contact',
      '2025-06-03,1,07:00-08:30,Washer A,WA,"North Block, East",kiran,Kiran,kiran@example.test,,',
      '2025-06-10,2,08:30-10:00,Washer A,WA,"North Block, East",uma,Uma Rao,uma@example.test,B-12,9000000001',
    ]);
  });

  it('filters by machine', async () => {
    const other = await saveMachine(ds, await saveBuilding(ds));

    expect(await service.monthBookings(2025, 6, other.id)).toEqual([]);
    expect(await service.monthBookings(2025, 6, washer.id)).toHaveLength(2);
  });

  it('builds a sheet per machine and a summary', async () => {
    const workbook = service.buildWorkbook(await service.monthBookings(2025, 6), 2025, 6);

    expect(workbook.worksheets.map((ws) => ws.name)).toEqual(['WA', 'Summary']);
    const sheet = workbook.getWorksheet('WA');
    expect(sheet?.getCell('A2').value).toBe('2025-06-03');
    expect(sheet?.getCell('D3').value).toBe('uma');
    const summary = workbook.getWorksheet('Summary');
    expect(summary?.getCell('A2').value).toBe('Washer A (WA)');
    expect(summary?.getCell('C2').value).toBe(2);
    expect(summary?.getCell('D2').value).toBe(2);
    expect(summary?.getCell('C4').value).toBe(2);
  });

  it('serialises the workbook as xlsx', async () => {
    const buffer = await service.toWorkbook(await service.monthBookings(2025, 6), 2025, 6);

    expect(buffer.subarray(0, 2).toString('latin1')).toBe('PK');
  });

  it('exports everything except password hashes', async () => {
    const data = await service.exportAll();

    expect(data.bookings).toHaveLength(3);
    expect(data.users.map((u) => u.username)).toEqual(['kiran', 'uma']);
    expect(JSON.stringify(data)).not.toContain('not-a-real-hash');
  });

  it('quotes CSV fields that need it', () => {
    expect(csvEsc('plain')).toBe('plain');
    expect(csvEsc('say "hi"')).toBe('"say ""hi"""');
  });
});
