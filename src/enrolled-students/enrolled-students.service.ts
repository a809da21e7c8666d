import { BadRequestException, Injectable, Logger, NotFoundException } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { ConfigService } from '@nestjs/config';
import { In, Repository } from 'typeorm';
import { EnrolledStudent } from './enrolled-student.entity';
import { parseStudentList } from './student-list.parser';

const DEFAULT_ROLL_PREFIXES = 'rs_,bmat,mmat,mlis,mqms';
const DEFAULT_EMAIL_DOMAIN = 'isibang.ac.in';

@Injectable()
export class EnrolledStudentsService {
  private readonly log = new Logger(EnrolledStudentsService.name);
  private readonly rollPrefixes: string[];
  private readonly emailDomain: string;

  constructor(
    @InjectRepository(EnrolledStudent) private readonly students: Repository<EnrolledStudent>,
    private readonly cfg: ConfigService,
  ) {
    const prefixes = this.cfg.get<string>('ENROLLED_ROLL_PREFIXES') ?? DEFAULT_ROLL_PREFIXES;
    this.rollPrefixes = prefixes.split(',').map((p) => p.trim()).filter(Boolean);
    this.emailDomain = this.cfg.get<string>('ENROLLED_EMAIL_DOMAIN')?.trim() || DEFAULT_EMAIL_DOMAIN;
  }

  list() {
    return this.students.find({ order: { fullName: 'ASC' } });
  }

  async isEnrolled(email: string) {
    const count = await this.students.count({ where: { email: email.trim().toLowerCase() } });
    return count > 0;
  }

  async add(fullName: string, email: string) {
    const normalized = email.trim().toLowerCase();
    if (await this.isEnrolled(normalized)) throw new BadRequestException('already_enrolled');
    return this.students.save(this.students.create({ fullName: fullName.trim(), email: normalized }));
  }

  /** Adds every parsed student whose email is not enrolled yet. */
  async importList(raw: string) {
    const parsed = parseStudentList(raw, {
      rollPrefixes: this.rollPrefixes,
      emailDomain: this.emailDomain,
    });
    if (parsed.length === 0) return { parsed: 0, added: 0, skipped: 0 };

    const existing = await this.students.find({
      where: { email: In(parsed.map((s) => s.email)) },
    });
    const known = new Set(existing.map((s) => s.email));
    const fresh = parsed.filter((s) => {
      if (known.has(s.email)) return false;
      known.add(s.email);
      return true;
    });

    if (fresh.length > 0) {
      await this.students.save(fresh.map((s) => this.students.create(s)));
    }
    this.log.log(`Enrolled list import: ${fresh.length} added, ${parsed.length - fresh.length} skipped`);
    return { parsed: parsed.length, added: fresh.length, skipped: parsed.length - fresh.length };
  }

  async remove(id: string) {
    const result = await this.students.delete({ id });
    if (!result.affected) throw new NotFoundException('enrolled_student_not_found');
  }
}
