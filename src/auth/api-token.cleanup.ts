import { Injectable, Logger } from '@nestjs/common';
import { Cron, CronExpression } from '@nestjs/schedule';
import { InjectRepository } from '@nestjs/typeorm';
import { LessThan, Repository } from 'typeorm';
import { DateTime } from 'luxon';
import { ApiToken } from './api-token.entity';

const KEEP_EXPIRED_DAYS = 30;

@Injectable()
export class ApiTokenCleanup {
  private readonly log = new Logger(ApiTokenCleanup.name);
  constructor(@InjectRepository(ApiToken) private tokens: Repository<ApiToken>) {}

  // expired tokens stay listed for a month so admins can see what lapsed
  @Cron(CronExpression.EVERY_DAY_AT_3AM)
  async sweep() {
    const cutoff = DateTime.now().minus({ days: KEEP_EXPIRED_DAYS }).toJSDate();
    const res = await this.tokens.delete({ expiresAt: LessThan(cutoff) });
    const removed = res.affected ?? 0;
    if (removed > 0) {
      this.log.log(`API token cleanup removed ${removed} expired tokens`);
    }
  }
}
