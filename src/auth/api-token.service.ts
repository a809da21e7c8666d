import { BadRequestException, Injectable, NotFoundException } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { ConfigService } from '@nestjs/config';
import { Repository } from 'typeorm';
import { createHash, randomBytes } from 'crypto';
import { DateTime } from 'luxon';
import { ApiToken } from './api-token.entity';
import { User } from '../users/user.entity';

export const TOKEN_PREFIX = 'slt_';
export const MAX_TOKEN_TTL_DAYS = 365;

type IssueOptions = {
  ttlDays?: number;
  label?: string | null;
};

@Injectable()
export class ApiTokenService {
  private readonly defaultTtlDays: number;

  constructor(
    @InjectRepository(ApiToken) private readonly tokens: Repository<ApiToken>,
    private readonly cfg: ConfigService,
  ) {
    const ttl = Number(this.cfg.get('API_TOKEN_TTL_DAYS') ?? 30);
    this.defaultTtlDays = Number.isInteger(ttl) && ttl > 0 && ttl <= MAX_TOKEN_TTL_DAYS ? ttl : 30;
  }

  static hashToken(raw: string) {
    return createHash('sha256').update(raw).digest('hex');
  }

  private static generateTokenString() {
    return TOKEN_PREFIX + randomBytes(32).toString('base64url');
  }

  /** The returned `token` is the only time the secret is available. */
  async issue(owner: User, options: IssueOptions = {}) {
    const ttlDays = options.ttlDays ?? this.defaultTtlDays;
    if (!Number.isInteger(ttlDays) || ttlDays < 1 || ttlDays > MAX_TOKEN_TTL_DAYS) {
      throw new BadRequestException('invalid_ttl');
    }

    const token = ApiTokenService.generateTokenString();
    const record = this.tokens.create({
      user: owner,
      tokenHash: ApiTokenService.hashToken(token),
      label: options.label?.trim() || null,
      expiresAt: DateTime.now().plus({ days: ttlDays }).toJSDate(),
      lastUsedAt: null,
    });
    const saved = await this.tokens.save(record);
    return { id: saved.id, token, label: saved.label ?? null, expiresAt: saved.expiresAt };
  }

  list(userId?: string) {
    return this.tokens.find({
      where: userId ? { user: { id: userId } } : {},
      order: { createdAt: 'DESC' },
      relations: { user: true },
    });
  }

  async revoke(id: string) {
    const result = await this.tokens.delete({ id });
    if (!result.affected) throw new NotFoundException('api_token_not_found');
  }

  /** Owner of a valid, unexpired token whose account is active; null otherwise. */
  async verify(raw: string) {
    if (!raw.startsWith(TOKEN_PREFIX)) return null;
    const record = await this.tokens.findOne({
      where: { tokenHash: ApiTokenService.hashToken(raw) },
      relations: { user: true },
    });
    if (!record || !record.user.isActive) return null;

    const now = DateTime.now();
    if (record.expiresAt.getTime() <= now.toMillis()) return null;

    await this.tokens.update({ id: record.id }, { lastUsedAt: now.toJSDate() });
    return record.user;
  }
}
