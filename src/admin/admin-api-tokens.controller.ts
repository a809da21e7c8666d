import {
  Body,
  Controller,
  Delete,
  Get,
  Param,
  ParseUUIDPipe,
  Post,
  Query,
  UseGuards,
} from '@nestjs/common';
import { AuthGuard } from '@nestjs/passport';
import { ApiTokenService } from '../auth/api-token.service';
import { UsersService } from '../users/users.service';
import { EventLogService } from '../event-log/event-log.service';
import { CurrentUser } from '../auth/current-user.decorator';
import { AuthUser } from '../auth/auth-user';
import { Requires } from '../auth/roles.decorator';
import { RolesGuard } from '../auth/roles.guard';
import { validateInput } from '../common/validate';
import { IssueApiTokenDto } from './dto/admin.dto';

@UseGuards(AuthGuard('jwt'), RolesGuard)
@Requires('administer')
@Controller('admin/api-tokens')
export class AdminApiTokensController {
  constructor(
    private readonly tokens: ApiTokenService,
    private readonly users: UsersService,
    private readonly events: EventLogService,
  ) {}

  @Post()
  async issue(@CurrentUser() auth: AuthUser, @Body() body: IssueApiTokenDto) {
    const dto = await validateInput(IssueApiTokenDto, body);
    const owner = await this.users.requireById(dto.userId);
    const issued = await this.tokens.issue(owner, { ttlDays: dto.ttlDays, label: dto.label });
    await this.events.record({
      actorId: auth.userId,
      action: 'admin.api_token.issue',
      subjectId: issued.id,
      details: { ownerId: owner.id, label: issued.label },
    });
    return { ...issued, expiresAt: issued.expiresAt.toISOString() };
  }

  @Get()
  async list(@Query('userId') userId?: string) {
    const list = await this.tokens.list(userId?.trim() || undefined);
    return list.map((t) => ({
      id: t.id,
      label: t.label ?? null,
      owner: { id: t.user.id, username: t.user.username },
      expiresAt: t.expiresAt.toISOString(),
      lastUsedAt: t.lastUsedAt ? t.lastUsedAt.toISOString() : null,
      createdAt: t.createdAt.toISOString(),
    }));
  }

  @Delete(':id')
  async revoke(@CurrentUser() auth: AuthUser, @Param('id', ParseUUIDPipe) id: string) {
    await this.tokens.revoke(id);
    await this.events.record({
      actorId: auth.userId,
      action: 'admin.api_token.revoke',
      subjectId: id,
    });
    return { ok: true };
  }
}
