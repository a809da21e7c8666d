import { ConfigService } from '@nestjs/config';

export const DEFAULT_PORT = 3000;

export function serverPort(cfg: ConfigService) {
  const port = Number(cfg.get<string>('PORT'));
  return Number.isInteger(port) && port > 0 ? port : DEFAULT_PORT;
}
