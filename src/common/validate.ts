import { BadRequestException } from '@nestjs/common';
import { ClassConstructor, plainToInstance } from 'class-transformer';
import { validateOrReject } from 'class-validator';

/** class-transformer + class-validator on a raw body or query; any failure is a 400 with `code`. */
export async function validateInput<T extends object>(
  cls: ClassConstructor<T>,
  raw: unknown,
  code = 'invalid_body',
): Promise<T> {
  const dto = plainToInstance(cls, raw ?? {});
  try {
    await validateOrReject(dto, { forbidUnknownValues: true });
  } catch {
    throw new BadRequestException(code);
  }
  return dto;
}
