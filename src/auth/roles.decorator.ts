import { SetMetadata } from '@nestjs/common';
import { CAPABILITIES_KEY } from './roles.constant';
import type { Capability } from './roles';

export const Requires = (...capabilities: Capability[]) => SetMetadata(CAPABILITIES_KEY, capabilities);
