import { z } from 'zod';
import type { Logger } from '@srcmap/core';

const isLogger = (value: unknown): value is Logger =>
  typeof value === 'object' &&
  value !== null &&
  'child' in value &&
  typeof value.child === 'function' &&
  'isLevelEnabled' in value &&
  typeof value.isLevelEnabled === 'function';

export const LoggerSchema = z.custom<Logger>(isLogger, { message: 'Expected a pino logger' });

export const ParseOptionsSchema = z
  .object({
    logger: LoggerSchema.optional(),
    validateIndices: z.boolean().default(true),
  })
  .default({});
