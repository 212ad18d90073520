import { z } from 'zod';

const MAX_NETUID = 65_535;

export const SS58_ADDRESS_PATTERN = /^[1-9A-HJ-NP-Za-km-z]{46,48}$/;

export const nonNegativeIntegerQuerySchema = z
  .string()
  .trim()
  .regex(/^\d+$/, 'must be a non-negative integer')
  .transform((value: string): number => Number.parseInt(value, 10));

export const positiveIntegerQuerySchema = z
  .string()
  .trim()
  .regex(/^0*[1-9]\d*$/, 'must be a positive integer')
  .transform((value: string): number => Number.parseInt(value, 10));

export const netuidSchema = nonNegativeIntegerQuerySchema.pipe(z.number().int().max(MAX_NETUID));

export const hotkeySchema = z.string().trim().regex(SS58_ADDRESS_PATTERN, 'must be an SS58 address');

export const booleanQuerySchema = z
  .enum(['true', 'false', '1', '0'])
  .transform((value): boolean => value === 'true' || value === '1');
