import { z } from 'zod';

import { booleanQuerySchema, hotkeySchema, netuidSchema } from './query-params.schemas';

export const taoDividendsQuerySchema = z.object({
  netuid: netuidSchema.optional(),
  hotkey: hotkeySchema.optional(),
  trade: booleanQuerySchema.default(false),
});

export type TaoDividendsQueryDto = z.infer<typeof taoDividendsQuerySchema>;
