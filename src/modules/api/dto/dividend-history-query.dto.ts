import { z } from 'zod';

import { hotkeySchema, netuidSchema, positiveIntegerQuerySchema } from './query-params.schemas';

export const dividendHistoryQuerySchema = z.object({
  netuid: netuidSchema.optional(),
  hotkey: hotkeySchema.optional(),
  limit: positiveIntegerQuerySchema.optional(),
});

export type DividendHistoryQueryDto = z.infer<typeof dividendHistoryQuerySchema>;
