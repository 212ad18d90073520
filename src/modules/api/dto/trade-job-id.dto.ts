import { z } from 'zod';

export const tradeJobIdSchema = z.uuid();

export type TradeJobIdDto = z.infer<typeof tradeJobIdSchema>;
