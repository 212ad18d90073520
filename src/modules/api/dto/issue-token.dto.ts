import { z } from 'zod';

import { AuthScope } from '../../../common/interfaces/auth.types';

export const issueTokenSchema = z.object({
  apiToken: z.string().min(1),
  scopes: z.array(z.enum(AuthScope)).min(1).optional(),
});

export type IssueTokenDto = z.infer<typeof issueTokenSchema>;
