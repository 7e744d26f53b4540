import { z } from 'zod';
import { AccountSchema } from './account.js';
import { IdSchema } from './common.js';
import { StatusSchema } from './status.js';

// type is one of mention / reblog / favourite / follow on the servers this targets
export const NotificationSchema = z
  .object({
    id: IdSchema,
    type: z.string(),
    created_at: z.string(),
    account: AccountSchema,
    status: StatusSchema.nullable().optional(),
  })
  .passthrough();

export type Notification = z.infer<typeof NotificationSchema>;
