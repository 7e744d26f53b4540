import { z } from 'zod';

// Older servers send numeric ids, current ones send strings
export const IdSchema = z.union([z.string(), z.number()]);

export type Id = z.infer<typeof IdSchema>;
