import { z } from 'zod';

export const attackSchema = z.object({
  mac: z.string().trim().min(1, 'mac is required'),
});

export type AttackInput = z.infer<typeof attackSchema>;
