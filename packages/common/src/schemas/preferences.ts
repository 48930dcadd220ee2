import { z } from 'zod';

import type { Preferences } from '../types/preferences.js';

export const displayModeSchema = z.enum(['black', 'white']);

export const preferencesSchema: z.ZodType<Preferences, z.ZodTypeDef, unknown> = z.object({
  displayMode: displayModeSchema.default('black'),
  displayFullRefreshInterval: z.coerce.number().int().positive().default(30),
  apSsid: z.string().min(1).default('VampGotchi-AP'),
  apPassphrase: z.string().min(1).default('vampgotchi123'),
  apIp: z.string().ip({ version: 'v4' }).default('192.168.4.1'),
  bleToolPath: z.string().min(1).default('/root/BLEeding'),
  attackTimeout: z.coerce.number().int().positive().default(10),
  scanInterval: z.coerce.number().int().nonnegative().default(60),
  debugMode: z.boolean().default(false),
});

/** One layer of a preferences document: any subset of the options. Unknown keys are dropped. */
export const preferencesLayerSchema = z
  .object({
    displayMode: displayModeSchema,
    displayFullRefreshInterval: z.coerce.number().int().positive(),
    apSsid: z.string().min(1),
    apPassphrase: z.string().min(1),
    apIp: z.string().ip({ version: 'v4' }),
    bleToolPath: z.string().min(1),
    attackTimeout: z.coerce.number().int().positive(),
    scanInterval: z.coerce.number().int().nonnegative(),
    debugMode: z.boolean(),
  })
  .partial();

export const updateDisplayPreferencesSchema = z.object({
  displayMode: displayModeSchema.optional(),
  displayFullRefreshInterval: z.coerce.number().int().positive().optional(),
});

export type PreferencesLayer = z.infer<typeof preferencesLayerSchema>;
export type UpdateDisplayPreferences = z.infer<typeof updateDisplayPreferencesSchema>;
