import { z } from 'zod';

export const MAC_ADDRESS_PATTERN = /([0-9A-Fa-f]{2}[:-]){5}([0-9A-Fa-f]{2})/;

export const normalizeMac = (mac: string) => mac.replace(/-/g, ':').toUpperCase();

export const macAddressSchema = z
  .string()
  .trim()
  .regex(new RegExp(`^${MAC_ADDRESS_PATTERN.source}$`), 'Expected a MAC address')
  .transform(normalizeMac);

/** A device line emitted by a scanner that speaks line-delimited JSON. */
export const structuredScanRecordSchema = z
  .object({
    address: macAddressSchema.optional(),
    mac: macAddressSchema.optional(),
    name: z.string().nullish(),
    rssi: z.number().int().nullish(),
  })
  .refine((record) => record.address !== undefined || record.mac !== undefined, {
    message: 'address or mac is required',
  });

export type StructuredScanRecord = z.infer<typeof structuredScanRecordSchema>;
