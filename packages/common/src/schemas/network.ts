import { z } from 'zod';

// Newlines would open new directives in the generated daemon files.
const singleLine = (field: string) =>
  z.string().min(1, `${field} is required`).regex(/^[^\r\n]*$/, `${field} must be a single line`);

export const clientModeSchema = z.object({
  ssid: singleLine('ssid'),
  password: singleLine('password'),
});

export type ClientModeInput = z.infer<typeof clientModeSchema>;
