import { config as loadDotenv } from 'dotenv';
import { z } from 'zod';
import { resolve } from 'path';
import { fileURLToPath } from 'url';
import { dirname } from 'path';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

loadDotenv({ path: resolve(__dirname, '../../.env') });

const environmentSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  PORT: z.coerce.number().int().positive().default(80),
  HOST: z.string().min(1).default('0.0.0.0'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  PREFERENCES_FILE: z.string().min(1).default('config.yml'),
  PREFERENCES_DEFAULTS_FILE: z.string().min(1).default('default_config.yml'),
  HOSTAPD_CONF: z.string().min(1).default('/etc/hostapd/hostapd.conf'),
  DNSMASQ_CONF: z.string().min(1).default('/etc/dnsmasq.conf'),
  DHCPCD_CONF: z.string().min(1).default('/etc/dhcpcd.conf'),
  WPA_SUPPLICANT_CONF: z.string().min(1).default('/etc/wpa_supplicant/wpa_supplicant.conf'),
  WIFI_INTERFACE: z.string().min(1).default('wlan0'),
  WIFI_COUNTRY: z.string().length(2).default('US'),
  BLE_TOOL_PYTHON: z.string().min(1).default('python3'),
  BLE_TOOL_SCRIPT: z.string().min(1).default('bleeding.py'),
  BLE_SCAN_TIMEOUT_MS: z.coerce.number().int().positive().default(20_000),
  DISPLAY_DRIVER: z.enum(['none', 'file']).default('none'),
  DISPLAY_FRAME_PATH: z.string().min(1).default('/run/vampgotchi/frame.pbm'),
  DISPLAY_REFRESH_CRON: z.string().min(1).default('*/3 * * * * *'),
});

const parsed = environmentSchema.safeParse(process.env);

if (!parsed.success) {
  console.error('❌ Invalid environment configuration', parsed.error.format());
  throw new Error('Invalid environment configuration');
}

export const env = parsed.data;

export type Environment = typeof env;
