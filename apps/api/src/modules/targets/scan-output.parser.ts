import {
  MAC_ADDRESS_PATTERN,
  normalizeMac,
  structuredScanRecordSchema,
  type ParsedDevice,
} from '@vampgotchi/common';

export const UNKNOWN_DEVICE_NAME = 'Unknown';
export const MAX_NAME_LENGTH = 20;

const escapeRegExp = (value: string) => value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');

// Tried in order; the first one that matches the line wins.
const namePatterns = (mac: string): RegExp[] => [
  /name[:\s]+([^\n,]+)/i,
  new RegExp(`([A-Za-z0-9\\s\\-_]+)\\s+${escapeRegExp(mac)}`, 'i'),
  /Device[:\s]+([^\n,]+)/i,
];

const SIGNAL_PATTERNS: RegExp[] = [/RSSI[:\s]+(-?\d+)/i, /(-?\d+)\s*dBm/i, /signal[:\s]+(-?\d+)/i];

const truncateName = (name: string) => name.slice(0, MAX_NAME_LENGTH);

const extractName = (line: string, mac: string): string => {
  for (const pattern of namePatterns(mac)) {
    const match = pattern.exec(line);
    if (match?.[1] !== undefined) {
      return match[1].trim();
    }
  }
  return UNKNOWN_DEVICE_NAME;
};

const extractSignal = (line: string): number => {
  for (const pattern of SIGNAL_PATTERNS) {
    const match = pattern.exec(line);
    if (match?.[1] === undefined) continue;
    const value = Number.parseInt(match[1], 10);
    if (Number.isSafeInteger(value)) return value;
  }
  return 0;
};

const parseStructuredLine = (line: string): ParsedDevice | null => {
  const trimmed = line.trim();
  if (!trimmed.startsWith('{')) return null;

  let candidate: unknown;
  try {
    candidate = JSON.parse(trimmed);
  } catch {
    return null;
  }

  const parsed = structuredScanRecordSchema.safeParse(candidate);
  if (!parsed.success) return null;

  const { address, mac, name, rssi } = parsed.data;
  const resolvedMac = address ?? mac;
  if (!resolvedMac) return null;

  return {
    mac: resolvedMac,
    name: truncateName(name?.trim() || UNKNOWN_DEVICE_NAME),
    rssi: rssi ?? 0,
  };
};

const parseTextLine = (line: string): ParsedDevice | null => {
  const match = MAC_ADDRESS_PATTERN.exec(line);
  if (!match) return null;

  const mac = normalizeMac(match[0]);
  return {
    mac,
    name: truncateName(extractName(line, mac)),
    rssi: extractSignal(line),
  };
};

/**
 * Scrapes device records out of a scanner's free-form output.
 *
 * Only the first MAC-shaped substring of a line is considered, and the name and
 * signal strength are looked up on that same line. A MAC reported more than once
 * keeps its first occurrence. Lines holding a JSON object with an `address` or
 * `mac` field are read as structured records instead.
 */
export const parseScanOutput = (output: string): ParsedDevice[] => {
  const devices: ParsedDevice[] = [];
  const seen = new Set<string>();

  for (const line of output.split('\n')) {
    const device = parseStructuredLine(line) ?? parseTextLine(line);
    if (!device || seen.has(device.mac)) continue;
    seen.add(device.mac);
    devices.push(device);
  }

  return devices;
};
