export interface AccessPointSettings {
  interfaceName: string;
  ssid: string;
  passphrase: string;
  ip: string;
}

export interface ClientSettings {
  country: string;
  ssid: string;
  password: string;
}

export const DHCPCD_BLOCK_BEGIN = '# BEGIN vampgotchi access point';
export const DHCPCD_BLOCK_END = '# END vampgotchi access point';

/** `192.168.4.1` → `192.168.4`. */
export const subnetPrefix = (ip: string) => ip.split('.').slice(0, 3).join('.');

export const renderHostapdConf = ({ interfaceName, ssid, passphrase }: AccessPointSettings) =>
  [
    `interface=${interfaceName}`,
    'driver=nl80211',
    `ssid=${ssid}`,
    'hw_mode=g',
    'channel=7',
    'wmm_enabled=0',
    'macaddr_acl=0',
    'auth_algs=1',
    'ignore_broadcast_ssid=0',
    'wpa=2',
    `wpa_passphrase=${passphrase}`,
    'wpa_key_mgmt=WPA-PSK',
    'wpa_pairwise=CCMP',
    'rsn_pairwise=CCMP',
    '',
  ].join('\n');

export const renderDnsmasqConf = ({ interfaceName, ip }: AccessPointSettings) => {
  const prefix = subnetPrefix(ip);
  return [`interface=${interfaceName}`, `dhcp-range=${prefix}.2,${prefix}.20,255.255.255.0,24h`, ''].join('\n');
};

// Credentials go in verbatim; the request schema rejects line breaks.
export const renderWpaSupplicantConf = ({ country, ssid, password }: ClientSettings) =>
  [
    'ctrl_interface=DIR=/var/run/wpa_supplicant GROUP=netdev',
    'update_config=1',
    `country=${country}`,
    '',
    'network={',
    `    ssid="${ssid}"`,
    `    psk="${password}"`,
    '    key_mgmt=WPA-PSK',
    '}',
    '',
  ].join('\n');

export const renderDhcpcdBlock = ({ interfaceName, ip }: AccessPointSettings) =>
  [DHCPCD_BLOCK_BEGIN, `interface ${interfaceName}`, `static ip_address=${ip}/24`, 'nohook wpa_supplicant', DHCPCD_BLOCK_END].join(
    '\n',
  );

/** Drops the managed block, leaving the rest of the file as it was. */
export const removeDhcpcdBlock = (contents: string) => {
  const lines = contents.split('\n');
  const kept: string[] = [];
  let inBlock = false;

  for (const line of lines) {
    if (line.trim() === DHCPCD_BLOCK_BEGIN) {
      inBlock = true;
      continue;
    }
    if (inBlock) {
      if (line.trim() === DHCPCD_BLOCK_END) inBlock = false;
      continue;
    }
    kept.push(line);
  }

  return kept.join('\n').replace(/\n+$/, '\n');
};

/** Replaces the managed block if present, otherwise appends it. */
export const upsertDhcpcdBlock = (contents: string, block: string) => {
  const base = removeDhcpcdBlock(contents).replace(/\n+$/, '');
  return base ? `${base}\n\n${block}\n` : `${block}\n`;
};
