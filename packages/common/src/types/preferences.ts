export type DisplayMode = 'black' | 'white';

export interface Preferences {
  displayMode: DisplayMode;
  displayFullRefreshInterval: number;
  apSsid: string;
  apPassphrase: string;
  apIp: string;
  bleToolPath: string;
  /** Seconds a deauthentication run is allowed to last. */
  attackTimeout: number;
  /** Seconds between automatic scans, 0 turns them off. */
  scanInterval: number;
  debugMode: boolean;
}

export interface PublicPreferences extends Omit<Preferences, 'apPassphrase'> {
  hasApPassphrase: boolean;
}
