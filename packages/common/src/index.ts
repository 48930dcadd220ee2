export * from './types/network.js';
export * from './types/preferences.js';
export * from './types/session.js';
export * from './types/targets.js';
export * from './schemas/network.js';
export * from './schemas/preferences.js';
export * from './schemas/targets.js';
export * from './utils/result.js';
