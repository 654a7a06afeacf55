export { FileConfigSource, envOverrides } from './file-config-source.js';
export { loadRuntimeSettings } from './settings.js';
export type { RuntimeSettings } from './settings.js';
