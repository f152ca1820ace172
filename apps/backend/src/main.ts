import { createLogger, setLogLevel } from '@taskdeck/core';
import { createBackend, type Backend, type BackendOverrides } from './backend.js';
import { loadConfig, type LoadConfigOptions } from './config.js';

const log = createLogger('Main');

export interface StartOptions extends LoadConfigOptions {
  overrides?: BackendOverrides;
}

/**
 * Process entry point: loads config, applies the process-wide log level
 * once, then builds the backend.
 */
export function startBackend(options: StartOptions = {}): Backend {
  const { overrides, ...configOptions } = options;
  const config = loadConfig(configOptions);
  setLogLevel(config.logLevel);
  log.debug('Configuration loaded', config);
  return createBackend(config, overrides);
}
