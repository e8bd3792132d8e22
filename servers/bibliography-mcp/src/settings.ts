import {
  configFromEnv,
  loadConfigYaml,
  mergeConfigLayers,
  parseConfig,
  type ResolutionConfig
} from '@citefetch/core';

export const DEFAULT_CONFIG_FILE = 'citefetch.yml';

/**
 * Config file, then environment, then explicit overrides (CLI flags or tool
 * arguments). The result is frozen and passed down; nothing reads it globally.
 */
export function loadSettings(
  overrides: Record<string, unknown> = {},
  configFile = process.env.CITEFETCH_CONFIG || DEFAULT_CONFIG_FILE,
  env: NodeJS.ProcessEnv = process.env
): ResolutionConfig {
  return parseConfig(mergeConfigLayers(loadConfigYaml(configFile), configFromEnv(env), overrides));
}
