export {
  ConfigDestinationDirectory,
  DEFAULT_CONFIG_PATH,
  loadConfig,
  parseConfig,
  resolveConfig,
  type FleetboardConfig,
} from './loader.js';
export { FleetboardConfigSchema, type RawCategory, type RawFleetboardConfig } from './schema.js';
