/**
 * @relecov-mapper/cli
 */

export {
  DEFAULT_CONF_DIR,
  expandEnvVars,
  loadRunConfig,
  resolvePaths,
  runConfigSchema,
} from './config.js';
export type { LoadedRunConfig, ResolvedPaths, RunConfig } from './config.js';

export { loadMappingContext, readLabRecords, runCheckConfig, runMapCommand } from './run.js';
export type { CheckConfigResult, MapCommandOptions, MapCommandResult, MappingContext } from './run.js';

export { option, parseTargets } from './args.js';
