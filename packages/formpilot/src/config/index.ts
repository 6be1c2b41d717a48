export { getEnv, resetEnv, type Env } from './env.js';
export {
  FillerConfigSchema,
  loadFillerConfig,
  type FillerConfig,
  type FillerConfigInput,
} from './filler.js';
