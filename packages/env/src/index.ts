export {
  LedgerModeSchema,
  getLedgerMode,
  parseEnv,
  resetEnvCache,
  type ValidatedEnv,
} from './config.js';
