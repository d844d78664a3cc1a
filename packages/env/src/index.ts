export {
  getBankNameLimits,
  getNodeEnv,
  isDevelopment,
  isProduction,
  isTest,
  parseEnv,
  resetEnvCache,
  type BankNameLimits,
  type ValidatedEnv,
} from './config.js';
