export { generateId } from './id.js';
export { monotonicNow, isoNow, ageInDays, MS_PER_DAY } from './clock.js';
export {
  InsightsError,
  ConfigError,
  ValidationError,
  AuthenticationError,
  UserExistsError,
} from './errors.js';
export { isLevelEnabled, LOG_LEVELS } from './log-level.js';
