export {
  KeyRecord,
  systemClock,
  BUDGET_FLOOR_USD,
  DEFAULT_MONTHLY_BUDGET_USD,
  DEFAULT_COST_PER_1K_INPUT,
  DEFAULT_COST_PER_1K_OUTPUT,
} from "./key-record.js";
export type { Clock } from "./key-record.js";
export { CredentialPool, MAX_NUMBERED_KEYS } from "./credential-pool.js";
export type { CredentialPoolOptions } from "./credential-pool.js";
