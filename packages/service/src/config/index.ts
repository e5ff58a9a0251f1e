export { validateEnv } from './env-schema';
export type { EnvConfig } from './env-schema';
