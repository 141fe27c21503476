export type { ConfigProvider } from './types';
export { EnvConfigProvider, type EnvSource } from './env-config';
