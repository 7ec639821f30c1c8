export { ProviderError, AllProvidersFailedError } from './ProviderError';
export type { ProviderErrorCode, ProviderFailure } from './ProviderError';
export { NormalizationDefect } from './NormalizationDefect';
export { ConfigError } from './ConfigError';
