/**
 * Federation Module
 *
 * Composition root: builds a FederationService over the bundled adapters
 * from the validated environment.
 */

import { buildFederationOptions } from '../../config';
import { getEnv, type Env } from '../../config/env';
import { MatchingService } from '../matching/MatchingService';
import { FederationService } from './FederationService';
import type { FederationSettingsInput } from './options';

export { FederationService } from './FederationService';
export type { CallOptions, FederationCacheStats, FederationOutcome, ProviderHealth } from './FederationService';
export { DEFAULT_TTL_SECONDS, MERGEABLE_OPERATIONS, TTL_CLASSES } from './options';
export type {
  FederationServiceOptions,
  FederationSettings,
  FederationSettingsInput,
  MergeableOperation,
  ProviderRegistration,
  TtlClass,
} from './options';
export { OPERATION_NAMES } from './operations';
export type { OperationArgs, OperationName, OperationResult } from './operations';

/**
 * Federation service over ESPN and TheSportsDB, configured from env.
 * `overrides` win over env-derived settings.
 */
export function createFederationService(
  env: Env = getEnv(),
  overrides: FederationSettingsInput = {},
): FederationService {
  return new FederationService({ ...buildFederationOptions(env), ...overrides });
}

/** Event matching backed by a federation service. */
export function createMatchingService(federation: FederationService = createFederationService()): MatchingService {
  return new MatchingService(federation);
}
