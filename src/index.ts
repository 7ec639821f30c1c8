/**
 * Sports data federation
 *
 *   import { createFederationService } from 'sports-data-federation';
 *
 *   const sports = createFederationService();
 *   const games = await sports.getEvents('nfl', '2024-09-08');
 */

// Federation
export {
  FederationService,
  createFederationService,
  createMatchingService,
  DEFAULT_TTL_SECONDS,
  MERGEABLE_OPERATIONS,
  OPERATION_NAMES,
  TTL_CLASSES,
} from './services/federation';
export type {
  CallOptions,
  FederationCacheStats,
  FederationOutcome,
  FederationServiceOptions,
  FederationSettings,
  FederationSettingsInput,
  MergeableOperation,
  OperationArgs,
  OperationName,
  OperationResult,
  ProviderHealth,
  ProviderRegistration,
  TtlClass,
} from './services/federation';

// Matching
export { MatchingService } from './services/matching/MatchingService';
export type { EventSource, MatchResult } from './services/matching/MatchingService';
export { findByTeamIds, findByTeamNames, matchesTeam } from './services/matching/eventMatcher';

// Providers
export type { ProviderOptions, SportsProvider } from './providers/types';
export { EspnProvider } from './providers/espn/espnProvider';
export type { EspnProviderOptions } from './providers/espn/espnProvider';
export { TsdbProvider } from './providers/tsdb/tsdbProvider';
export type { TsdbProviderOptions } from './providers/tsdb/tsdbProvider';
export { normalizeName, rankTeamMatches } from './providers/shared/teamSearch';

// Records
export { EVENT_STATES } from './types/sports';
export type { ConferenceTeams, Event, EventState, EventStatus, Team, TeamStats, Venue } from './types/sports';
export { createEvent, createEventStatus, createTeam, createTeamStats, createVenue, isDerived } from './models/records';
export { getLeague, listLeagues, normalizeLeagueKey } from './leagues/catalog';
export type { LeagueEntry } from './leagues/catalog';

// Errors
export { AllProvidersFailedError, ConfigError, NormalizationDefect, ProviderError } from './errors';
export type { ProviderErrorCode, ProviderFailure } from './errors';

// Configuration & observability
export { buildFederationOptions, buildFederationSettings, buildProviderRegistrations } from './config';
export { parseEnv } from './config/env';
export type { Env } from './config/env';
export { renderMetrics, resetMetrics } from './infrastructure/metrics';
