// Main client
export { CircleCI } from './client/circleci.ts'
export type { TCircleCIOptions } from './client/circleci.ts'

// Dispatcher (for advanced usage: custom endpoints, alternative fetch implementations)
export { Transport } from './core/transport.ts'
export type { TTransportOptions } from './core/transport.ts'
export { resolveClientConfig, CIRCLE_API_URL } from './core/config.ts'
export type { TClientConfigOptions } from './core/config.ts'
export { DEFAULT_RETRY_POLICY, DEFAULT_RETRYABLE_STATUSES } from './core/retry.ts'

// Domain APIs
export { ArtifactsApi } from './domains/artifacts/artifacts.api.ts'
export type {
  TDownloadArtifactOptions,
  TLatestArtifactOptions,
} from './domains/artifacts/artifacts.api.ts'
export { BuildsApi } from './domains/builds/builds.api.ts'
export type {
  TBuildListOptions,
  TBuildSummaryOptions,
  TRetryBuildOptions,
  TTriggerBuildOptions,
} from './domains/builds/builds.api.ts'
export { ContextsApi } from './domains/contexts/contexts.api.ts'
export type { TContextOwner } from './domains/contexts/contexts.api.ts'
export { EnvvarsApi } from './domains/envvars/envvars.api.ts'
export { InsightsApi } from './domains/insights/insights.api.ts'
export type {
  TInsightsListOptions,
  TInsightsQueryOptions,
} from './domains/insights/insights.api.ts'
export { JobsApi } from './domains/jobs/jobs.api.ts'
export { KeysApi } from './domains/keys/keys.api.ts'
export type { TAddSshKeyOptions } from './domains/keys/keys.api.ts'
export { PipelinesApi } from './domains/pipelines/pipelines.api.ts'
export type {
  TOrgPipelinesOptions,
  TProjectPipelinesOptions,
  TTriggerPipelineOptions,
} from './domains/pipelines/pipelines.api.ts'
export { ProjectsApi } from './domains/projects/projects.api.ts'
export { SchedulesApi } from './domains/schedules/schedules.api.ts'
export { UserApi } from './domains/user/user.api.ts'
export type { TGetUserReposOptions } from './domains/user/user.api.ts'
export { WorkflowsApi } from './domains/workflows/workflows.api.ts'
export type { TRerunWorkflowOptions } from './domains/workflows/workflows.api.ts'

// Helpers
export { formatExchange, formatJson } from './core/inspect.ts'
export { encodeSlug, ownerSlug, projectSlug, splitProjectSlug } from './core/slug.ts'
export { normalizeApiVersion } from './core/utils.ts'

// Errors
export {
  CircleCIError,
  ConfigurationError,
  TransportError,
  TimeoutError,
  APIError,
  ParseError,
  AbortOperationError,
} from './core/errors.ts'

// Types
export type {
  TApiVersion,
  TAuthScheme,
  TClientConfig,
  TExchange,
  THttpMethod,
  TItemsRequestOptions,
  TPageOptions,
  TProjectOptions,
  TQueryParams,
  TRequestOptions,
  TRequestRecord,
  TResponseRecord,
  TRetryPolicy,
  TVcsType,
} from './core/types.ts'

export type * from './types/api.ts'
