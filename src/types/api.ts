// Response shapes for the endpoints the client wraps. Only the commonly used fields are
// spelled out; CircleCI adds fields over time, so every entity stays open.

export type TJsonObject = { [key: string]: unknown }

export type TMessageResponse = { message: string }

export type TPaginatedResponse<TItem> = {
  items: TItem[]
  next_page_token: string | null
}

export type TUser = TJsonObject & {
  id?: string
  login: string
  name?: string | null
}

export type TCollaboration = TJsonObject & {
  id: string
  vcs_type: string
  name: string
  slug: string
  avatar_url?: string
}

export type TRepository = TJsonObject & {
  name: string
  username?: string
  vcs_url?: string
  following?: boolean
}

export type TProject = TJsonObject & {
  slug: string
  name: string
  organization_name: string
  organization_slug?: string
  organization_id?: string
  vcs_info?: { vcs_url: string; provider: string; default_branch: string }
}

export type TFollowedProject = TJsonObject & {
  reponame: string
  username: string
  vcs_url: string
  vcs_type?: string
  branches?: Record<string, unknown>
}

export type TFollowProjectResponse = TJsonObject & {
  following: boolean
  first_build?: TBuildSummary | null
}

export type TBuildStatusFilter = 'completed' | 'successful' | 'failed' | 'running'

export type TBuildSummary = TJsonObject & {
  build_num: number
  reponame: string
  username: string
  branch?: string
  status?: string
  outcome?: string | null
  vcs_revision?: string
  build_url?: string
}

export type TBuild = TBuildSummary & {
  steps?: unknown[]
  ssh_users?: Array<{ login: string; [key: string]: unknown }>
  canceled?: boolean
}

export type TTestMetadata = {
  tests: Array<TJsonObject & { name: string; result: string; classname?: string; file?: string }>
  exceptions?: unknown
}

export type TArtifact = TJsonObject & {
  path: string
  url: string
  node_index?: number
  pretty_path?: string
}

export type TJob = TJsonObject & {
  number?: number
  name: string
  status: string
  web_url?: string
  project?: { slug: string; name: string; external_url?: string }
}

export type TTriggerParameters = Record<string, string | number | boolean>

export type TPipeline = TJsonObject & {
  id: string
  number: number
  project_slug: string
  state: string
  created_at: string
  updated_at?: string
  trigger?: TJsonObject & { type: string }
  vcs?: TJsonObject & { branch?: string; tag?: string; revision?: string }
}

export type TPipelineConfig = {
  source: string
  compiled: string
  setup_config?: string
  compiled_setup_config?: string
}

export type TTriggeredPipeline = {
  id: string
  number: number
  state: string
  created_at: string
}

export type TWorkflow = TJsonObject & {
  id: string
  name: string
  pipeline_id: string
  pipeline_number?: number
  project_slug?: string
  status: string
  created_at: string
  stopped_at?: string | null
}

export type TWorkflowJob = TJsonObject & {
  id: string
  name: string
  type: 'build' | 'approval' | string
  status: string
  job_number?: number
  approval_request_id?: string
  dependencies?: string[]
}

export type TRerunWorkflowResponse = { workflow_id: string }

export type TInsightsMetrics = TJsonObject & {
  name: string
  window_start?: string
  window_end?: string
  metrics?: TJsonObject
}

export type TInsightsRun = TJsonObject & {
  id: string
  status: string
  duration?: number
  created_at?: string
  stopped_at?: string
}

export type TProjectBranches = { org_id?: string; project_id?: string; branches: string[] }

export type TTestMetrics = TJsonObject & {
  average_test_count?: number
  most_failed_tests?: unknown[]
  slowest_tests?: unknown[]
  total_test_runs?: number
}

export type TOwnerType = 'organization' | 'account'

export type TContext = TJsonObject & {
  id: string
  name: string
  created_at: string
}

export type TContextEnvvar = TJsonObject & {
  variable: string
  context_id: string
  created_at: string
  updated_at?: string
}

export type TScheduleSettings = TJsonObject & {
  description?: string
  'attribution-actor'?: 'current' | 'system'
  parameters?: TTriggerParameters
  timetable?: TJsonObject & {
    'per-hour': number
    'hours-of-day': number[]
    'days-of-week'?: string[]
    'days-of-month'?: number[]
    months?: string[]
  }
}

export type TSchedule = TJsonObject & {
  id: string
  name: string
  project_slug?: string
  description?: string
  created_at?: string
  updated_at?: string
}

export type TEnvvar = { name: string; value: string }

export type TCheckoutKeyType = 'deploy-key' | 'github-user-key'

export type TCheckoutKey = TJsonObject & {
  type: string
  fingerprint: string
  public_key: string
  preferred?: boolean
  time?: string
}
