import { inspect } from 'util'
import { resolveClientConfig, type TClientConfigOptions } from '../core/config.ts'
import { formatExchange, formatJson } from '../core/inspect.ts'
import { ownerSlug, projectSlug, splitProjectSlug } from '../core/slug.ts'
import { Transport } from '../core/transport.ts'
import type { TExchange, TRequestRecord, TResponseRecord, TVcsType } from '../core/types.ts'
import { ArtifactsApi } from '../domains/artifacts/artifacts.api.ts'
import { BuildsApi } from '../domains/builds/builds.api.ts'
import { ContextsApi } from '../domains/contexts/contexts.api.ts'
import { EnvvarsApi } from '../domains/envvars/envvars.api.ts'
import { InsightsApi } from '../domains/insights/insights.api.ts'
import { JobsApi } from '../domains/jobs/jobs.api.ts'
import { KeysApi } from '../domains/keys/keys.api.ts'
import { PipelinesApi } from '../domains/pipelines/pipelines.api.ts'
import { ProjectsApi } from '../domains/projects/projects.api.ts'
import { SchedulesApi } from '../domains/schedules/schedules.api.ts'
import { UserApi } from '../domains/user/user.api.ts'
import { WorkflowsApi } from '../domains/workflows/workflows.api.ts'

export type TCircleCIOptions = TClientConfigOptions & {
  /** Optional fetch implementation for testing or custom agents */
  fetchImplementation?: typeof fetch
  /** Where `ppj` and `ppr` write. Defaults to console.log */
  output?: (text: string) => void
}

/**
 * Client for the CircleCI REST API (v1.1 and v2).
 * Endpoints are grouped by category; every call goes through one shared Transport,
 * so `lastRequest` / `lastResponse` describe the most recent call on this instance.
 *
 * @example
 * ```typescript
 * const circleci = new CircleCI({ token: process.env.CIRCLE_TOKEN })
 *
 * const pipelines = await circleci.pipelines.getProjectPipelines('acme', 'api', { limit: 20 })
 * const workflows = await circleci.pipelines.getPipelineWorkflows(pipelines[0].id)
 * circleci.ppr()
 * ```
 */
export class CircleCI {
  public readonly user: UserApi
  public readonly projects: ProjectsApi
  public readonly builds: BuildsApi
  public readonly artifacts: ArtifactsApi
  public readonly jobs: JobsApi
  public readonly pipelines: PipelinesApi
  public readonly workflows: WorkflowsApi
  public readonly insights: InsightsApi
  public readonly contexts: ContextsApi
  public readonly schedules: SchedulesApi
  public readonly envvars: EnvvarsApi
  public readonly keys: KeysApi

  private readonly transport: Transport
  private readonly secrets: readonly string[]
  private readonly output: (text: string) => void

  constructor(options: TCircleCIOptions = {}) {
    const config = resolveClientConfig(options)
    this.secrets = [config.token, Buffer.from(`${config.token}:`).toString('base64')]
    this.output = options.output ?? ((text) => console.log(text))

    this.transport = new Transport({
      config,
      fetchImplementation: options.fetchImplementation,
    })

    const domainOptions = { transport: this.transport }
    this.user = new UserApi(domainOptions)
    this.projects = new ProjectsApi(domainOptions)
    this.builds = new BuildsApi(domainOptions)
    this.artifacts = new ArtifactsApi(domainOptions)
    this.jobs = new JobsApi(domainOptions)
    this.pipelines = new PipelinesApi(domainOptions)
    this.workflows = new WorkflowsApi(domainOptions)
    this.insights = new InsightsApi(domainOptions)
    this.contexts = new ContextsApi(domainOptions)
    this.schedules = new SchedulesApi(domainOptions)
    this.envvars = new EnvvarsApi(domainOptions)
    this.keys = new KeysApi(domainOptions)
  }

  public get baseUrl(): string {
    return this.transport.baseUrl
  }

  /** Request of the final attempt of the most recent call, credentials redacted. */
  public get lastRequest(): TRequestRecord | undefined {
    return this.transport.lastRequest
  }

  /** Response of the final attempt of the most recent call. */
  public get lastResponse(): TResponseRecord | undefined {
    return this.transport.lastResponse
  }

  /** Releases connections held for `verifySsl: false`; the client stays usable afterwards. */
  public async close(): Promise<void> {
    await this.transport.close()
  }

  /** Pretty prints JSON-like data. */
  public ppj(data: unknown): void {
    this.output(formatJson(data))
  }

  /** Pretty prints a request/response pair, by default the last one. The token is never printed. */
  public ppr(exchange: TExchange | undefined = this.transport.exchange): void {
    if (!exchange) return
    this.output(formatExchange(exchange, { secrets: this.secrets }))
  }

  public projectSlug(org: string, repo: string, vcsType?: TVcsType): string {
    return projectSlug(org, repo, vcsType)
  }

  public ownerSlug(org: string, vcsType?: TVcsType): string {
    return ownerSlug(org, vcsType)
  }

  public splitProjectSlug(slug: string): [vcsType: string, org: string, repo: string] {
    return splitProjectSlug(slug)
  }

  /** Keeps the token out of console.log / util.inspect output. */
  public [inspect.custom](): string {
    return `CircleCI { baseUrl: '${this.baseUrl}' }`
  }

  public toJSON(): { baseUrl: string } {
    return { baseUrl: this.baseUrl }
  }
}
