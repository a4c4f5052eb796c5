import { encodeSlug, ownerSlug, projectSlug } from '../../core/slug.ts'
import type { Transport } from '../../core/transport.ts'
import type { TPageOptions, TProjectOptions } from '../../core/types.ts'
import type {
  TMessageResponse,
  TPipeline,
  TPipelineConfig,
  TTriggeredPipeline,
  TTriggerParameters,
  TWorkflow,
} from '../../types/api.ts'

export type TPipelinesApiOptions = {
  transport: Transport
}

export type TProjectPipelinesOptions = TProjectOptions &
  TPageOptions & {
    /** Ignored when `mine` is set */
    branch?: string
    /** Only pipelines triggered by the token's user */
    mine?: boolean
  }

export type TOrgPipelinesOptions = TProjectOptions &
  TPageOptions & {
    mine?: boolean
  }

export type TTriggerPipelineOptions = TProjectOptions & {
  /** Takes precedence over `tag` */
  branch?: string
  tag?: string
  parameters?: TTriggerParameters
}

/** Thin HTTP client over the v2 pipeline endpoints. */
export class PipelinesApi {
  private transport: Transport

  constructor(options: TPipelinesApiOptions) {
    this.transport = options.transport
  }

  public async getProjectPipelines(
    org: string,
    repo: string,
    options: TProjectPipelinesOptions = {},
  ): Promise<TPipeline[]> {
    let path = `project/${encodeSlug(projectSlug(org, repo, options.vcsType))}/pipeline`
    if (options.mine) path += '/mine'
    return await this.transport.requestItems<TPipeline>(path, {
      queryString: { branch: !options.mine && options.branch ? options.branch : undefined },
      paginate: options.paginate,
      limit: options.limit,
      signal: options.signal,
    })
  }

  public async getProjectPipeline(
    org: string,
    repo: string,
    pipelineNumber: number,
    options: TProjectOptions = {},
  ): Promise<TPipeline> {
    const slug = encodeSlug(projectSlug(org, repo, options.vcsType))
    return await this.transport.request<TPipeline>(
      'GET',
      `project/${slug}/pipeline/${encodeURIComponent(String(pipelineNumber))}`,
      { apiVersion: 'v2', signal: options.signal },
    )
  }

  /** Pipelines of the most recently built projects (max 250) the user follows in an org. */
  public async getPipelines(org: string, options: TOrgPipelinesOptions = {}): Promise<TPipeline[]> {
    return await this.transport.requestItems<TPipeline>('pipeline', {
      queryString: {
        'org-slug': ownerSlug(org, options.vcsType),
        mine: options.mine ? true : undefined,
      },
      paginate: options.paginate,
      limit: options.limit,
      signal: options.signal,
    })
  }

  public async getPipeline(pipelineId: string, signal?: AbortSignal): Promise<TPipeline> {
    return await this.transport.request<TPipeline>(
      'GET',
      `pipeline/${encodeURIComponent(pipelineId)}`,
      { apiVersion: 'v2', signal },
    )
  }

  public async getPipelineConfig(
    pipelineId: string,
    signal?: AbortSignal,
  ): Promise<TPipelineConfig> {
    return await this.transport.request<TPipelineConfig>(
      'GET',
      `pipeline/${encodeURIComponent(pipelineId)}/config`,
      { apiVersion: 'v2', signal },
    )
  }

  public async getPipelineWorkflows(
    pipelineId: string,
    options: TPageOptions = {},
  ): Promise<TWorkflow[]> {
    return await this.transport.requestItems<TWorkflow>(
      `pipeline/${encodeURIComponent(pipelineId)}/workflow`,
      options,
    )
  }

  public async triggerPipeline(
    org: string,
    repo: string,
    options: TTriggerPipelineOptions = {},
  ): Promise<TTriggeredPipeline> {
    const body: { branch?: string; tag?: string; parameters?: TTriggerParameters } = {}
    if (options.branch) body.branch = options.branch
    else if (options.tag) body.tag = options.tag
    if (options.parameters && Object.keys(options.parameters).length > 0) {
      body.parameters = options.parameters
    }

    const slug = encodeSlug(projectSlug(org, repo, options.vcsType))
    return await this.transport.request<TTriggeredPipeline>('POST', `project/${slug}/pipeline`, {
      apiVersion: 'v2',
      body,
      signal: options.signal,
    })
  }

  /** Continues a pipeline from its setup phase with the generated configuration. */
  public async continuePipeline(
    continuationKey: string,
    configuration: string,
    parameters?: TTriggerParameters,
    signal?: AbortSignal,
  ): Promise<TMessageResponse> {
    const body: Record<string, unknown> = {
      'continuation-key': continuationKey,
      configuration,
    }
    if (parameters && Object.keys(parameters).length > 0) body.parameters = parameters

    return await this.transport.request<TMessageResponse>('POST', 'pipeline/continue', {
      apiVersion: 'v2',
      body,
      signal,
    })
  }
}
