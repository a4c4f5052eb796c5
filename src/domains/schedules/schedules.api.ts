import { encodeSlug, projectSlug } from '../../core/slug.ts'
import type { Transport } from '../../core/transport.ts'
import type { TPageOptions, TProjectOptions } from '../../core/types.ts'
import type { TMessageResponse, TSchedule, TScheduleSettings } from '../../types/api.ts'

export type TSchedulesApiOptions = {
  transport: Transport
}

/** Thin HTTP client over the v2 scheduled pipeline endpoints. */
export class SchedulesApi {
  private transport: Transport

  constructor(options: TSchedulesApiOptions) {
    this.transport = options.transport
  }

  public async getSchedules(
    org: string,
    repo: string,
    options: TProjectOptions & TPageOptions = {},
  ): Promise<TSchedule[]> {
    const slug = encodeSlug(projectSlug(org, repo, options.vcsType))
    return await this.transport.requestItems<TSchedule>(`project/${slug}/schedule`, {
      paginate: options.paginate,
      limit: options.limit,
      signal: options.signal,
    })
  }

  public async getSchedule(scheduleId: string, signal?: AbortSignal): Promise<TSchedule> {
    return await this.transport.request<TSchedule>('GET', this.schedulePath(scheduleId), {
      apiVersion: 'v2',
      signal,
    })
  }

  public async addSchedule(
    org: string,
    repo: string,
    name: string,
    settings: TScheduleSettings,
    options: TProjectOptions = {},
  ): Promise<TSchedule> {
    const slug = encodeSlug(projectSlug(org, repo, options.vcsType))
    return await this.transport.request<TSchedule>('POST', `project/${slug}/schedule`, {
      apiVersion: 'v2',
      body: { ...settings, name },
      signal: options.signal,
    })
  }

  /** Partial update; only the given settings change. */
  public async updateSchedule(
    scheduleId: string,
    settings: TScheduleSettings,
    signal?: AbortSignal,
  ): Promise<TSchedule> {
    return await this.transport.request<TSchedule>('PATCH', this.schedulePath(scheduleId), {
      apiVersion: 'v2',
      body: settings,
      signal,
    })
  }

  public async deleteSchedule(scheduleId: string, signal?: AbortSignal): Promise<TMessageResponse> {
    return await this.transport.request<TMessageResponse>(
      'DELETE',
      this.schedulePath(scheduleId),
      { apiVersion: 'v2', signal },
    )
  }

  private schedulePath(scheduleId: string): string {
    return `schedule/${encodeURIComponent(scheduleId)}`
  }
}
