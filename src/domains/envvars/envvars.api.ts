import { encodeSlug, projectSlug } from '../../core/slug.ts'
import type { Transport } from '../../core/transport.ts'
import type { TProjectOptions } from '../../core/types.ts'
import type { TEnvvar, TMessageResponse } from '../../types/api.ts'

export type TEnvvarsApiOptions = {
  transport: Transport
}

/**
 * Thin HTTP client over the v1.1 project environment variable endpoints.
 * Values come back masked.
 */
export class EnvvarsApi {
  private transport: Transport

  constructor(options: TEnvvarsApiOptions) {
    this.transport = options.transport
  }

  public async listEnvvars(
    org: string,
    repo: string,
    options: TProjectOptions = {},
  ): Promise<TEnvvar[]> {
    return await this.transport.request<TEnvvar[]>('GET', this.envvarPath(org, repo, options), {
      signal: options.signal,
    })
  }

  public async addEnvvar(
    org: string,
    repo: string,
    name: string,
    value: string,
    options: TProjectOptions = {},
  ): Promise<TEnvvar> {
    return await this.transport.request<TEnvvar>('POST', this.envvarPath(org, repo, options), {
      body: { name, value },
      signal: options.signal,
    })
  }

  public async getEnvvar(
    org: string,
    repo: string,
    name: string,
    options: TProjectOptions = {},
  ): Promise<TEnvvar> {
    return await this.transport.request<TEnvvar>(
      'GET',
      `${this.envvarPath(org, repo, options)}/${encodeURIComponent(name)}`,
      { signal: options.signal },
    )
  }

  public async deleteEnvvar(
    org: string,
    repo: string,
    name: string,
    options: TProjectOptions = {},
  ): Promise<TMessageResponse> {
    return await this.transport.request<TMessageResponse>(
      'DELETE',
      `${this.envvarPath(org, repo, options)}/${encodeURIComponent(name)}`,
      { signal: options.signal },
    )
  }

  private envvarPath(org: string, repo: string, options: TProjectOptions): string {
    return `project/${encodeSlug(projectSlug(org, repo, options.vcsType))}/envvar`
  }
}
