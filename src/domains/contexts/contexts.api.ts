import { ConfigurationError } from '../../core/errors.ts'
import { ownerSlug } from '../../core/slug.ts'
import type { Transport } from '../../core/transport.ts'
import type { TPageOptions, TVcsType } from '../../core/types.ts'
import type { TContext, TContextEnvvar, TMessageResponse, TOwnerType } from '../../types/api.ts'

export type TContextsApiOptions = {
  transport: Transport
}

/** A context owner is addressed either by org name (turned into an owner slug) or by owner UUID. */
export type TContextOwner = {
  org?: string
  ownerId?: string
  /** Defaults to `organization` */
  ownerType?: TOwnerType
  vcsType?: TVcsType
}

/** Thin HTTP client over the v2 context endpoints. */
export class ContextsApi {
  private transport: Transport

  constructor(options: TContextsApiOptions) {
    this.transport = options.transport
  }

  public async getContexts(owner: TContextOwner, options: TPageOptions = {}): Promise<TContext[]> {
    const ownerType = owner.ownerType ?? 'organization'
    const queryString = owner.org
      ? { 'owner-type': ownerType, 'owner-slug': ownerSlug(owner.org, owner.vcsType) }
      : { 'owner-type': ownerType, 'owner-id': this.requireOwnerId(owner) }

    return await this.transport.requestItems<TContext>('context', { ...options, queryString })
  }

  public async getContext(contextId: string, signal?: AbortSignal): Promise<TContext> {
    return await this.transport.request<TContext>('GET', this.contextPath(contextId), {
      apiVersion: 'v2',
      signal,
    })
  }

  public async addContext(
    name: string,
    owner: TContextOwner,
    signal?: AbortSignal,
  ): Promise<TContext> {
    const ownerType = owner.ownerType ?? 'organization'
    const ownerRef = owner.org
      ? { type: ownerType, slug: ownerSlug(owner.org, owner.vcsType) }
      : { type: ownerType, id: this.requireOwnerId(owner) }

    return await this.transport.request<TContext>('POST', 'context', {
      apiVersion: 'v2',
      body: { name, owner: ownerRef },
      signal,
    })
  }

  public async deleteContext(contextId: string, signal?: AbortSignal): Promise<TMessageResponse> {
    return await this.transport.request<TMessageResponse>('DELETE', this.contextPath(contextId), {
      apiVersion: 'v2',
      signal,
    })
  }

  public async getContextEnvvars(
    contextId: string,
    options: TPageOptions = {},
  ): Promise<TContextEnvvar[]> {
    return await this.transport.requestItems<TContextEnvvar>(
      `${this.contextPath(contextId)}/environment-variable`,
      options,
    )
  }

  /** Adds the variable, or replaces its value when it already exists. */
  public async addContextEnvvar(
    contextId: string,
    name: string,
    value: string,
    signal?: AbortSignal,
  ): Promise<TContextEnvvar> {
    return await this.transport.request<TContextEnvvar>(
      'PUT',
      `${this.contextPath(contextId)}/environment-variable/${encodeURIComponent(name)}`,
      { apiVersion: 'v2', body: { value }, signal },
    )
  }

  public async deleteContextEnvvar(
    contextId: string,
    name: string,
    signal?: AbortSignal,
  ): Promise<TMessageResponse> {
    return await this.transport.request<TMessageResponse>(
      'DELETE',
      `${this.contextPath(contextId)}/environment-variable/${encodeURIComponent(name)}`,
      { apiVersion: 'v2', signal },
    )
  }

  private contextPath(contextId: string): string {
    return `context/${encodeURIComponent(contextId)}`
  }

  private requireOwnerId(owner: TContextOwner): string {
    if (!owner.ownerId) {
      throw new ConfigurationError('A context owner needs either org or ownerId')
    }
    return owner.ownerId
  }
}
