import type { Transport } from '../../core/transport.ts'
import type { TPageOptions, TVcsType } from '../../core/types.ts'
import { DEFAULT_VCS_TYPE } from '../../core/slug.ts'
import { normalizeApiVersion } from '../../core/utils.ts'
import type { TCollaboration, TRepository, TUser } from '../../types/api.ts'

export type TUserApiOptions = {
  transport: Transport
}

export type TGetUserReposOptions = TPageOptions & {
  vcsType?: TVcsType
}

/** Thin HTTP client over the user endpoints. */
export class UserApi {
  private transport: Transport

  constructor(options: TUserApiOptions) {
    this.transport = options.transport
  }

  /**
   * Info about the signed in user.
   * @param apiVersion - loose version input ("1.1", "v2", "2"...); defaults to v1.1
   */
  public async getUserInfo(apiVersion?: string, signal?: AbortSignal): Promise<TUser> {
    return await this.transport.request<TUser>('GET', 'me', {
      apiVersion: normalizeApiVersion(apiVersion),
      signal,
    })
  }

  /** Alias of {@link UserApi.getUserInfo}. */
  public async me(apiVersion?: string, signal?: AbortSignal): Promise<TUser> {
    return await this.getUserInfo(apiVersion, signal)
  }

  public async getUserIdInfo(userId: string, signal?: AbortSignal): Promise<TUser> {
    return await this.transport.request<TUser>('GET', `user/${encodeURIComponent(userId)}`, {
      apiVersion: 'v2',
      signal,
    })
  }

  /** Organizations the user is a member of or collaborates with. */
  public async getUserCollaborations(signal?: AbortSignal): Promise<TCollaboration[]> {
    return await this.transport.request<TCollaboration[]>('GET', 'me/collaborations', {
      apiVersion: 'v2',
      signal,
    })
  }

  /**
   * Repos accessible to the user, including ones not followed or not set up yet,
   * which `projects.getProjects()` does not list.
   */
  public async getUserRepos(options: TGetUserReposOptions = {}): Promise<TRepository[]> {
    const vcsType = options.vcsType ?? DEFAULT_VCS_TYPE
    return await this.transport.requestItems<TRepository>(
      `user/repos/${encodeURIComponent(vcsType)}`,
      {
        apiVersion: 'v1.1',
        paginate: options.paginate,
        limit: options.limit,
        signal: options.signal,
      },
    )
  }
}
