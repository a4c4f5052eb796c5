import { encodeSlug, projectSlug } from '../../core/slug.ts'
import type { Transport } from '../../core/transport.ts'
import type { TProjectOptions } from '../../core/types.ts'
import { assertOneOf } from '../../core/utils.ts'
import type { TCheckoutKey, TCheckoutKeyType, TMessageResponse } from '../../types/api.ts'

const CHECKOUT_KEY_TYPES: readonly TCheckoutKeyType[] = ['deploy-key', 'github-user-key']

export type TKeysApiOptions = {
  transport: Transport
}

export type TAddSshKeyOptions = TProjectOptions & {
  /** Restricts the key to one host */
  hostname?: string
}

/** Thin HTTP client over the v1.1 SSH and checkout key endpoints. */
export class KeysApi {
  private transport: Transport

  constructor(options: TKeysApiOptions) {
    this.transport = options.transport
  }

  /**
   * Adds an SSH key used to reach external systems from builds.
   * @param privateKey - unencrypted private key
   */
  public async addSshKey(
    org: string,
    repo: string,
    privateKey: string,
    options: TAddSshKeyOptions = {},
  ): Promise<void> {
    await this.transport.request<void>('POST', `${this.projectPath(org, repo, options)}/ssh-key`, {
      body: { hostname: options.hostname ?? null, private_key: privateKey },
      allowEmptyBody: true,
      signal: options.signal,
    })
  }

  public async listCheckoutKeys(
    org: string,
    repo: string,
    options: TProjectOptions = {},
  ): Promise<TCheckoutKey[]> {
    return await this.transport.request<TCheckoutKey[]>(
      'GET',
      `${this.projectPath(org, repo, options)}/checkout-key`,
      { signal: options.signal },
    )
  }

  public async createCheckoutKey(
    org: string,
    repo: string,
    keyType: TCheckoutKeyType,
    options: TProjectOptions = {},
  ): Promise<TCheckoutKey> {
    assertOneOf(keyType, CHECKOUT_KEY_TYPES, 'key type')
    return await this.transport.request<TCheckoutKey>(
      'POST',
      `${this.projectPath(org, repo, options)}/checkout-key`,
      { body: { type: keyType }, signal: options.signal },
    )
  }

  public async getCheckoutKey(
    org: string,
    repo: string,
    fingerprint: string,
    options: TProjectOptions = {},
  ): Promise<TCheckoutKey> {
    return await this.transport.request<TCheckoutKey>(
      'GET',
      `${this.projectPath(org, repo, options)}/checkout-key/${encodeURIComponent(fingerprint)}`,
      { signal: options.signal },
    )
  }

  public async deleteCheckoutKey(
    org: string,
    repo: string,
    fingerprint: string,
    options: TProjectOptions = {},
  ): Promise<TMessageResponse> {
    return await this.transport.request<TMessageResponse>(
      'DELETE',
      `${this.projectPath(org, repo, options)}/checkout-key/${encodeURIComponent(fingerprint)}`,
      { signal: options.signal },
    )
  }

  private projectPath(org: string, repo: string, options: TProjectOptions): string {
    return `project/${encodeSlug(projectSlug(org, repo, options.vcsType))}`
  }
}
