import { ConfigurationError } from './errors.ts'
import type { TVcsType } from './types.ts'

export const DEFAULT_VCS_TYPE: TVcsType = 'github'

/** `:vcs-type/:org/:repo`, e.g. `github/acme/api`. Org and repo may not be empty or contain `/`. */
export function projectSlug(
  org: string,
  repo: string,
  vcsType: TVcsType = DEFAULT_VCS_TYPE,
): string {
  const slug = `${vcsType}/${org}/${repo}`
  splitProjectSlug(slug)
  return slug
}

/** `:vcs-type/:org`, e.g. `github/acme` */
export function ownerSlug(org: string, vcsType: TVcsType = DEFAULT_VCS_TYPE): string {
  return `${vcsType}/${org}`
}

export function splitProjectSlug(slug: string): [vcsType: string, org: string, repo: string] {
  const parts = slug.split('/')
  const [vcsType, org, repo] = parts
  if (parts.length !== 3 || !vcsType || !org || !repo) {
    throw new ConfigurationError(`Invalid project slug: '${slug}'`)
  }
  return [vcsType, org, repo]
}

/**
 * Percent-encodes each segment of a slug while keeping the `/` separators literal,
 * which is the form CircleCI expects in paths: `gh/acme/api` stays `gh/acme/api`,
 * `gh/acme/my repo` becomes `gh/acme/my%20repo`.
 */
export function encodeSlug(slug: string): string {
  return slug
    .split('/')
    .map((segment) => encodeURIComponent(segment))
    .join('/')
}
