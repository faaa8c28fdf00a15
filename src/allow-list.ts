import { normalizeDomain } from './domain.js';
import { ConfigError } from './errors.js';

/** Which domains the update endpoint may touch */
export type AllowList =
  | { kind: 'unrestricted' }
  | { kind: 'restricted'; domains: ReadonlySet<string> };

/**
 * Build an allow-list from the configured `allowed_domains` value.
 *
 * `false`, a missing value or an empty list allow every domain; a list of
 * domain names restricts updates to those names.
 */
export function parseAllowList(value: unknown): AllowList {
  if (value === undefined || value === false) {
    return { kind: 'unrestricted' };
  }

  if (!Array.isArray(value)) {
    throw new ConfigError(
      'allowed_domains has to be a list or false to allow all domains.'
    );
  }

  const domains = new Set<string>();
  for (const entry of value) {
    if (typeof entry !== 'string' || !normalizeDomain(entry)) {
      throw new ConfigError(
        `allowed_domains entries have to be domain names, got ${JSON.stringify(entry)}`
      );
    }
    domains.add(normalizeDomain(entry));
  }

  if (domains.size === 0) {
    return { kind: 'unrestricted' };
  }
  return { kind: 'restricted', domains };
}

export function isDomainAllowed(allowList: AllowList, domain: string): boolean {
  if (allowList.kind === 'unrestricted') return true;
  return allowList.domains.has(normalizeDomain(domain));
}
