/**
 * Normalise a domain name as received from a client or the config file.
 *
 * Examples:
 * - `home.example.com` → `home.example.com`
 * - ` HOME.Example.com ` → `home.example.com`
 * - `home.example.com.` → `home.example.com`
 */
export function normalizeDomain(input: string): string {
  let domain = input.trim().toLowerCase();

  // Remove trailing dot (FQDN notation)
  if (domain.endsWith('.')) {
    domain = domain.slice(0, -1);
  }

  return domain;
}
