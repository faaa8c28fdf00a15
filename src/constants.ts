/** Base URL of the hosting.de DNS JSON API */
export const HOSTING_DE_API = 'https://secure.hosting.de/api/dns/v1/json';

/** Lowest TTL hosting.de accepts, in seconds */
export const MIN_TTL = 60;

/** Comment attached to every record this service writes */
export const RECORD_COMMENT =
  'DynDNS Record - automatically managed, do not change!';

/** Path the update endpoint is served on */
export const UPDATE_PATH = '/dyndns';

export const DOMAIN_MISSING_MESSAGE = 'DynDNS target domain missing.';
export const DOMAIN_FORBIDDEN_MESSAGE =
  'Requested DynDNS domain is not on the allowlist.';
export const NO_ADDRESS_MESSAGE = 'Neither a v4 nor a v6 address given.';
