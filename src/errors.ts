/**
 * Where a DNS API failure originated.
 *
 * - `http`: the API answered with a status other than 200
 * - `provider`: status 200, but the response carried an `errors` list
 * - `transport`: the request never got an answer
 * - `not-found` / `ambiguous`: the record lookup did not yield exactly one match
 * - `malformed`: the response was missing data we rely on
 * - `inconsistent`: the update succeeded but its response did not contain the record
 */
export type DnsApiErrorKind =
  | 'http'
  | 'provider'
  | 'transport'
  | 'not-found'
  | 'ambiguous'
  | 'malformed'
  | 'inconsistent';

/** Error body as sent by the API: parsed JSON when possible, raw text otherwise */
export type DnsApiErrorDetail = string | object;

export class DnsApiError extends Error {
  readonly code: number;
  readonly detail: DnsApiErrorDetail;
  readonly kind: DnsApiErrorKind;

  constructor(kind: DnsApiErrorKind, code: number, detail: DnsApiErrorDetail) {
    super(`${code} - ${formatDetail(detail)}`);
    this.name = 'DnsApiError';
    this.kind = kind;
    this.code = code;
    this.detail = detail;
  }

  override toString(): string {
    return this.message;
  }
}

/** Invalid or unreadable configuration; fatal at startup */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

function formatDetail(detail: DnsApiErrorDetail): string {
  return typeof detail === 'string' ? detail : JSON.stringify(detail);
}
