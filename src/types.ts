/** DNS record types this service updates */
export type RecordType = 'A' | 'AAAA';

/** A resource record as returned by the provider after an update */
export interface ResourceRecord {
  id: string;
  name: string;
  type: RecordType;
  content: string;
  ttl: number;
  /** ISO timestamp of the provider's last change */
  lastChangeDate: string;
}

/** Validated parameters of one update call */
export interface UpdateRequest {
  domain: string;
  ipv4?: string;
  ipv6?: string;
  /** Requested TTL in seconds; the provider default is used when absent */
  ttl?: number;
}

/** Outcome of an update call, ready to be written as a plain-text response */
export interface UpdateResult {
  status: number;
  body: string;
}
