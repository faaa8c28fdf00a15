import type { RecordType, ResourceRecord } from './types.js';

/** Client for the two provider operations needed to update one record */
export interface DnsRecordClient {
  /** Resolve the provider ID of the single record matching name and type */
  findRecordId(name: string, type: RecordType): Promise<string>;
  /** Look up the record and replace its content (and TTL) */
  updateRecord(
    name: string,
    type: RecordType,
    content: string,
    ttl?: number
  ): Promise<ResourceRecord>;
}
