import { z } from 'zod';
import { HOSTING_DE_API, MIN_TTL, RECORD_COMMENT } from '../constants.js';
import { DnsApiError } from '../errors.js';
import type { DnsRecordClient } from '../provider.js';
import type { RecordType, ResourceRecord } from '../types.js';

export interface HostingDeOptions {
  authToken: string;
  /** Zone the records live in, e.g. `example.com` */
  zoneName: string;
  /** TTL used when the caller gives none, or one below the provider minimum */
  defaultTtl: number;
  /** Override the API base URL (defaults to the public hosting.de endpoint) */
  apiUrl?: string;
}

const apiMessageSchema = z.object({
  code: z.number().int(),
  text: z.string(),
  value: z.union([z.string(), z.number()]).nullish(),
});

const envelopeSchema = z.object({
  errors: z.array(apiMessageSchema).optional(),
  response: z.unknown(),
});

const recordRefSchema = z
  .object({ id: z.string().nullish() })
  .passthrough();

const findResultSchema = z.object({
  data: z.array(recordRefSchema),
});

const updateResultSchema = z.object({
  records: z.array(recordRefSchema).default([]),
});

const resourceRecordSchema = z.object({
  id: z.string(),
  name: z.string(),
  type: z.enum(['A', 'AAAA']),
  content: z.string(),
  ttl: z.number().int(),
  lastChangeDate: z.string(),
});

async function hostingDeRequest<T>(
  apiUrl: string,
  endpoint: string,
  payload: Record<string, unknown>,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>
): Promise<T> {
  const headers = new Headers();
  headers.set('Content-Type', 'application/json');
  headers.set('Accept', 'application/json');

  let status: number;
  let text: string;
  try {
    const res = await fetch(`${apiUrl}/${endpoint}`, {
      method: 'POST',
      headers,
      body: JSON.stringify(payload),
    });
    status = res.status;
    text = await res.text();
  } catch (err) {
    throw new DnsApiError(
      'transport',
      502,
      `Request to ${endpoint} failed: ${err instanceof Error ? err.message : String(err)}`
    );
  }

  const json = parseJson(text);

  if (status !== 200) {
    const detail = typeof json === 'object' && json !== null ? json : text;
    throw new DnsApiError('http', status, detail);
  }

  const envelope = envelopeSchema.safeParse(json);
  if (!envelope.success) {
    throw new DnsApiError(
      'malformed',
      502,
      `Unexpected response from ${endpoint}`
    );
  }

  // hosting.de answers failed transactions with HTTP 200 and an `errors` list.
  // One transaction per request, so any entry means the whole call failed.
  const first = envelope.data.errors?.[0];
  if (first) {
    const message = first.value ? `${first.value} - ${first.text}` : first.text;
    throw new DnsApiError('provider', first.code, message);
  }

  const result = schema.safeParse(envelope.data.response);
  if (!result.success) {
    throw new DnsApiError(
      'malformed',
      502,
      `Unexpected response payload from ${endpoint}`
    );
  }
  return result.data;
}

function parseJson(text: string): unknown {
  try {
    const value: unknown = JSON.parse(text);
    return value;
  } catch {
    return undefined;
  }
}

/**
 * Create a hosting.de DNS record client.
 *
 * Uses the hosting.de DNS JSON API with native `fetch` (Node 18+). Every
 * update is a `recordsFind` for the record ID followed by a `recordsUpdate`.
 */
export function hostingDe(options: HostingDeOptions): DnsRecordClient {
  const { authToken, zoneName, defaultTtl } = options;
  const apiUrl = options.apiUrl ?? HOSTING_DE_API;

  if (!authToken) {
    throw new Error('hosting.de: authToken is required');
  }
  if (!zoneName) {
    throw new Error('hosting.de: zoneName is required');
  }

  function apiRequest<T>(
    endpoint: string,
    payload: Record<string, unknown>,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>
  ) {
    return hostingDeRequest(apiUrl, endpoint, { authToken, ...payload }, schema);
  }

  async function findRecordId(name: string, type: RecordType): Promise<string> {
    const result = await apiRequest(
      'recordsFind',
      {
        filter: {
          subFilterConnective: 'AND',
          subFilter: [
            { field: 'RecordName', value: name },
            { field: 'RecordType', value: type },
          ],
        },
      },
      findResultSchema
    );

    const [match, ...rest] = result.data;
    if (!match) {
      throw new DnsApiError('not-found', 404, 'No matching record found.');
    }
    if (rest.length > 0) {
      throw new DnsApiError(
        'ambiguous',
        400,
        'More than one matching record found, cannot continue.'
      );
    }
    if (!match.id) {
      throw new DnsApiError(
        'malformed',
        404,
        'Could not find ID for record in response.'
      );
    }

    return match.id;
  }

  return {
    findRecordId,

    async updateRecord(
      name: string,
      type: RecordType,
      content: string,
      ttl?: number
    ): Promise<ResourceRecord> {
      const id = await findRecordId(name, type);

      const result = await apiRequest(
        'recordsUpdate',
        {
          zoneName,
          recordsToModify: [
            {
              id,
              name,
              type,
              content,
              comments: RECORD_COMMENT,
              // Values below the provider minimum fall back to the default
              ttl: ttl !== undefined && ttl >= MIN_TTL ? ttl : defaultTtl,
            },
          ],
        },
        updateResultSchema
      );

      const matches = result.records.filter((r) => r.id === id);
      if (matches.length === 0) {
        throw new DnsApiError(
          'inconsistent',
          500,
          'Update succeeded, but failed to find updated record in success response.'
        );
      }
      if (matches.length > 1) {
        throw new DnsApiError(
          'inconsistent',
          500,
          'Update succeeded, but found more than one result in success response.'
        );
      }

      const record = resourceRecordSchema.safeParse(matches[0]);
      if (!record.success) {
        throw new DnsApiError(
          'malformed',
          502,
          'Updated record in success response is incomplete.'
        );
      }
      return record.data;
    },
  };
}
