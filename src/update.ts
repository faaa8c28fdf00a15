import { isIPv4, isIPv6 } from 'node:net';
import { z } from 'zod';
import { isDomainAllowed, type AllowList } from './allow-list.js';
import {
  DOMAIN_FORBIDDEN_MESSAGE,
  DOMAIN_MISSING_MESSAGE,
  MIN_TTL,
  NO_ADDRESS_MESSAGE,
} from './constants.js';
import { normalizeDomain } from './domain.js';
import { DnsApiError } from './errors.js';
import type { Logger } from './logger.js';
import type { DnsRecordClient } from './provider.js';
import type { RecordType, UpdateRequest, UpdateResult } from './types.js';

export interface UpdateDeps {
  client: DnsRecordClient;
  allowList: AllowList;
  logger: Logger;
}

const TTL_MESSAGE = 'must be a non-negative integer number of seconds';

// Query parameters arrive as strings; an empty value means "not given".
const emptyToUndefined = (value: unknown) => (value === '' ? undefined : value);

const updateParamsSchema = z.object({
  ipv4: z.preprocess(
    emptyToUndefined,
    z
      .string({ invalid_type_error: 'must be an IPv4 address' })
      .refine(isIPv4, 'must be an IPv4 address')
      .optional()
  ),
  ipv6: z.preprocess(
    emptyToUndefined,
    z
      .string({ invalid_type_error: 'must be an IPv6 address' })
      .refine(isIPv6, 'must be an IPv6 address')
      .optional()
  ),
  ttl: z.preprocess(
    (value) =>
      typeof value === 'string' && /^\d+$/.test(value.trim())
        ? Number(value.trim())
        : emptyToUndefined(value),
    z
      .number({ invalid_type_error: TTL_MESSAGE })
      .int(TTL_MESSAGE)
      .nonnegative(TTL_MESSAGE)
      .optional()
  ),
});

/**
 * Handle one DynDNS update call.
 *
 * 1. Rejects calls without a domain (400) or for a domain outside the allow-list (403)
 * 2. Requires at least one address, then validates `ipv4`, `ipv6` and `ttl` (400)
 * 3. Updates the A record for `ipv4` and the AAAA record for `ipv6`, independently
 * 4. Returns one line per address family; status 400 if any family failed
 */
export async function handleUpdate(
  params: Record<string, unknown>,
  deps: UpdateDeps
): Promise<UpdateResult> {
  const { allowList, logger } = deps;

  const domain =
    typeof params.domain === 'string' ? normalizeDomain(params.domain) : '';
  if (!domain) {
    logger.warn('Update request received without a target domain.');
    return { status: 400, body: DOMAIN_MISSING_MESSAGE };
  }

  if (!isDomainAllowed(allowList, domain)) {
    logger.warn(`Update request for ${domain} rejected, domain is not on the allowlist.`);
    return { status: 403, body: DOMAIN_FORBIDDEN_MESSAGE };
  }

  if (
    emptyToUndefined(params.ipv4) === undefined &&
    emptyToUndefined(params.ipv6) === undefined
  ) {
    logger.error(
      `Update request for ${domain} received, but neither a v4 nor a v6 address given.`
    );
    return { status: 400, body: NO_ADDRESS_MESSAGE };
  }

  const parsed = updateParamsSchema.safeParse(params);
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    logger.warn(`Update request for ${domain} rejected: ${problems}`);
    return { status: 400, body: `Invalid request parameters: ${problems}` };
  }

  const request: UpdateRequest = { domain, ...parsed.data };

  const lines: string[] = [];
  let status = 200;

  const families: [RecordType, string | undefined][] = [
    ['A', request.ipv4],
    ['AAAA', request.ipv6],
  ];

  for (const [type, address] of families) {
    if (!address) continue;
    const outcome = await updateFamily(request, type, address, deps);
    lines.push(outcome.line);
    if (!outcome.ok) status = 400;
  }

  return { status, body: lines.join('\n') };
}

async function updateFamily(
  request: UpdateRequest,
  type: RecordType,
  address: string,
  { client, logger }: UpdateDeps
): Promise<{ ok: boolean; line: string }> {
  try {
    const record = await client.updateRecord(request.domain, type, address, request.ttl);
    logger.info(
      `Successfully updated ${type} record for ${record.name}: ` +
        `${record.content}, TTL ${record.ttl} at ${record.lastChangeDate}`
    );
    return {
      ok: true,
      line: `Successfully updated ${type} record for ${record.name} to ${record.content}`,
    };
  } catch (err) {
    if (!(err instanceof DnsApiError)) throw err;
    logger.error(
      `Failed to update ${type} record for ${request.domain} with address ${address} ` +
        `and TTL ${effectiveTtl(request.ttl)}: ${err.message}`
    );
    return { ok: false, line: `Failed to update ${type} record: ${err.message}` };
  }
}

// Mirrors the client: anything below the provider minimum is sent as the default.
function effectiveTtl(ttl: number | undefined): number | string {
  return ttl !== undefined && ttl >= MIN_TTL ? ttl : '<default>';
}
