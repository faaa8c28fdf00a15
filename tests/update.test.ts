import { describe, it, expect, vi, type Mock } from 'vitest';
import { handleUpdate } from '../src/update.js';
import { parseAllowList, type AllowList } from '../src/allow-list.js';
import { DnsApiError } from '../src/errors.js';
import type { Logger } from '../src/logger.js';
import type { DnsRecordClient } from '../src/provider.js';
import type { RecordType, ResourceRecord } from '../src/types.js';

interface UpdateCall {
  name: string;
  type: RecordType;
  content: string;
  ttl?: number;
}

function createMockClient(
  failures: Partial<Record<RecordType, DnsApiError>> = {}
): DnsRecordClient & { calls: UpdateCall[] } {
  const calls: UpdateCall[] = [];

  return {
    calls,
    async findRecordId(name: string, type: RecordType) {
      return `${type}-${name}`;
    },
    async updateRecord(name, type, content, ttl) {
      calls.push({ name, type, content, ttl });
      const failure = failures[type];
      if (failure) throw failure;
      const record: ResourceRecord = {
        id: `${type}-${name}`,
        name,
        type,
        content,
        ttl: ttl !== undefined && ttl >= 60 ? ttl : 300,
        lastChangeDate: '2026-10-19T08:30:00Z',
      };
      return record;
    },
  };
}

type MockLogger = { [K in keyof Logger]: Mock<(message: string) => void> };

function createMockLogger(): MockLogger {
  return {
    debug: vi.fn<(message: string) => void>(),
    info: vi.fn<(message: string) => void>(),
    warn: vi.fn<(message: string) => void>(),
    error: vi.fn<(message: string) => void>(),
  };
}

const unrestricted: AllowList = { kind: 'unrestricted' };

function deps(
  client: DnsRecordClient = createMockClient(),
  allowList: AllowList = unrestricted
) {
  return { client, allowList, logger: createMockLogger() };
}

describe('handleUpdate', () => {
  describe('validation', () => {
    it.each([
      [{}],
      [{ domain: '' }],
      [{ domain: '   ' }],
      [{ ipv4: '203.0.113.5', ipv6: '2001:db8::5', ttl: '300' }],
      [{ domain: ['a.example.com', 'b.example.com'], ipv4: '203.0.113.5' }],
    ])('returns 400 when the domain is missing (%j)', async (params) => {
      const client = createMockClient();
      const result = await handleUpdate(params, deps(client));

      expect(result).toEqual({ status: 400, body: 'DynDNS target domain missing.' });
      expect(client.calls).toHaveLength(0);
    });

    it('returns 403 when the domain is not on the allow-list', async () => {
      const client = createMockClient();
      const d = deps(client, parseAllowList(['home.example.com']));

      const result = await handleUpdate(
        { domain: 'office.example.com', ipv4: '203.0.113.5' },
        d
      );

      expect(result).toEqual({
        status: 403,
        body: 'Requested DynDNS domain is not on the allowlist.',
      });
      expect(client.calls).toHaveLength(0);
      expect(d.logger.warn).toHaveBeenCalledWith(
        'Update request for office.example.com rejected, domain is not on the allowlist.'
      );
    });

    it('checks the allow-list before the addresses', async () => {
      const result = await handleUpdate(
        { domain: 'office.example.com' },
        deps(createMockClient(), parseAllowList(['home.example.com']))
      );

      expect(result.status).toBe(403);
    });

    it('accepts any domain when the allow-list is disabled', async () => {
      const result = await handleUpdate(
        { domain: 'anything.example.org', ipv4: '203.0.113.5' },
        deps(createMockClient(), parseAllowList(false))
      );

      expect(result.status).toBe(200);
    });

    it('matches allowed domains case-insensitively', async () => {
      const client = createMockClient();
      const result = await handleUpdate(
        { domain: 'Home.Example.com.', ipv4: '203.0.113.5' },
        deps(client, parseAllowList(['home.example.com']))
      );

      expect(result.status).toBe(200);
      expect(client.calls[0]!.name).toBe('home.example.com');
    });

    it.each([
      [{ domain: 'home.example.com', ipv4: '', ttl: '300' }],
      [{ domain: 'home.example.com', ttl: 'abc' }],
      [{ domain: 'home.example.com', ipv4: '', ipv6: '', ttl: '-1' }],
    ])('returns 400 when neither address is given (%j)', async (params) => {
      const d = deps();
      const result = await handleUpdate(params, d);

      expect(result).toEqual({
        status: 400,
        body: 'Neither a v4 nor a v6 address given.',
      });
      expect(d.logger.error).toHaveBeenCalledWith(
        'Update request for home.example.com received, but neither a v4 nor a v6 address given.'
      );
    });

    it('rejects a ttl that is not an integer', async () => {
      const client = createMockClient();
      const result = await handleUpdate(
        { domain: 'home.example.com', ipv4: '203.0.113.5', ttl: 'soon' },
        deps(client)
      );

      expect(result).toEqual({
        status: 400,
        body: 'Invalid request parameters: ttl: must be a non-negative integer number of seconds',
      });
      expect(client.calls).toHaveLength(0);
    });

    it('rejects a negative ttl', async () => {
      const result = await handleUpdate(
        { domain: 'home.example.com', ipv4: '203.0.113.5', ttl: '-5' },
        deps()
      );

      expect(result.status).toBe(400);
    });

    it('rejects addresses of the wrong family', async () => {
      const result = await handleUpdate(
        { domain: 'home.example.com', ipv4: '2001:db8::5', ipv6: '203.0.113.5' },
        deps()
      );

      expect(result).toEqual({
        status: 400,
        body:
          'Invalid request parameters: ipv4: must be an IPv4 address; ipv6: must be an IPv6 address',
      });
    });
  });

  describe('updates', () => {
    it('updates the A record and reports success', async () => {
      const client = createMockClient();
      const d = deps(client);

      const result = await handleUpdate(
        { domain: 'home.example.com', ipv4: '203.0.113.5' },
        d
      );

      expect(result).toEqual({
        status: 200,
        body: 'Successfully updated A record for home.example.com to 203.0.113.5',
      });
      expect(client.calls).toEqual([
        { name: 'home.example.com', type: 'A', content: '203.0.113.5', ttl: undefined },
      ]);
      expect(d.logger.info).toHaveBeenCalledWith(
        'Successfully updated A record for home.example.com: 203.0.113.5, TTL 300 at 2026-10-19T08:30:00Z'
      );
    });

    it('updates both families and passes the parsed ttl', async () => {
      const client = createMockClient();

      const result = await handleUpdate(
        {
          domain: 'home.example.com',
          ipv4: '203.0.113.5',
          ipv6: '2001:db8::5',
          ttl: '120',
        },
        deps(client)
      );

      expect(result).toEqual({
        status: 200,
        body: [
          'Successfully updated A record for home.example.com to 203.0.113.5',
          'Successfully updated AAAA record for home.example.com to 2001:db8::5',
        ].join('\n'),
      });
      expect(client.calls.map((c) => [c.type, c.ttl])).toEqual([
        ['A', 120],
        ['AAAA', 120],
      ]);
    });

    it('reports a failed family without stopping the other', async () => {
      const client = createMockClient({
        AAAA: new DnsApiError('provider', 500, 'internal error'),
      });
      const d = deps(client);

      const result = await handleUpdate(
        { domain: 'home.example.com', ipv4: '203.0.113.5', ipv6: '2001:db8::5' },
        d
      );

      expect(result).toEqual({
        status: 400,
        body: [
          'Successfully updated A record for home.example.com to 203.0.113.5',
          'Failed to update AAAA record: 500 - internal error',
        ].join('\n'),
      });
      expect(d.logger.error).toHaveBeenCalledWith(
        'Failed to update AAAA record for home.example.com with address 2001:db8::5 ' +
          'and TTL <default>: 500 - internal error'
      );
    });

    it('still updates AAAA when the A record does not exist', async () => {
      const client = createMockClient({
        A: new DnsApiError('not-found', 404, 'No matching record found.'),
      });

      const result = await handleUpdate(
        { domain: 'home.example.com', ipv4: '203.0.113.5', ipv6: '2001:db8::5' },
        deps(client)
      );

      expect(result.status).toBe(400);
      expect(result.body.split('\n')).toEqual([
        'Failed to update A record: 404 - No matching record found.',
        'Successfully updated AAAA record for home.example.com to 2001:db8::5',
      ]);
      expect(client.calls).toHaveLength(2);
    });

    it('logs the requested ttl on failure', async () => {
      const d = deps(
        createMockClient({
          A: new DnsApiError('ambiguous', 400, 'More than one matching record found, cannot continue.'),
        })
      );

      await handleUpdate(
        { domain: 'home.example.com', ipv4: '203.0.113.5', ttl: '90' },
        d
      );

      expect(d.logger.error).toHaveBeenCalledWith(
        'Failed to update A record for home.example.com with address 203.0.113.5 ' +
          'and TTL 90: 400 - More than one matching record found, cannot continue.'
      );
    });

    it.each([['59'], ['0']])(
      'logs the default ttl on failure when ttl %s is below the minimum',
      async (ttl) => {
        const d = deps(
          createMockClient({
            A: new DnsApiError('not-found', 404, 'No matching record found.'),
          })
        );

        await handleUpdate(
          { domain: 'home.example.com', ipv4: '203.0.113.5', ttl },
          d
        );

        expect(d.logger.error).toHaveBeenCalledWith(
          'Failed to update A record for home.example.com with address 203.0.113.5 ' +
            'and TTL <default>: 404 - No matching record found.'
        );
      }
    );

    it('rethrows errors that are not DNS API errors', async () => {
      const client = createMockClient();
      client.updateRecord = () => Promise.reject(new RangeError('boom'));

      await expect(
        handleUpdate({ domain: 'home.example.com', ipv4: '203.0.113.5' }, deps(client))
      ).rejects.toThrow('boom');
    });
  });
});
