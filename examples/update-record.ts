/**
 * Live test: update one record through the hosting.de API.
 *
 * Usage:
 *   HOSTING_DE_TOKEN=xxx npx tsx examples/update-record.ts <zone> <name> <A|AAAA> <address> [ttl]
 */

import { hostingDe, type RecordType } from '../src/index.js';

const [zone, name, type, address, ttl] = process.argv.slice(2);
const authToken = process.env.HOSTING_DE_TOKEN;

function isRecordType(value: string | undefined): value is RecordType {
  return value === 'A' || value === 'AAAA';
}

async function main() {
  if (!zone || !name || !isRecordType(type) || !address) {
    console.error(
      'Usage: HOSTING_DE_TOKEN=xxx npx tsx examples/update-record.ts <zone> <name> <A|AAAA> <address> [ttl]'
    );
    process.exit(1);
  }

  if (!authToken) {
    console.error('Missing HOSTING_DE_TOKEN environment variable.');
    process.exit(1);
  }

  const client = hostingDe({ authToken, zoneName: zone, defaultTtl: 300 });

  console.log(`\nLooking up ${type} record for ${name}...`);
  const id = await client.findRecordId(name, type);
  console.log(`Found record ${id}`);

  const record = await client.updateRecord(
    name,
    type,
    address,
    ttl ? Number(ttl) : undefined
  );
  console.log(
    `\nDone! ${record.type} ${record.name} -> ${record.content} (TTL ${record.ttl}, changed ${record.lastChangeDate})`
  );
}

main().catch((err) => {
  console.error('\nError:', err instanceof Error ? err.message : String(err));
  process.exit(1);
});
