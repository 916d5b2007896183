import { Redis } from 'ioredis';
import { Authorizations, RedisCardinalityStore, exactRange, rangeBetween } from '@cardinal/core';
import { CardinalityAggregator, IndexSelector, ProbeSpec, loadConfig } from '@cardinal/aggregator';
import { TABLE, seed } from './seed';

async function main() {
  const client = new Redis(process.env.REDIS_URL ?? 'redis://localhost:6379');
  const store = new RedisCardinalityStore({ client });
  const config = await loadConfig(process.env.CARDINAL_CONFIG ? { file: process.env.CARDINAL_CONFIG } : {});
  const aggregator = CardinalityAggregator.fromConfig(store, config);
  const selector = new IndexSelector({ aggregator, store, session: config.session });

  try {
    await seed(store);
    console.log('\n=== Cardinal + Redis Example ===\n');

    // WHERE firstname BETWEEN 'a' AND 'c' AND city = 'lima'
    const probes = () => [
      new ProbeSpec({ column: 'firstname', family: 'cf_firstname', ranges: [rangeBetween('a', 'c')] }),
      new ProbeSpec({ column: 'city', family: 'cf_city', ranges: [exactRange('lima')] }),
    ];

    for (const auths of [Authorizations.EMPTY, new Authorizations('private')]) {
      const selection = await selector.select({ ...TABLE, auths, probes: probes() });
      console.log(`Authorizations {${auths}}:`);
      for (const [cardinality, probe] of selection.ranked.entries()) {
        console.log(`  ${probe.column}: ${cardinality}`);
      }
      console.log(
        selection.useIndex && selection.probe
          ? `  -> index scan on ${selection.probe.column} (${(selection.ratio * 100).toFixed(1)}% of ${selection.numRows} rows)\n`
          : '  -> full table scan\n'
      );
    }

    console.log('Cache stats:', aggregator.cardinalityCache.stats());
  } finally {
    aggregator.shutdown();
    client.disconnect();
  }
}

main().catch((e) => {
  console.error(e);
  process.exit(1);
});
