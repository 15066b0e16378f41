/**
 * Inspect a pool's metadata and the current reference price
 *
 * Usage: npm run inspect -- <pool> [V2|V3]
 */

import { AnalysisService } from '../src/service';
import { validateDataSource, getConfig } from '../src/config/environment';
import { PoolVersion } from '../src/types/dex.types';
import { formatMicroUsd } from '../src/services/utils/PriceFormatter';

function parseVersion(value: string | undefined): PoolVersion | undefined {
  if (value === PoolVersion.V2 || value === PoolVersion.V3) return value;
  return undefined;
}

async function main() {
  const [pool, version] = process.argv.slice(2);
  if (!pool) {
    console.log('Usage: npm run inspect -- <pool> [V2|V3]');
    process.exit(1);
  }

  const config = getConfig();
  validateDataSource(config);

  const service = new AnalysisService({ config });
  try {
    const metadata = await service.resolver.resolve(pool, parseVersion(version));

    console.log(`\n📊 Pool ${metadata.address}\n`);
    console.log(`  Version: ${metadata.version} (${metadata.versionSource})`);
    console.log(`  Token0: ${metadata.symbol0} ${metadata.token0} (${metadata.decimals0} decimals)`);
    console.log(`  Token1: ${metadata.symbol1} ${metadata.token1} (${metadata.decimals1} decimals)`);
    if (metadata.feeTier !== null) {
      console.log(`  Fee: ${(metadata.feeTier / 10000).toFixed(2)}%`);
    }

    const latest = await service.transport.getLatestBlock();
    const sample = await service.oracle.referencePriceAt(latest);

    const { referencePool } = service.chain;
    console.log(`\n💵 Reference price at block ${latest}:`);
    console.log(`  Pool: ${referencePool.address} (${(referencePool.feeTier / 10000).toFixed(2)}%)`);
    console.log(sample ? `  ${formatMicroUsd(sample.priceMicro)} (${sample.source})` : '  unavailable');
  } finally {
    await service.stop();
  }
}

main().catch((error) => {
  console.error('Error:', error);
  process.exit(1);
});
