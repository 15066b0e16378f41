/**
 * Analyze one pool from the command line
 *
 * Usage: npm run analyze -- <token> <pool> [blocks] [V2|V3]
 */

import { AnalysisService } from '../src/service';
import { validateDataSource, getConfig } from '../src/config/environment';
import { parseJobs } from '../src/config/jobs';
import { BASE_DECIMALS } from '../src/config/thresholds';
import { describeSummary } from '../src/services/analysis/SummaryBuilder';
import { formatMicroUsd, formatTokenAmount } from '../src/services/utils/PriceFormatter';

const TOP_PURCHASES = 10;

async function main() {
  const [token, pool, blocks, version] = process.argv.slice(2);
  if (!token || !pool) {
    console.log('Usage: npm run analyze -- <token> <pool> [blocks] [V2|V3]');
    process.exit(1);
  }

  const config = getConfig();
  validateDataSource(config);

  const jobs = parseJobs([
    {
      token,
      pool,
      ...(blocks ? { blocks: Number(blocks) } : {}),
      ...(version ? { version } : {}),
    },
  ]);

  const service = new AnalysisService({ config });
  try {
    const [outcome] = await service.runJobs(jobs);

    if (!outcome.ok) {
      console.log(`\n❌ Analysis failed (${outcome.code}): ${outcome.error}`);
      process.exitCode = 1;
      return;
    }

    const { result } = outcome;
    console.log('');
    for (const line of describeSummary(result.summary, result.pool, service.chain.baseSymbol)) {
      console.log(line);
    }

    const top = result.trades
      .filter((trade) => trade.isLargePurchase)
      .sort((a, b) => (b.baseAmountRaw > a.baseAmountRaw ? 1 : b.baseAmountRaw < a.baseAmountRaw ? -1 : 0))
      .slice(0, TOP_PURCHASES);

    if (top.length > 0) {
      console.log(`\n🐋 Top ${top.length} large purchases:\n`);
      for (const trade of top) {
        const ref = trade.refAmountMicro === null ? 'n/a' : formatMicroUsd(trade.refAmountMicro);
        console.log(`Block ${trade.blockNumber}  ${service.chain.explorerUrl}/tx/${trade.transactionHash}`);
        console.log(`  Buyer: ${trade.counterpartAddress}`);
        console.log(`  Spent: ${formatTokenAmount(trade.baseAmountRaw, BASE_DECIMALS)} ${service.chain.baseSymbol} (${ref})`);
        console.log('');
      }
    }
  } finally {
    await service.stop();
  }
}

main().catch((error) => {
  console.error('Error:', error);
  process.exit(1);
});
