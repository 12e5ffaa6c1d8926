/**
 * CHECK ADDRESS
 * =============
 * Fetch one snapshot for an address and print it, without notifying anyone.
 * Handy for verifying the address and network before starting the monitor.
 *
 * Run with: npm run check -- 0xYourAddress
 */

import 'dotenv/config';
import { HyperliquidAPI } from '../src/api/hyperliquid-api';
import { API_URLS, DEFAULTS } from '../src/config';
import { createSnapshot, sortedPositions } from '../src/polling';
import { classifyError, errorMessage } from '../src/utils';

async function checkAddress() {
  const address = process.argv[2] ?? process.env.HYPERLIQUID_ADDRESS;
  const isTestnet = (process.env.USE_TESTNET ?? '').toLowerCase() === 'true';

  if (!address) {
    console.log('⚠️  No address given');
    console.log('   Pass one as an argument or set HYPERLIQUID_ADDRESS in .env');
    process.exitCode = 1;
    return;
  }

  const api = new HyperliquidAPI({ baseUrl: isTestnet ? API_URLS.testnet : API_URLS.mainnet });

  console.log(`🔍 Checking ${address} on ${isTestnet ? 'TESTNET' : 'MAINNET'}`);
  console.log('');

  try {
    const startTime = Date.now();
    const [positions, fills] = await Promise.all([
      api.fetchPositions(address),
      api.fetchFills(address, DEFAULTS.fillsLimit),
    ]);
    const snapshot = createSnapshot(positions, fills);

    console.log(`✅ Snapshot fetched in ${Date.now() - startTime}ms`);
    console.log('');

    console.log(`📊 Open positions: ${snapshot.positions.size}`);
    for (const pos of sortedPositions(snapshot)) {
      const pnl = pos.unrealizedPnl >= 0 ? `+${pos.unrealizedPnl.toFixed(2)}` : pos.unrealizedPnl.toFixed(2);
      console.log(`   ${pos.side.padEnd(5)} ${String(pos.size).padEnd(12)} ${pos.asset.padEnd(8)} @ $${pos.entryPrice} (${pos.leverage}x) | PnL ${pnl}`);
    }
    console.log('');

    console.log(`🧾 Recent fills: ${snapshot.fills.length}`);
    for (const fill of snapshot.fills.slice(0, 5)) {
      const emoji = fill.side === 'BUY' ? '🟢' : '🔴';
      console.log(`   ${emoji} ${new Date(fill.timestampMillis).toISOString()} ${fill.side} ${fill.size} ${fill.asset} @ $${fill.price}`);
    }
    if (snapshot.fills.length > 5) {
      console.log(`   ... and ${snapshot.fills.length - 5} more`);
    }
  } catch (error) {
    console.error('❌ Check failed!');
    console.error(`   Error Type: ${classifyError(error)}`);
    console.error(`   Message: ${errorMessage(error)}`);
    process.exitCode = 1;
  } finally {
    await api.close();
  }
}

checkAddress().catch((error) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
