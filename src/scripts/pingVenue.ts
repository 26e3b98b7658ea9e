import 'dotenv/config';
import { loadConfig } from '../config';
import { logger } from '../logger';
import { createVenue } from '../runtime';

async function main(): Promise<void> {
  const cfg = loadConfig();
  const venue = createVenue(cfg);
  const symbol = cfg.symbolList[0] ?? 'BTCUSDT';
  const market = await venue.getIndicators(symbol);
  const balance = await venue.getBalance();
  logger.info(
    { venue: venue.id, symbol, price: market.price, indicators: Object.keys(market.indicators).length, balance: balance.balance },
    'venue reachable',
  );
}

main().catch((err) => {
  logger.error({ err }, 'venue ping failed');
  process.exit(1);
});
