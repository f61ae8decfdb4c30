/**
 * Market feed demo — a fast quote producer and a consumer that drains
 * once per tick, printed side by side for OHLC, mean and mode conflators.
 *
 * Usage: npx tsx src/demo/market-feed.ts
 */

import {
  createModeConflator,
  createMeanConflator,
  createOhlcConflator,
} from '../policies/index.js';
import { encodeBatch } from '../core/codec.js';

const SYMBOLS = ['ACME', 'GLOBEX', 'INITECH'];
const QUOTES_PER_TICK = 250;
const TICKS = 4;

function log(msg: string): void {
  console.log(`  ${msg}`);
}

function header(title: string): void {
  console.log(`\n${'─'.repeat(60)}`);
  console.log(`  ${title}`);
  console.log(`${'─'.repeat(60)}`);
}

/** Deterministic price walk so runs are comparable. */
function createFeed(seed: number): () => { symbol: string; price: number } {
  let state = seed;
  const prices = new Map(SYMBOLS.map((s, i): [string, number] => [s, 100 + i * 25]));
  return () => {
    state = (state * 48271) % 2147483647;
    const symbol = SYMBOLS[state % SYMBOLS.length];
    const step = ((state >> 8) % 21) - 10;
    const price = Math.max(1, (prices.get(symbol) ?? 100) + step / 100);
    prices.set(symbol, price);
    return { symbol, price: Math.round(price * 100) / 100 };
  };
}

function main(): void {
  console.log('╔══════════════════════════════════════════════════════════════╗');
  console.log('║                  Conflator Market Feed Demo                  ║');
  console.log('╚══════════════════════════════════════════════════════════════╝');

  const next = createFeed(42);
  const bars = createOhlcConflator<string>();
  const averages = createMeanConflator<string>();
  const modal = createModeConflator<string, number>();

  for (let tick = 0; tick < TICKS; tick++) {
    for (let i = 0; i < QUOTES_PER_TICK; i++) {
      const { symbol, price } = next();
      bars.set(symbol, price);
      averages.set(symbol, price);
      modal.set(symbol, price);
    }

    header(`Tick ${tick}: ${bars.toString()}`);
    const batch = bars.drain();
    for (const [symbol, bar] of batch.items) {
      const mean = averages.get(symbol).toFixed(2);
      const mode = modal.get(symbol);
      log(
        `${symbol.padEnd(8)} O ${bar.open.toFixed(2)}  H ${bar.high.toFixed(2)}  ` +
        `L ${bar.low.toFixed(2)}  C ${bar.close.toFixed(2)}  ` +
        `mean ${mean}  mode ${mode.value.toFixed(2)}×${mode.count}`,
      );
    }
    averages.reset();
    modal.reset();
    log(`encoded bars: ${encodeBatch(batch).length} bytes`);
  }

  header('Summary');
  const stats = bars.stats();
  log(`${stats.writes} writes over ${stats.resets} intervals`);
  log(`conflation ratio: ${(stats.conflationRatio * 100).toFixed(1)}%`);
}

main();
