#!/usr/bin/env node
import 'dotenv/config';
import { loadConfig } from './config.js';
import { runBatch } from './engine.js';
import { resolveTargets } from './jobs.js';
import { reportResult } from './report.js';
import { saveResults } from './storage.js';
import { formatDuration, toErrorMessage } from './utils.js';

type Command = 'run' | 'help';

const isCommand = (value: string | undefined): value is Command => value === 'run' || value === 'help';

async function main() {
  const arg = process.argv[2];
  const cmd: Command = isCommand(arg) ? arg : 'help';
  switch (cmd) {
    case 'run':
      await runScrape(process.argv.slice(3));
      break;
    case 'help':
    default:
      printHelp();
  }
}

async function runScrape(argv: string[]) {
  const config = loadConfig(argv);
  const targets = resolveTargets(config);
  const { workers, maxRetries, rateLimitMs } = config.scraper;
  console.log(
    `[scrape] ${targets.length} targets, ${workers} workers, rate ${formatDuration(rateLimitMs)}, retries ${maxRetries}` +
      (config.browser.enabled ? ', browser rendering' : '') +
      (config.proxies.enabled ? `, ${config.proxies.list.length} proxies` : '')
  );

  const summary = await runBatch({
    targets,
    config,
    onResult: (result) => reportResult(result, console)
  });

  const outPath = saveResults(summary.results, config.io);
  console.log(`[scrape] all targets processed. Success: ${summary.succeeded}, Failures: ${summary.failed}`);
  console.log(`[scrape] results saved to ${outPath}`);
}

function printHelp() {
  console.log('Usage:');
  console.log('  npm run scrape -- [options]   # Fetch every target and save the results');
  console.log('Options:');
  console.log('  --config <file>       JSON or YAML config file (or SCRAPER_CONFIG)');
  console.log('  --input <file>        Targets, one per line (default: built-in list)');
  console.log('  --output <file>       Output file (default: results.json)');
  console.log('  --format json|csv     Output format (default: json)');
  console.log('  --workers <n>         Concurrent workers (default: 3)');
  console.log('  --rate-limit <dur>    Minimum gap between attempts, e.g. 1s (default: 1s)');
  console.log('  --retries <n>         Retries per target (default: 3)');
  console.log('  --retry-delay <dur>   Backoff base, grows linearly (default: 2s)');
  console.log('  --timeout <dur>       Per-attempt deadline (default: 30s)');
  console.log('  --title-selector <s>  CSS selector for the title field (default: title)');
  console.log('  --heading-selector <s> CSS selector for the heading field (default: h1)');
  console.log('  --proxy               Route attempts through PROXY_LIST');
  console.log('  --browser             Render pages in Chromium before extracting');
  console.log('Env:');
  console.log('  WORKERS RATE_LIMIT MAX_RETRIES RETRY_DELAY TIMEOUT USER_AGENT');
  console.log('  INPUT_FILE OUTPUT_FILE OUTPUT_FORMAT');
  console.log('  PROXY_ENABLED PROXY_LIST PROXY_USERNAME PROXY_PASSWORD');
  console.log('  BROWSER_ENABLED CHROME_PATH');
}

main().catch((err) => {
  console.error(`[scrape] failed: ${toErrorMessage(err)}`);
  process.exit(1);
});
