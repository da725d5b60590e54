import type { FetchResult, Logger } from './types.js';
import { formatDuration, redactUrl } from './utils.js';

// Console line(s) for one finished target
export function reportResult(result: FetchResult, log: Logger) {
  if (!result.ok) {
    log.warn(`[scrape] fail: ${result.url}: ${result.error} (after ${result.retries} retries)`);
    return;
  }
  log.log(`[scrape] ok: ${result.url} in ${formatDuration(result.durationMs)} (retries: ${result.retries})`);
  const fields = Object.entries(result.extracted ?? {});
  if (fields.length > 0) {
    log.log('  extracted:');
    for (const [name, value] of fields) {
      log.log(`    ${name}: ${Array.isArray(value) ? value.join(' | ') : value}`);
    }
  }
  if (result.screenshot) log.log(`  screenshot: ${result.screenshot}`);
  if (result.identity.proxy) log.log(`  proxy: ${redactUrl(result.identity.proxy.url)}`);
}
