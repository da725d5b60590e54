import { BrowserFetchStrategy, type BrowserLauncher } from './browser.js';
import type { AppConfig } from './config.js';
import { Extractor } from './extract.js';
import { DirectFetchStrategy } from './http.js';
import type { FetchStrategy } from './types.js';

export function createFetchStrategy(
  config: Pick<AppConfig, 'extraction' | 'browser'>,
  launch?: BrowserLauncher
): FetchStrategy {
  const extractor = new Extractor(config.extraction);
  if (!config.browser.enabled) return new DirectFetchStrategy(extractor);
  const { headless, userAgent, waitTimeMs, screenshot, screenshotDir, executablePath } = config.browser;
  return new BrowserFetchStrategy(
    extractor,
    { headless, userAgent, waitTimeMs, screenshot, screenshotDir, executablePath },
    launch
  );
}
