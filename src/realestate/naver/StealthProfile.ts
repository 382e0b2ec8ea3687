import type { BrowserContextOptions, LaunchOptions } from 'playwright-core';
import type { CrawlerConfig } from '../../types/CrawlerConfig';

export type BrowserEngine = CrawlerConfig['browserEngine'];

const FIREFOX_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64; rv:109.0) Gecko/20100101 Firefox/115.0';
const CHROMIUM_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36';

/** Seoul city hall */
const SEOUL_GEOLOCATION = { latitude: 37.5665, longitude: 126.978 };

/**
 * Firefox preferences that hide automation and close WebRTC leaks
 */
const FIREFOX_USER_PREFS: Record<string, string | number | boolean> = {
  'dom.webdriver.enabled': false,
  useAutomationExtension: false,
  'media.peerconnection.enabled': false,
  'media.webrtc.hw.h264.enabled': false,
  'webgl.disabled': true,
  'general.useragent.override': FIREFOX_USER_AGENT,
  'devtools.console.stdout.chrome': false,
  'devtools.debugger.remote-enabled': false,
  'plugins.testmode': false,
  'privacy.resistFingerprinting': true,
  'privacy.trackingprotection.enabled': true,
  'browser.cache.disk.enable': false,
  'browser.cache.memory.enable': true,
  'places.history.enabled': false,
};

const CHROMIUM_ARGS = [
  '--disable-blink-features=AutomationControlled',
  '--force-webrtc-ip-handling-policy=disable_non_proxied_udp',
  '--disable-dev-shm-usage',
  '--no-first-run',
];

/**
 * Runs in every page before the site's own scripts
 */
export const STEALTH_INIT_SCRIPT = `
Object.defineProperty(navigator, 'webdriver', { get: () => undefined });
window.chrome = { runtime: {}, loadTimes: function () {}, csi: function () {} };
Object.defineProperty(navigator, 'plugins', { get: () => [1, 2, 3, 4, 5] });
Object.defineProperty(navigator, 'languages', { get: () => ['ko-KR', 'ko', 'en-US', 'en'] });
const originalQuery = window.navigator.permissions && window.navigator.permissions.query;
if (originalQuery) {
  window.navigator.permissions.query = (parameters) =>
    parameters.name === 'notifications'
      ? Promise.resolve({ state: Notification.permission })
      : originalQuery.call(window.navigator.permissions, parameters);
}
`;

export function userAgentFor(engine: BrowserEngine): string {
  return engine === 'firefox' ? FIREFOX_USER_AGENT : CHROMIUM_USER_AGENT;
}

/**
 * Launch options for the chosen engine, with automation fingerprints suppressed
 */
export function buildLaunchOptions(config: Pick<CrawlerConfig, 'browserEngine' | 'headless' | 'proxy'>): LaunchOptions {
  const options: LaunchOptions = { headless: config.headless };

  if (config.browserEngine === 'firefox') {
    options.firefoxUserPrefs = { ...FIREFOX_USER_PREFS };
  } else {
    options.args = [...CHROMIUM_ARGS];
  }

  if (config.proxy) {
    options.proxy = {
      server: config.proxy.server,
      username: config.proxy.username,
      password: config.proxy.password,
    };
  }

  return options;
}

/**
 * Desktop Korean browsing profile: viewport, ko-KR locale, Asia/Seoul timezone
 */
export function buildContextOptions(engine: BrowserEngine): BrowserContextOptions {
  return {
    userAgent: userAgentFor(engine),
    viewport: { width: 1920, height: 1080 },
    locale: 'ko-KR',
    timezoneId: 'Asia/Seoul',
    extraHTTPHeaders: {
      Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,image/avif,image/webp,*/*;q=0.8',
      'Accept-Language': 'ko-KR,ko;q=0.8,en-US;q=0.5,en;q=0.3',
      'Upgrade-Insecure-Requests': '1',
      'Sec-Fetch-Dest': 'document',
      'Sec-Fetch-Mode': 'navigate',
      'Sec-Fetch-Site': 'none',
      'Cache-Control': 'max-age=0',
    },
    permissions: ['geolocation'],
    geolocation: SEOUL_GEOLOCATION,
    javaScriptEnabled: true,
  };
}
