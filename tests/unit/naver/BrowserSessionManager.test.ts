import { describe, it, expect, beforeEach } from 'vitest';
import {
  BrowserSessionManager,
  toSessionCookies,
  type SessionSettings,
} from '../../../src/realestate/naver/BrowserSessionManager';
import { CrawlCancelledError, SessionInitError } from '../../../src/realestate/naver/errors';
import { STEALTH_INIT_SCRIPT } from '../../../src/realestate/naver/StealthProfile';
import { CrawlerConfigSchema } from '../../../src/types/CrawlerConfig';
import { FakePage } from '../../fakes/FakePage';
import { FakeLauncher } from '../../fakes/FakeBrowser';
import { createTestLogger, type RecordingLogger } from '../../fixtures/naverFixtures';

const ENTRY_URL = 'https://fin.land.naver.com/search';

function settings(overrides: Partial<SessionSettings> = {}): SessionSettings {
  return {
    ...CrawlerConfigSchema.parse({ cookies: { NNB: 'test-cookie', NACT: '1' } }),
    retryBaseDelayMs: 0,
    retryStepMs: 0,
    settleDelayMs: 0,
    ...overrides,
  };
}

describe('toSessionCookies', () => {
  it('should scope every cookie to the domain and root path', () => {
    expect(toSessionCookies({ NNB: 'test-cookie' }, '.naver.com')).toEqual([
      { name: 'NNB', value: 'test-cookie', domain: '.naver.com', path: '/' },
    ]);
  });
});

describe('BrowserSessionManager', () => {
  let logger: RecordingLogger;

  beforeEach(() => {
    logger = createTestLogger();
  });

  it('should open a stealth session with the configured cookies', async () => {
    const launcher = new FakeLauncher();
    const manager = new BrowserSessionManager(settings(), logger, launcher);

    const handle = await manager.open();

    expect(handle.attempt).toBe(1);
    expect(handle.page.url()).toBe(ENTRY_URL);
    const context = launcher.browsers[0].contexts[0];
    expect(context.initScripts).toEqual([STEALTH_INIT_SCRIPT]);
    expect(context.cookies).toEqual([
      { name: 'NNB', value: 'test-cookie', domain: '.naver.com', path: '/' },
      { name: 'NACT', value: '1', domain: '.naver.com', path: '/' },
    ]);
    expect(context.pages[0].defaultNavigationTimeout).toBe(60000);
    expect(context.pages[0].defaultTimeout).toBe(30000);
    expect(launcher.launches[0]).toMatchObject({ headless: true, firefoxUserPrefs: { 'dom.webdriver.enabled': false } });
    expect(launcher.browsers[0].contextOptions[0]).toMatchObject({ locale: 'ko-KR', timezoneId: 'Asia/Seoul' });
  });

  it('should pass chromium flags and the proxy for the chromium engine', async () => {
    const launcher = new FakeLauncher();
    const manager = new BrowserSessionManager(
      settings({ browserEngine: 'chromium', proxy: { server: 'http://proxy.local:8080', username: 'user' } }),
      logger,
      launcher
    );

    await manager.open();

    const options = launcher.launches[0];
    expect(options?.args).toContain('--disable-blink-features=AutomationControlled');
    expect(options?.firefoxUserPrefs).toBeUndefined();
    expect(options?.proxy).toEqual({ server: 'http://proxy.local:8080', username: 'user', password: undefined });
  });

  it('should warn when no cookies are configured', async () => {
    const launcher = new FakeLauncher();
    const manager = new BrowserSessionManager(settings({ cookies: {} }), logger, launcher);

    await manager.open();

    expect(launcher.browsers[0].contexts[0].cookies).toEqual([]);
    expect(logger.warn).toHaveBeenCalledWith('No authentication cookies configured');
  });

  it('should retry until a launch succeeds', async () => {
    const launcher = new FakeLauncher(2);
    const manager = new BrowserSessionManager(settings(), logger, launcher);

    const handle = await manager.open();

    expect(handle.attempt).toBe(3);
    expect(launcher.launches).toHaveLength(3);
    expect(logger.warn).toHaveBeenCalledWith('Browser session attempt failed', {
      attempt: 1,
      maxAttempts: 5,
      error: 'browser crashed',
    });
  });

  it('should treat a redirect to a 404 page as a failed attempt', async () => {
    const launcher = new FakeLauncher();
    let pagesMade = 0;
    launcher.pageFactory = () => {
      const page = new FakePage();
      if (pagesMade++ === 0) {
        page.redirect = () => 'https://fin.land.naver.com/404';
      }
      return page;
    };
    const manager = new BrowserSessionManager(settings(), logger, launcher);

    const handle = await manager.open();

    expect(handle.attempt).toBe(2);
    expect(launcher.events).toEqual(['launch', 'browser.close', 'launch']);
  });

  it('should fail with SessionInitError once every attempt failed', async () => {
    const launcher = new FakeLauncher(10);
    const manager = new BrowserSessionManager(settings({ maxLaunchAttempts: 3 }), logger, launcher);

    const error = await manager.open().catch((reason: unknown) => reason);

    expect(error).toBeInstanceOf(SessionInitError);
    expect(error).toMatchObject({
      kind: 'session-init',
      attempts: 3,
      message: 'Browser session could not be started after 3 attempt(s): browser crashed',
    });
    expect(launcher.launches).toHaveLength(3);
  });

  it('should wait base plus attempt times step between attempts', async () => {
    const launcher = new FakeLauncher(10);
    const manager = new BrowserSessionManager(
      settings({ maxLaunchAttempts: 3, retryBaseDelayMs: 5, retryStepMs: 3 }),
      logger,
      launcher
    );

    await manager.open().catch((reason: unknown) => reason);

    const waits = logger.info.mock.calls
      .filter(([message]) => message === 'Retrying browser session')
      .map(([, meta]) => meta);
    expect(waits).toEqual([
      { nextAttempt: 2, waitMs: 5 },
      { nextAttempt: 3, waitMs: 8 },
    ]);
  });

  it('should not launch when already cancelled', async () => {
    const launcher = new FakeLauncher();
    const manager = new BrowserSessionManager(settings(), logger, launcher);
    const controller = new AbortController();
    controller.abort();

    await expect(manager.open(controller.signal)).rejects.toBeInstanceOf(CrawlCancelledError);
    expect(launcher.launches).toHaveLength(0);
  });

  it('should close page, context and browser in order', async () => {
    const launcher = new FakeLauncher();
    const manager = new BrowserSessionManager(settings(), logger, launcher);
    const handle = await manager.open();

    await manager.close(handle);

    expect(launcher.events).toEqual(['launch', 'page.close', 'context.close', 'browser.close']);
  });

  it('should keep closing when one step fails', async () => {
    const launcher = new FakeLauncher();
    const manager = new BrowserSessionManager(settings(), logger, launcher);
    const handle = await manager.open();
    launcher.browsers[0].contexts[0].closeError = new Error('context gone');

    await expect(manager.close(handle)).resolves.toBeUndefined();

    expect(launcher.events).toEqual(['launch', 'page.close', 'context.close', 'browser.close']);
    expect(logger.warn).toHaveBeenCalledWith('Failed to close context', { error: 'context gone' });
  });
});
