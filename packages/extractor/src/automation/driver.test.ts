import { AutomationDriver } from './driver';
import { FakeBrowserSession, FakeLauncher, element } from './__tests__/fake-browser';

const PAGE = 'https://example.com/live';

function createDriver(session: FakeBrowserSession = new FakeBrowserSession()) {
  const launcher = new FakeLauncher(() => session);
  const driver = new AutomationDriver({ launcher, navigationSettleMs: 0, clickSettleMs: 0 });
  return { driver, launcher, session };
}

describe('AutomationDriver', () => {
  describe('initialize', () => {
    it('should launch headless with a fixed viewport and sandbox disabled', async () => {
      const { driver, launcher } = createDriver();

      await expect(driver.initialize()).resolves.toBe(true);

      expect(launcher.launches).toHaveLength(1);
      expect(launcher.launches[0].headless).toBe(true);
      expect(launcher.launches[0].viewport).toEqual({ width: 1920, height: 1080 });
      expect(launcher.launches[0].args).toContain('--no-sandbox');
      expect(launcher.launches[0].args).toContain('--disable-gpu');
      expect(driver.isActive).toBe(true);
    });

    it('should return false without launching when the browser is unavailable', async () => {
      const launcher = new FakeLauncher(() => new FakeBrowserSession(), { available: false, detail: 'missing' });
      const driver = new AutomationDriver({ launcher });

      await expect(driver.initialize()).resolves.toBe(false);
      await expect(driver.navigate(PAGE)).resolves.toBe(false);

      expect(launcher.launches).toHaveLength(0);
      expect(driver.isAvailable).toBe(false);
      expect(driver.lastError).toBe('CAPABILITY_UNAVAILABLE');
    });

    it('should return false when the process fails to start', async () => {
      const { driver, launcher } = createDriver();
      launcher.launchError = new Error('spawn ENOENT');

      await expect(driver.initialize()).resolves.toBe(false);
      expect(driver.isActive).toBe(false);
      expect(driver.lastError).toBe('AUTOMATION_LAUNCH_FAILED');
    });
  });

  describe('navigate', () => {
    it('should launch lazily on first navigation', async () => {
      const { driver, launcher, session } = createDriver();

      await expect(driver.navigate(PAGE)).resolves.toBe(true);
      await expect(driver.navigate('https://example.com/other')).resolves.toBe(true);

      expect(launcher.launches).toHaveLength(1);
      expect(session.calls).toEqual(['goto https://example.com/live', 'goto https://example.com/other']);
    });

    it('should report navigation failures', async () => {
      const session = new FakeBrowserSession().failOn('goto', new Error('page crashed'));
      const { driver } = createDriver(session);

      await expect(driver.navigate(PAGE)).resolves.toBe(false);
      expect(driver.lastError).toBe('AUTOMATION_NAVIGATION_FAILED');
    });

    it('should classify DNS failures', async () => {
      const session = new FakeBrowserSession().failOn('goto', new Error('page.goto: net::ERR_NAME_NOT_RESOLVED at https://nowhere.invalid/'));
      const { driver } = createDriver(session);

      await expect(driver.navigate('https://nowhere.invalid/')).resolves.toBe(false);
      expect(driver.lastError).toBe('FETCH_DNS');
    });
  });

  describe('primitives', () => {
    it('should click a clickable element', async () => {
      const session = new FakeBrowserSession({ [PAGE]: { clickable: ['#play'] } });
      const { driver } = createDriver(session);
      await driver.navigate(PAGE);

      await expect(driver.clickElement('#play')).resolves.toBe(true);
      await expect(driver.clickElement('#missing', 100)).resolves.toBe(false);
      expect(driver.lastError).toBe('AUTOMATION_TIMEOUT');
    });

    it('should fail soft when no session exists', async () => {
      const { driver } = createDriver();

      await expect(driver.clickElement('#play')).resolves.toBe(false);
      await expect(driver.executeScript('return 1')).resolves.toBeNull();
      await expect(driver.getPageSource()).resolves.toBeNull();
      await expect(driver.getElements('video')).resolves.toEqual([]);
      await expect(driver.takeScreenshot('/tmp/shot.png')).resolves.toBe(false);
    });

    it('should run a scroll script for each known direction', async () => {
      const { driver, session } = createDriver();
      await driver.navigate(PAGE);

      await driver.scrollPage('down', 300);
      await driver.scrollPage('up', 200);
      await driver.scrollPage('top');
      await driver.scrollPage('bottom');

      expect(session.calls.slice(1)).toEqual([
        'evaluate window.scrollBy(0, 300);',
        'evaluate window.scrollBy(0, -200);',
        'evaluate window.scrollTo(0, 0);',
        'evaluate window.scrollTo(0, document.body.scrollHeight);',
      ]);
    });

    it('should treat an unknown scroll direction as a successful no-op', async () => {
      const { driver, session } = createDriver();
      await driver.navigate(PAGE);

      await expect(driver.scrollPage('sideways')).resolves.toBe(true);
      expect(session.calls).toEqual(['goto https://example.com/live']);
    });

    it('should return the script result', async () => {
      const { driver } = createDriver();
      await driver.navigate(PAGE);

      await expect(driver.executeScript('return document.title')).resolves.toBe('document.title');
      await expect(driver.executeScript('window.stop()')).resolves.toBeNull();
    });

    it('should describe matching elements', async () => {
      const player = element({ tag: 'video', src: '/live.m3u8', id: 'player' });
      const session = new FakeBrowserSession({ [PAGE]: { elements: { video: [player] } } });
      const { driver } = createDriver(session);
      await driver.navigate(PAGE);

      await expect(driver.getElements('video')).resolves.toEqual([player]);
      await expect(driver.findElement('video')).resolves.toEqual(player);
      await expect(driver.findElement('audio')).resolves.toBeNull();
      await expect(driver.waitForElement('video')).resolves.toBe(true);
      await expect(driver.waitForElement('audio', 50)).resolves.toBe(false);
    });

    it('should return the cached url when no session exists', async () => {
      const { driver } = createDriver();

      await expect(driver.getCurrentUrl()).resolves.toBeNull();
      await driver.navigate(PAGE);
      await expect(driver.getCurrentUrl()).resolves.toBe(PAGE);
      await driver.close();
      await expect(driver.getCurrentUrl()).resolves.toBe(PAGE);
    });
  });

  describe('close', () => {
    it('should be idempotent', async () => {
      const { driver, session } = createDriver();
      await driver.navigate(PAGE);

      await driver.close();
      await driver.close();

      expect(session.closeCount).toBe(1);
      expect(driver.isActive).toBe(false);
    });

    it('should discard a browser that finishes starting after close', async () => {
      const session = new FakeBrowserSession();
      let finishLaunch: () => void = () => undefined;
      const launcher = new FakeLauncher(() => session);
      const launch = launcher.launch.bind(launcher);
      launcher.launch = (options) =>
        new Promise((resolve) => {
          finishLaunch = () => resolve(launch(options));
        });
      const driver = new AutomationDriver({ launcher, navigationSettleMs: 0 });

      const navigation = driver.navigate(PAGE);
      await driver.close();
      finishLaunch();

      await expect(navigation).resolves.toBe(false);
      expect(session.closeCount).toBe(1);
      expect(driver.isActive).toBe(false);
    });

    it('should drop the handle even when closing fails', async () => {
      const session = new FakeBrowserSession().failOn('close', new Error('browser already gone'));
      const { driver } = createDriver(session);
      await driver.navigate(PAGE);

      await expect(driver.close()).resolves.toBeUndefined();

      expect(session.closeCount).toBe(1);
      expect(driver.isActive).toBe(false);
    });
  });
});
