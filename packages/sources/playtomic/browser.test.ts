import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { acquireFirst, launchStrategies, proxyCandidates, ProxyPool } from './browser.js';
import type { ProxySettings } from './browser.js';

const env = { host: 'proxy.test', user: 'user', pass: 'test-secret', ports: ['10001', '10002', '10003'] };

describe('proxyCandidates', () => {
  it('builds one proxy per port', () => {
    assert.deepEqual(proxyCandidates(env), [
      { server: 'http://proxy.test:10001', username: 'user', password: 'test-secret' },
      { server: 'http://proxy.test:10002', username: 'user', password: 'test-secret' },
      { server: 'http://proxy.test:10003', username: 'user', password: 'test-secret' }
    ]);
  });

  it('is empty without a host', () => {
    assert.deepEqual(proxyCandidates({ ...env, host: null }), []);
  });
});

describe('ProxyPool', () => {
  it('probes each candidate once per process', async () => {
    const probed: string[] = [];
    const pool = new ProxyPool(proxyCandidates(env), async proxy => {
      probed.push(proxy.server);
      return proxy.server.endsWith('10002');
    }, () => 0);

    const [first, second] = await Promise.all([pool.acquire(), pool.acquire()]);
    await pool.acquire();

    assert.equal(first?.server, 'http://proxy.test:10002');
    assert.equal(second?.server, 'http://proxy.test:10002');
    assert.deepEqual(probed.sort(), ['http://proxy.test:10001', 'http://proxy.test:10002', 'http://proxy.test:10003']);
  });

  it('picks among working proxies', async () => {
    const pool = new ProxyPool(proxyCandidates(env), async () => true, count => count - 1);
    assert.equal((await pool.acquire())?.server, 'http://proxy.test:10003');
  });

  it('treats a throwing probe as a dead proxy', async () => {
    const pool = new ProxyPool(proxyCandidates(env), async proxy => {
      if (proxy.server.endsWith('10001')) throw new Error('ECONNREFUSED');
      return false;
    });

    assert.deepEqual(await pool.working(), []);
    assert.equal(await pool.acquire(), null);
  });
});

describe('acquireFirst', () => {
  it('returns the first strategy that succeeds', async () => {
    const tried: string[] = [];
    const attempt = (name: string, ok: boolean) => ({
      name,
      acquire: async () => {
        tried.push(name);
        if (!ok) throw new Error(`${name} unavailable`);
        return name;
      }
    });

    const got = await acquireFirst([attempt('proxy', false), attempt('direct', true), attempt('channel', true)]);

    assert.equal(got, 'direct');
    assert.deepEqual(tried, ['proxy', 'direct']);
  });

  it('returns null when every strategy fails', async () => {
    const got = await acquireFirst([{ name: 'only', acquire: () => Promise.reject(new Error('no browser')) }]);
    assert.equal(got, null);
  });
});

describe('launchStrategies', () => {
  const proxy: ProxySettings = { server: 'http://proxy.test:10001' };

  it('tries the proxy, then the configured binary, then the chrome channel', () => {
    const names = launchStrategies({ headless: true, executablePath: '/opt/chrome/chrome', proxy }).map(s => s.name);
    assert.deepEqual(names, ['chromium via proxy http://proxy.test:10001', 'chromium direct', 'chrome channel direct']);
  });

  it('falls back to the chrome channel alone', () => {
    const names = launchStrategies({ headless: true, executablePath: null, proxy: null }).map(s => s.name);
    assert.deepEqual(names, ['chrome channel direct']);
  });
});
