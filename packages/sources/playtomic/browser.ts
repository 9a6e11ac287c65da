import { chromium, request } from 'playwright-core';
import type { Browser } from 'playwright-core';

/**
 * Browser acquisition for grid scraping
 *
 * Proxies are probed once per process and cached in a ProxyPool that the
 * caller owns. Browsers come from an ordered list of launch strategies;
 * the first that works wins, and if none does the caller gets null.
 *
 * Usage:
 *   const pool = new ProxyPool(proxyCandidates(config.browser.proxy))
 *   const proxy = await pool.acquire()
 *   const browser = await acquireFirst(launchStrategies({ headless: true, executablePath, proxy }))
 */

export interface ProxySettings {
  server: string;
  username?: string;
  password?: string;
}

export type ProxyProbe = (proxy: ProxySettings) => Promise<boolean>;

export interface Acquisition<T> {
  name: string;
  acquire: () => Promise<T>;
}

interface LaunchOptions {
  headless: boolean;
  executablePath: string | null;
  proxy: ProxySettings | null;
}

interface ProxyEnv {
  host: string | null;
  user: string | null;
  pass: string | null;
  ports: string[];
}

export class GridUnavailableError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'GridUnavailableError';
  }
}

/**
 * One candidate per configured port; empty when the proxy is not configured
 */
export function proxyCandidates(env: ProxyEnv): ProxySettings[] {
  if (!env.host) return [];

  return env.ports.map(port => ({
    server: `http://${env.host}:${port}`,
    username: env.user ?? undefined,
    password: env.pass ?? undefined
  }));
}

/**
 * Probe a proxy by fetching an IP-echo endpoint through it
 */
export function playwrightProbe(probeUrl: string, timeoutMs: number): ProxyProbe {
  return async (proxy) => {
    const context = await request.newContext({ proxy, timeout: timeoutMs });
    try {
      const response = await context.get(probeUrl);
      if (!response.ok()) {
        console.warn(`[proxy] ${proxy.server} answered ${response.status()}`);
        return false;
      }
      return true;
    } catch (error) {
      console.warn(`[proxy] ${proxy.server} unreachable: ${error instanceof Error ? error.message : String(error)}`);
      return false;
    } finally {
      await context.dispose();
    }
  };
}

export class ProxyPool {
  private probing: Promise<ProxySettings[]> | null = null;

  constructor(
    private candidates: ProxySettings[],
    private probe: ProxyProbe = async () => true,
    private pick: (count: number) => number = count => Math.floor(Math.random() * count)
  ) {}

  /**
   * Working proxies, probed on first use and cached for the process
   */
  working(): Promise<ProxySettings[]> {
    if (!this.probing) {
      this.probing = this.probeAll();
    }
    return this.probing;
  }

  /**
   * A random working proxy, or null for a direct connection
   */
  async acquire(): Promise<ProxySettings | null> {
    const working = await this.working();
    if (working.length === 0) return null;
    return working[this.pick(working.length)] ?? null;
  }

  private async probeAll(): Promise<ProxySettings[]> {
    if (this.candidates.length === 0) return [];

    console.log(`[proxy] Testing ${this.candidates.length} proxy port(s)...`);

    const results = await Promise.all(
      this.candidates.map(async candidate => {
        try {
          return await this.probe(candidate);
        } catch {
          return false;
        }
      })
    );
    const working = this.candidates.filter((_, idx) => results[idx]);

    if (working.length === 0) {
      console.warn('[proxy] No working proxy ports found, falling back to direct connection');
    } else {
      console.log(`[proxy] ${working.length}/${this.candidates.length} proxy port(s) working`);
    }

    return working;
  }
}

/**
 * Try each acquisition in order; the first success wins
 * @returns null when every strategy failed
 */
export async function acquireFirst<T>(strategies: Acquisition<T>[]): Promise<T | null> {
  for (const strategy of strategies) {
    try {
      return await strategy.acquire();
    } catch (error) {
      console.warn(`[browser] ${strategy.name} failed: ${error instanceof Error ? error.message : String(error)}`);
    }
  }
  return null;
}

const CHROME_ARGS = [
  '--no-sandbox',
  '--disable-dev-shm-usage',
  '--disable-blink-features=AutomationControlled',
  '--disable-extensions',
  '--disable-gpu',
  '--disable-notifications',
  '--disable-popup-blocking'
];

export function launchStrategies(options: LaunchOptions): Acquisition<Browser>[] {
  const { headless, executablePath, proxy } = options;
  const strategies: Acquisition<Browser>[] = [];
  const executable = executablePath ?? undefined;

  if (proxy) {
    strategies.push({
      name: `chromium via proxy ${proxy.server}`,
      acquire: () => chromium.launch({ headless, executablePath: executable, proxy, args: CHROME_ARGS })
    });
  }

  if (executablePath) {
    strategies.push({
      name: 'chromium direct',
      acquire: () => chromium.launch({ headless, executablePath, args: CHROME_ARGS })
    });
  }

  strategies.push({
    name: 'chrome channel direct',
    acquire: () => chromium.launch({ headless, channel: 'chrome', args: ['--no-sandbox'] })
  });

  return strategies;
}
