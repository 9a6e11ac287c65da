import fs from 'fs';
import path from 'path';
import { acquireFirst, GridUnavailableError, launchStrategies } from '../browser.js';
import { formatDate } from '../../../core/time.js';
import type { Page } from 'playwright-core';
import type { ProxyPool } from '../browser.js';
import type { GridReader, GridRequest, GridRow, Venue } from '../../../core/types.js';

/**
 * Playtomic Booking Grid Reader
 *
 * Purpose: Read one venue's daily court grid from its club page
 * Method: Playwright (one browser per venue, closed when done)
 *
 * Court labels and court rows are paired by index. On the geometric shape
 * each booked cell reports its document x and width; on the attribute shape
 * each bookable cell reports its data-start / data-end text.
 *
 * Club pages only show today's grid, so any other date is refused.
 */

export interface GridSelectors {
  grid: string;
  label: string;
  row: string;
  occupied: string;
  slot: string;
}

export interface GridReaderOptions {
  proxyPool: ProxyPool;
  headless: boolean;
  executablePath: string | null;
  selectors: GridSelectors;
  settleDelayMs: number;
  /** Save a full-page screenshot per venue here (null = off) */
  screenshotsDir: string | null;
  /** Clock for "today" (default: system time) */
  now?: () => Date;
}

export class PlaywrightGridReader implements GridReader {
  constructor(private options: GridReaderOptions) {}

  async readGrid(venue: Venue, gridRequest: GridRequest): Promise<GridRow[]> {
    const { selectors, settleDelayMs, headless, executablePath } = this.options;

    const today = formatDate((this.options.now ?? (() => new Date()))());
    if (gridRequest.date !== today) {
      throw new GridUnavailableError(`${venue.name} only shows today's grid (${today}), not ${gridRequest.date}`);
    }

    const proxy = await this.options.proxyPool.acquire();
    const browser = await acquireFirst(launchStrategies({ headless, executablePath, proxy }));

    if (!browser) {
      throw new GridUnavailableError(`No browser could be started for ${venue.name}`);
    }

    try {
      const page = await browser.newPage({ viewport: { width: 1920, height: 1080 } });
      page.setDefaultTimeout(gridRequest.timeoutMs);

      console.log(`[grid] ${venue.name}: loading ${venue.url}`);
      await page.goto(venue.url, { waitUntil: 'domcontentloaded', timeout: gridRequest.timeoutMs });
      await page.waitForSelector(selectors.grid, { timeout: gridRequest.timeoutMs });
      await page.waitForTimeout(settleDelayMs);

      if (this.options.screenshotsDir) {
        await this.screenshot(page, venue);
      }

      const rows: GridRow[] = await page.evaluate(({ selectors, shape }) => {
        const grid = document.querySelector(selectors.grid);
        if (!grid) return [];

        const labels = Array.from(grid.querySelectorAll(selectors.label))
          .map(label => (label.textContent || '').trim());
        const blocks = Array.from(grid.querySelectorAll(selectors.row));

        return labels.slice(0, blocks.length).map((resourceName, idx): GridRow => {
          const block = blocks[idx];

          if (shape === 'geometric') {
            return {
              resourceName,
              markers: Array.from(block.querySelectorAll(selectors.occupied)).map(cell => {
                const rect = cell.getBoundingClientRect();
                return { kind: 'geometric' as const, x: rect.left + window.scrollX, width: rect.width, occupied: true };
              })
            };
          }

          return {
            resourceName,
            markers: Array.from(block.querySelectorAll(selectors.slot)).map(cell => ({
              kind: 'attribute' as const,
              start: cell.getAttribute('data-start') || undefined,
              end: cell.getAttribute('data-end') || undefined
            }))
          };
        });
      }, { selectors, shape: gridRequest.shape });

      console.log(`[grid] ${venue.name}: ${rows.length} court row(s)`);
      return rows;

    } finally {
      try {
        await browser.close();
      } catch (error) {
        console.warn(`[grid] ${venue.name}: browser close failed: ${error instanceof Error ? error.message : String(error)}`);
      }
    }
  }

  /**
   * Best effort; a failed screenshot never fails the venue
   */
  private async screenshot(page: Page, venue: Venue): Promise<void> {
    const dir = this.options.screenshotsDir;
    if (!dir) return;

    const stamp = new Date().toISOString().replace(/[:.]/g, '-');
    const file = path.join(dir, `${venue.name.trim().replace(/[^A-Za-z0-9_-]+/g, '_')}_${stamp}.png`);

    try {
      fs.mkdirSync(dir, { recursive: true });
      await page.screenshot({ path: file, fullPage: true });
      console.log(`[grid] Screenshot → ${file}`);
    } catch (error) {
      console.warn(`[grid] Screenshot failed for ${venue.name}: ${error instanceof Error ? error.message : String(error)}`);
    }
  }
}
