import { chromium, type BrowserContext, type Page } from 'playwright';
import { errorMessage } from './errors.js';
import type { KindConfig } from './kinds.js';
import type { Logger } from './logger.js';
import { dismissOverlays } from './overlay.js';
import type { TableView } from './paginator.js';
import type { Account } from './types.js';

// ---------------------------------------------------------------------------
// Browser seams
// ---------------------------------------------------------------------------
// The pipeline and orchestrator only see these interfaces; Playwright lives
// behind them so both can run against in-process fakes.
// ---------------------------------------------------------------------------

/** One account's page inside a group's browser */
export interface ObserverPage {
  /** Navigate to the account's observer and bring up the kind's view; throws if it never appears */
  open(kind: KindConfig, account: Account): Promise<void>;
  dismissOverlays(): Promise<void>;
  /** The table behind the currently open tab */
  table(): TableView;
  /** Visible text of the dashboard */
  dashboardText(): Promise<string>;
  screenshot(file: string): Promise<void>;
  close(): Promise<void>;
}

/** A browser owned by exactly one account group */
export interface BrowserSession {
  newPage(log: Logger): Promise<ObserverPage>;
  close(): Promise<void>;
}

export type LaunchBrowser = (log: Logger) => Promise<BrowserSession>;

export interface BrowserOptions {
  headless: boolean;
  /** Default timeout for navigation and selector waits */
  pageTimeout: number;
  observerBaseUrl: string;
}

// ---------------------------------------------------------------------------
// Observer URL
// ---------------------------------------------------------------------------

export function observerUrl(baseUrl: string, account: Account): string {
  const url = new URL(baseUrl);
  url.searchParams.set('accessKey', account.access_key);
  url.searchParams.set('coinType', account.coin_type);
  url.searchParams.set('observerUserId', account.external_user_id);
  return url.toString();
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

// ---------------------------------------------------------------------------
// Playwright implementation
// ---------------------------------------------------------------------------

const ROW_SELECTOR = 'table tbody tr:not(.ant-table-measure-row):not(.ant-table-placeholder)';

class PlaywrightObserverPage implements ObserverPage {
  constructor(
    private readonly page: Page,
    private readonly options: BrowserOptions,
    private readonly log: Logger
  ) {}

  async dismissOverlays(): Promise<void> {
    await dismissOverlays(this.page, this.log);
  }

  async open(kind: KindConfig, account: Account): Promise<void> {
    this.log.step(1, `Opening ${kind.kind} view...`);
    await this.page.goto(observerUrl(this.options.observerBaseUrl, account), {
      waitUntil: 'domcontentloaded',
    });
    await this.dismissOverlays();
    await this.page.waitForSelector('.ant-card-body');

    if (kind.type === 'dashboard') {
      await this.waitForSpinners();
      return;
    }

    // Tab labels overlap ("Worker" / "Inactive Workers"), so match the whole label
    await this.dismissOverlays();
    await this.page
      .locator('.ant-tabs-tab')
      .filter({ hasText: new RegExp(`^\\s*${escapeRegExp(kind.tab)}\\s*$`, 'i') })
      .first()
      .click();
    await this.page.waitForSelector('table');

    await this.dismissOverlays();
    await this.selectPageSize(kind.pageSize);
    await this.waitForSpinners();
  }

  /** The size changer only shows on tables long enough to need it */
  private async selectPageSize(size: number): Promise<void> {
    const changer = this.page.locator('.ant-pagination-options .ant-select-selector').first();
    if ((await changer.count()) === 0) {
      this.log.debug(`No page size selector, keeping the table's default`);
      return;
    }
    await changer.click();
    await this.page.locator(`.ant-select-item-option[title="${size} / page"]`).first().click();
    this.log.debug(`Page size set to ${size}`);
  }

  private async waitForSpinners(): Promise<void> {
    await this.page.waitForFunction(() => !document.querySelector('.ant-spin-spinning'));
  }

  table(): TableView {
    const page = this.page;
    const next = page.locator('li.ant-pagination-next').first();

    return {
      async readRows() {
        return await page.locator(ROW_SELECTOR).evaluateAll(rows =>
          rows.map(row =>
            Array.from(row.querySelectorAll('td')).map(cell => (cell.textContent ?? '').trim())
          )
        );
      },

      async readSummary() {
        const summary = page.locator('.ant-pagination-total-text').first();
        if ((await summary.count()) === 0) return null;
        return await summary.textContent();
      },

      async hasNextPage() {
        if ((await next.count()) === 0) return false;
        const disabled = await next.getAttribute('aria-disabled');
        const className = (await next.getAttribute('class')) ?? '';
        return disabled !== 'true' && !className.includes('ant-pagination-disabled');
      },

      async goToNextPage() {
        await next.click();
      },
    };
  }

  async dashboardText(): Promise<string> {
    return await this.page.locator('body').innerText();
  }

  async screenshot(file: string): Promise<void> {
    await this.page.screenshot({ path: file, fullPage: true });
  }

  async close(): Promise<void> {
    await this.page.close();
  }
}

/** Launch Chromium with one context; every account page of the group opens in it */
export async function launchObserverBrowser(options: BrowserOptions, log: Logger): Promise<BrowserSession> {
  log.step(0, 'Launching browser...');

  const browser = await chromium.launch({
    headless: options.headless,
    args: [
      '--no-sandbox',
      '--disable-setuid-sandbox',
      '--disable-dev-shm-usage',
    ],
  });

  let context: BrowserContext;
  try {
    context = await browser.newContext({
      viewport: { width: 1920, height: 1080 },
      userAgent:
        'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36',
    });
  } catch (error) {
    await browser.close();
    throw error;
  }

  log.success('Browser launched');

  return {
    async newPage(pageLog) {
      const page = await context.newPage();
      page.setDefaultTimeout(options.pageTimeout);
      return new PlaywrightObserverPage(page, options, pageLog);
    },

    async close() {
      try {
        await browser.close();
        log.info('Browser closed');
      } catch (error) {
        log.warn(`Browser did not close cleanly: ${errorMessage(error)}`);
      }
    },
  };
}
