/**
 * BROWSER CHECK
 *
 * Verifies that Playwright and Chromium work and that the observer dashboard
 * can be read for the account in .env (ACCESS_KEY / USER_ID / COIN_TYPE).
 *
 * Usage: npm run test-browser
 *
 * What to expect:
 * - A Chromium window opens on the observer dashboard
 * - The dashboard fields found on the page are printed
 * - A screenshot is saved to the output folder
 */

import path from 'path';
import { launchObserverBrowser } from './browser.js';
import { credentials, paths, requireEnv, scraper as scraperConfig } from './config.js';
import { parseDashboard, textLines } from './dashboard.js';
import { errorMessage } from './errors.js';
import { accountFromCredentials } from './index.js';
import { buildKinds } from './kinds.js';
import { log } from './logger.js';
import { fileStamp } from './output.js';
import { delay } from './timing.js';

async function testBrowser(): Promise<void> {
  console.log('');
  console.log('========================================');
  console.log('  BROWSER CHECK');
  console.log('========================================');
  console.log('');

  const account = accountFromCredentials({
    accessKey: requireEnv('ACCESS_KEY'),
    userId: requireEnv('USER_ID'),
    coinType: credentials.coinType,
  });

  const session = await launchObserverBrowser(
    {
      headless: false, // Always visible for this check
      pageTimeout: scraperConfig.pageTimeout,
      observerBaseUrl: scraperConfig.observerBaseUrl,
    },
    log
  );

  try {
    const page = await session.newPage(log);
    await page.open(buildKinds().dashboard, account);

    const { snapshot, missing } = parseDashboard(textLines(await page.dashboardText()), {
      account_ref: account.external_user_id,
      coin_type: account.coin_type,
      observed_at: new Date().toISOString(),
    });
    console.log('Dashboard reading:', JSON.stringify(snapshot, null, 2));
    if (missing.length > 0) console.log(`Not found on the page: ${missing.join(', ')}`);

    const screenshotPath = path.join(paths.output, `${fileStamp()}_browser-check.png`);
    await page.screenshot(screenshotPath);
    console.log(`Screenshot saved to: ${screenshotPath}`);

    // Wait 3 seconds so the user can see the browser
    await delay(3000);
    await page.close();
  } finally {
    await session.close();
  }

  console.log('');
  console.log('========================================');
  console.log('  CHECK PASSED');
  console.log('========================================');
}

testBrowser().catch(error => {
  const message = errorMessage(error);
  console.error('');
  console.error('========================================');
  console.error('  CHECK FAILED');
  console.error('========================================');
  console.error('');
  console.error('Error:', message);

  if (message.includes('Executable doesn\'t exist')) {
    console.error('Playwright browsers are not installed. Run:');
    console.error('');
    console.error('  npx playwright install chromium');
  }

  process.exit(1);
});
