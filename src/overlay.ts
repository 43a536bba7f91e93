import type { Page } from 'playwright';
import { errorMessage } from './errors.js';
import { log as rootLog, type Logger } from './logger.js';

// ---------------------------------------------------------------------------
// Overlay dismissal
// ---------------------------------------------------------------------------
// The observer shows an "informed consent" modal, a cookie banner and toast
// messages at unpredictable moments. Anything here is best-effort: the caller
// proceeds whatever happens.
// ---------------------------------------------------------------------------

export const CONSENT_BUTTON_LABELS = ['Got it', 'Confirm', 'Accept', 'Accept all', 'I agree'];

export const OVERLAY_SELECTORS = [
  '.ant-modal-mask',
  '.ant-modal-wrap',
  '.ant-message',
  '.ant-notification',
  '.ant-spin-fullscreen',
];

export type OverlayTarget = Pick<Page, 'evaluate'>;

/** Click consent buttons and strip overlay layers. Never throws. */
export async function dismissOverlays(page: OverlayTarget, log: Logger = rootLog): Promise<void> {
  try {
    const removed = await page.evaluate(
      ({ labels, selectors }) => {
        let count = 0;

        for (const button of Array.from(document.querySelectorAll('button'))) {
          const text = button.textContent?.trim() ?? '';
          if (labels.includes(text)) {
            button.click();
            count++;
          }
        }

        for (const close of Array.from(document.querySelectorAll<HTMLElement>('.ant-modal-close'))) {
          close.click();
          count++;
        }

        for (const selector of selectors) {
          for (const el of Array.from(document.querySelectorAll(selector))) {
            el.remove();
            count++;
          }
        }

        document.body.style.overflow = '';
        return count;
      },
      { labels: CONSENT_BUTTON_LABELS, selectors: OVERLAY_SELECTORS }
    );

    if (removed > 0) log.debug(`Dismissed ${removed} overlay element(s)`);
  } catch (error) {
    log.debug(`Overlay dismissal skipped: ${errorMessage(error)}`);
  }
}
