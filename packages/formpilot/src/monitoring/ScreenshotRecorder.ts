import { mkdirSync } from 'node:fs';
import { join } from 'node:path';
import type { Page } from 'playwright';
import type { DiagnosticsRecorder } from '../engine/collaborators.js';
import { errorMessage } from '../engine/errors.js';
import { getLogger } from './logger.js';

const sanitize = (label: string): string => label.replace(/[^a-zA-Z0-9_-]+/g, '_').slice(0, 80);

/** Full-page PNGs written to one directory; failures are logged, never thrown. */
export class ScreenshotRecorder implements DiagnosticsRecorder {
  private logger = getLogger({ service: 'ScreenshotRecorder' });

  constructor(
    private readonly dir: string,
    private readonly now: () => Date = () => new Date(),
  ) {}

  async capture(page: Page, label: string): Promise<string | null> {
    if (page.isClosed()) return null;
    const stamp = this.now().toISOString().replace(/[:.]/g, '-');
    const path = join(this.dir, `${sanitize(label)}_${stamp}.png`);
    try {
      mkdirSync(this.dir, { recursive: true });
      await page.screenshot({ path, fullPage: true });
      this.logger.info('Diagnostic screenshot saved', { path });
      return path;
    } catch (err) {
      this.logger.warn('Diagnostic screenshot failed', { label, error: errorMessage(err) });
      return null;
    }
  }
}
