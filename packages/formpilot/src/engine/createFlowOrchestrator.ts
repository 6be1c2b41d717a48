import { loadFillerConfig, type FillerConfigInput } from '../config/filler.js';
import { getEnv } from '../config/env.js';
import { BlockerDetector } from '../detection/BlockerDetector.js';
import { ScreenshotRecorder } from '../monitoring/ScreenshotRecorder.js';
import { PlaywrightSessionProvisioner } from '../sessions/PlaywrightSessionProvisioner.js';
import { PageAnalyzer } from './analysis/PageAnalyzer.js';
import type { SessionProvisioner } from './collaborators.js';
import { DecisionResolver } from './decisions/DecisionResolver.js';
import { PreferenceStore } from './decisions/PreferenceStore.js';
import { FillExecutor } from './FillExecutor.js';
import { FlowOrchestrator } from './FlowOrchestrator.js';
import { PasswordLoginHelper } from './helpers/LoginHelper.js';
import { SelectorPopupDismisser } from './helpers/PopupDismisser.js';
import { StabilityMonitor } from './StabilityMonitor.js';

export interface OrchestratorSetup {
  config?: FillerConfigInput;
  /** Overrides FORMPILOT_HEADLESS. */
  headless?: boolean;
  /** Overrides FORMPILOT_PREFERENCES_PATH; null keeps choices in memory only. */
  preferencesPath?: string | null;
  screenshotDir?: string;
  sessions?: SessionProvisioner;
}

/** Wire the default collaborators around one configuration. */
export function createFlowOrchestrator(setup: OrchestratorSetup = {}): {
  orchestrator: FlowOrchestrator;
  decisions: DecisionResolver;
  store: PreferenceStore;
} {
  const env = getEnv();
  const config = loadFillerConfig(setup.config);
  const store = new PreferenceStore(
    setup.preferencesPath === undefined ? env.FORMPILOT_PREFERENCES_PATH : setup.preferencesPath,
  );
  store.load();
  const decisions = new DecisionResolver(store);

  const sessions =
    setup.sessions ??
    new PlaywrightSessionProvisioner({
      headless: setup.headless ?? env.FORMPILOT_HEADLESS,
      stealth: true,
      navigationTimeoutMs: config.navigationTimeoutMs,
      actionTimeoutMs: config.actionTimeoutMs,
    });

  const orchestrator = new FlowOrchestrator(config, {
    sessions,
    analyzer: new PageAnalyzer({ confidenceThreshold: config.confidenceThreshold }),
    stability: new StabilityMonitor({
      quietWindowMs: config.stabilityWindowMs,
      timeoutMs: config.stabilityTimeoutMs,
      pollIntervalMs: config.stabilityPollMs,
    }),
    filler: new FillExecutor({
      actionTimeoutMs: config.actionTimeoutMs,
      interactionDelayMs: config.interactionDelayMs,
      typingDelayMs: config.typingDelayMs,
      fieldGapMs: config.fieldGapMs,
    }),
    decisions,
    login: new PasswordLoginHelper(),
    captcha: new BlockerDetector(),
    popups: new SelectorPopupDismisser(),
    diagnostics: new ScreenshotRecorder(setup.screenshotDir ?? env.FORMPILOT_SCREENSHOT_DIR),
  });

  return { orchestrator, decisions, store };
}
