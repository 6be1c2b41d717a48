export * from './engine/types.js';
export * from './engine/errors.js';
export type * from './engine/collaborators.js';
export { FlowOrchestrator, looksLikeJobListing, type FlowOrchestratorDeps } from './engine/FlowOrchestrator.js';
export { createFlowOrchestrator, type OrchestratorSetup } from './engine/createFlowOrchestrator.js';
export { PageAnalyzer, listFields } from './engine/analysis/PageAnalyzer.js';
export { AttributeExtractor, buildStableSelector, classifyElementKind } from './engine/analysis/AttributeExtractor.js';
export { ConfidenceScorer, compilePatternBook, loadPatternBook } from './engine/analysis/ConfidenceScorer.js';
export { classifyButtonIntent } from './engine/analysis/ButtonIntentClassifier.js';
export { resolveConflicts } from './engine/analysis/ConflictResolver.js';
export { classifyFormPurpose } from './engine/analysis/FormPurposeClassifier.js';
export { MultiStepDetector, inferStepPosition } from './engine/analysis/MultiStepDetector.js';
export { StabilityMonitor, type StabilityOptions, type StabilityResult } from './engine/StabilityMonitor.js';
export { FillExecutor, computeFillSuccess, toBoolean, type FillResult } from './engine/FillExecutor.js';
export { DecisionResolver, type DecisionResult } from './engine/decisions/DecisionResolver.js';
export { PreferenceStore } from './engine/decisions/PreferenceStore.js';
export { BUILT_IN_DECISION_POINTS } from './engine/decisions/builtins.js';
export { PasswordLoginHelper, looksLikeLoginUrl } from './engine/helpers/LoginHelper.js';
export { SelectorPopupDismisser } from './engine/helpers/PopupDismisser.js';
export { BlockerDetector, type BlockerResult } from './detection/BlockerDetector.js';
export { ScreenshotRecorder } from './monitoring/ScreenshotRecorder.js';
export { PlaywrightSessionProvisioner, type SessionOptions } from './sessions/PlaywrightSessionProvisioner.js';
export { getLogger, Logger } from './monitoring/logger.js';
export { loadFillerConfig, type FillerConfig } from './config/index.js';
