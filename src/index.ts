/**
 * 库入口：检查引擎与各组件
 */

export type { Policy, IndentMode } from './types/policy';
export type { Violation, ViolationKind, ViolationDetail, LineViolation, FileReport, RunReport } from './types/violation';
export type { DiffLabel, DiffToken } from './types/diff';
export type { Candidate, ContentWriter } from './types/candidate';
export type { WsCheckConfig, ConfigOverrides } from './types/config';

export { getDefaultConfig, loadWorkspaceConfig, loadYamlFromPath, CONFIG_FILE_NAME } from './config/configLoader';
export { mergeConfig } from './config/configMerger';
export { buildPolicy, ALL_FILES_SENTINEL } from './config/policyBuilder';

export { CandidateFilter, type ExclusionReason, type Relevance } from './shared/candidateFilter';
export { scanLine, detectWrongIndent, renderTrailingPointer } from './shared/lineScanner';
export { scanContent, describeKind, buildFileReport } from './shared/fileReport';
export { fixContent, fixLine, needsFix } from './shared/fixer';
export { expandTabs } from './shared/text';

export { tokenizeUnifiedDiff, parseFileHeaderPath } from './utils/diffParser';
export {
    classifyDiffTokens,
    stepDiffClassifier,
    finishDiffClassifier,
    initialDiffClassifierState,
    type DiffClassifierState,
    type DiffClassifierContext,
    type Chain,
} from './core/diffClassifier';
export { ReportAggregator, type RunOutcome } from './core/reportAggregator';
export { CheckEngine, type ChangeDiff, type CheckResult, type FixOutcome } from './core/checkEngine';

export { FileScanner, describeTarget, type ChangeSource, type ChangeTarget } from './utils/fileScanner';
export { ConsoleReportOutput, BufferedReportOutput, type ReportOutput, type Verbosity } from './utils/reportOutput';
export { Logger, type LogLevel } from './utils/logger';
export * from './utils/errors';

export { runCheck, type CheckOptions } from './commands/checkCommand';
export { GitHookManager } from './hooks/gitHookManager';
