export { AlertManager } from './alert-manager';
export type { AlertManagerOptions, LocalAlertInput } from './alert-manager';
export { generateAlertId, normalizeAlertMessage } from './alert-normalizer';
export { forwardLogAlerts } from './log-alerts';
export { LogGrouper, WAIT_FOR_CLEANUP, classifySeverity } from './log-grouper';
export type { LogGrouperOptions } from './log-grouper';
export { extractDetails, maskVariables, matchPattern, normalizePattern } from './pattern-normalizer';
export type { PatternMatch, PatternRuleName } from './pattern-normalizer';
export { parseLogLine, stripLinePrefix, toMinuteKey } from './syslog-line';
