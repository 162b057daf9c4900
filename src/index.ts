export { CallStackEngine, countNodes, createTraceNode, durationMs, selfTimeMs, walkPreOrder } from './shared/callTree';
export type { Instant, ObserveOutcome, ThreadId, TraceNode } from './shared/callTree';
export { classifyMessage, regexPredicate } from './shared/eventClassifier';
export type { EventDefinition, MessagePredicate, Signal, SignalKind } from './shared/eventClassifier';
export { compileTimestampFormat, createLogLineDecoder, namedGroupsOf } from './shared/logLine';
export type { DecodedLogLine, InstantParser, LogLineDecoder } from './shared/logLine';
export {
  buildReportRows,
  exportTraceEvents,
  renderTextReport,
  serializeTraceEvents,
  summarizeRows
} from './shared/report';
export type { ReportRow, ReportStatus, ReportSummary, TraceEvent, TraceExportOptions } from './shared/report';
export { ProfilerConfigError, compileProfilerConfig, loadProfilerConfig } from './utils/config';
export type { ConfigOverrides, ProfilerConfig, RawProfilerConfig } from './utils/config';
export { profileLines, profileLogFile } from './profiler';
export type { ProfileResult, ProfileStats } from './profiler';
