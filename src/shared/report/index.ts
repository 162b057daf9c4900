export { buildReportRows, renderTextReport, summarizeRows } from './textReport';
export type { ReportRow, ReportStatus, ReportSummary } from './textReport';
export { UNSET_END_OFFSET_US, exportTraceEvents, serializeTraceEvents } from './traceEvents';
export type { TraceEvent, TraceExportOptions } from './traceEvents';
