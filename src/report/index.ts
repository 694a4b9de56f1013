/**
 * NewsScout — Report Module
 */

export {
  buildReport,
  compareStories,
  partitionByThreshold,
  DEFAULT_SCORE_THRESHOLD,
  type BuildReportInput,
} from './builder';

export { renderReportText, renderReportMarkdown } from './render';

export {
  FileReportSink,
  ConsoleReportSink,
  SupabaseReportSink,
  deliverReport,
  reportFilename,
  REPORT_FILE_PREFIX,
  type ReportSink,
  type SinkResult,
} from './sink';
