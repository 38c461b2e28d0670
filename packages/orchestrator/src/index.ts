export { runTrendAnalysis, type TrendRunOptions, type TrendRunResult } from './run.js';
export { RunStageError, type RunStage } from './errors.js';
export { ReportStore, type RunStart } from './report-store.js';
export { writeReportFiles, REPORT_FILE, VIDEOS_FILE, type WrittenFiles } from './output.js';
