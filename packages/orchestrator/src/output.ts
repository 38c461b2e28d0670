import { mkdir, writeFile } from 'fs/promises';
import { join } from 'path';
import { toRecordRows, toReportJson, type Report } from '@vidtrend/analyzer';

export const REPORT_FILE = 'report.json';
export const VIDEOS_FILE = 'videos.json';

export interface WrittenFiles {
  reportPath: string;
  videosPath: string;
}

/** Write the nested report and the flat per-video rows as JSON */
export async function writeReportFiles(outDir: string, report: Report): Promise<WrittenFiles> {
  await mkdir(outDir, { recursive: true });

  const reportPath = join(outDir, REPORT_FILE);
  const videosPath = join(outDir, VIDEOS_FILE);
  await writeFile(reportPath, JSON.stringify(toReportJson(report), null, 2) + '\n', 'utf-8');
  await writeFile(videosPath, JSON.stringify(toRecordRows(report), null, 2) + '\n', 'utf-8');

  return { reportPath, videosPath };
}
