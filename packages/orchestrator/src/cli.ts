import chalk from 'chalk';
import Table from 'cli-table3';
import {
  BilibiliClient,
  closeDb,
  createLogger,
  getDb,
  loadConfig,
  type ConfigInput,
} from '@vidtrend/shared';
import type { Report } from '@vidtrend/analyzer';
import { runTrendAnalysis } from './run.js';
import { RunStageError } from './errors.js';
import { ReportStore } from './report-store.js';
import { writeReportFiles } from './output.js';

const print = {
  header: (text: string) => console.log('\n' + chalk.bold.cyan(`  ${text}`)),
  success: (text: string) => console.log(chalk.green(`  ✓ ${text}`)),
  info: (text: string) => console.log(chalk.blue(`  ℹ ${text}`)),
  warn: (text: string) => console.log(chalk.yellow(`  ⚠ ${text}`)),
  error: (text: string) => console.error(chalk.red(`  ✗ ${text}`)),
  dim: (text: string) => console.log(chalk.dim(`    ${text}`)),
};

async function main() {
  const args = process.argv.slice(2);

  if (args.includes('--help') || args.includes('-h')) {
    printHelp();
    process.exit(0);
  }

  const overrides: ConfigInput = {};
  const keywords = getFlag(args, '--keywords');
  if (keywords !== undefined) overrides.keywords = keywords.split(',').map((k) => k.trim()).filter(Boolean);
  const from = getFlag(args, '--from');
  const to = getFlag(args, '--to');
  if (from !== undefined || to !== undefined) overrides.dateRange = { start: from, end: to };
  const maxResults = getFlag(args, '--max-results');
  if (maxResults !== undefined) overrides.maxResultsPerKeyword = Number(maxResults);
  if (args.includes('--no-enrich')) overrides.enrichDetails = false;

  const outDir = getFlag(args, '--out') ?? 'output';
  const store = !args.includes('--no-store');

  const config = loadConfig(overrides);
  const logger = createLogger('vidtrend', config.logLevel);

  const api = new BilibiliClient({
    pageSize: config.pageSize,
    cookie: config.api.cookie,
    userAgent: config.api.userAgent,
    timeoutMs: config.api.timeoutMs,
    logger: createLogger('bilibili-client', config.logLevel),
  });
  const reportStore =
    store && config.databaseUrl ? new ReportStore(getDb(config.databaseUrl), logger) : undefined;

  const controller = new AbortController();
  process.on('SIGINT', () => {
    if (controller.signal.aborted) process.exit(130);
    print.warn('Cancelling collection, analyzing what was gathered (Ctrl-C again to quit)');
    controller.abort();
  });

  print.header('Video Trend Analysis');
  print.dim(`Keywords: ${config.keywords.join(', ') || '(none)'}`);
  print.dim(`Range: ${config.dateRange.start} → ${config.dateRange.end}`);

  try {
    const { report, runId } = await runTrendAnalysis({
      config,
      api,
      logger,
      signal: controller.signal,
      store: reportStore,
    });

    const files = await writeReportFiles(outDir, report);
    printSummary(report);
    print.success(`Report written to ${files.reportPath}`);
    print.success(`Videos written to ${files.videosPath}`);
    if (runId !== undefined) print.dim(`Stored as run #${runId}`);
  } catch (err) {
    if (err instanceof RunStageError) {
      print.error(`Run failed during ${err.stage}: ${err.message}`);
      print.dim(`Records retained: ${err.partialRecords}`);
      if (err.report) {
        const files = await writeReportFiles(outDir, err.report);
        print.dim(`Report written to ${files.reportPath} before the failure`);
      }
    } else {
      const errMsg = err instanceof Error ? err.message : String(err);
      print.error(`Error: ${errMsg}`);
    }
    process.exitCode = 1;
  } finally {
    if (reportStore) await closeDb();
  }
}

function printSummary(report: Report) {
  const { summary, aggregates } = report;

  print.header('Summary');
  print.info(`${summary.totalRecords} videos, ${summary.totalViews.toLocaleString()} views`);
  print.info(`Avg engagement ratio: ${(summary.avgEngagementRatio * 100).toFixed(2)}%`);
  print.info(
    `Sentiment: ${summary.sentimentDistribution.positive} positive / ` +
      `${summary.sentimentDistribution.neutral} neutral / ${summary.sentimentDistribution.negative} negative`,
  );
  if (summary.coveredRange) {
    print.dim(
      `Published ${summary.coveredRange.start.toISOString().slice(0, 10)} → ${summary.coveredRange.end.toISOString().slice(0, 10)}`,
    );
  }
  print.dim(`Requests: ${summary.requests} | Units: ${summary.unitsPlanned} planned, ${summary.failedUnits} failed, ${summary.partialUnits} partial`);
  if (summary.failedKeywords.length > 0) print.warn(`Incomplete keywords: ${summary.failedKeywords.join(', ')}`);
  if (summary.enrichment) {
    print.dim(`Details: ${summary.enrichment.enriched}/${summary.enrichment.attempted} enriched`);
    if (summary.enrichment.failed > 0) print.warn(`Detail lookups failed: ${summary.enrichment.failed}`);
  }
  if (summary.cancelled) print.warn(`Cancelled: ${summary.cancelledUnits} unit(s) skipped`);
  for (const name of summary.degradedAggregates) print.warn(`Aggregate "${name}" degraded`);

  const years = aggregates.timeBuckets.rows.filter((r) => r.granularity === 'year');
  if (years.length > 0) {
    const table = new Table({
      head: [chalk.cyan('Year'), chalk.cyan('Videos'), chalk.cyan('Views'), chalk.cyan('Growth')],
      colWidths: [8, 10, 16, 10],
    });
    for (const row of years) {
      table.push([
        row.key,
        row.count.toString(),
        row.views.toLocaleString(),
        row.growthRate === null ? '-' : `${(row.growthRate * 100).toFixed(0)}%`,
      ]);
    }
    console.log(table.toString());
  }

  const creators = aggregates.creators.rows.slice(0, 10);
  if (creators.length > 0) {
    print.header('Top creators');
    const table = new Table({
      head: [chalk.cyan('#'), chalk.cyan('Creator'), chalk.cyan('Videos'), chalk.cyan('Views'), chalk.cyan('Influence')],
      colWidths: [5, 24, 8, 14, 11],
    });
    for (const row of creators) {
      table.push([
        row.rank.toString(),
        row.authorName.slice(0, 22),
        row.videoCount.toString(),
        row.totalViews.toLocaleString(),
        row.influence.toFixed(3),
      ]);
    }
    console.log(table.toString());
  }

  const bySentiment = aggregates.sentimentEngagement.rows;
  if (bySentiment.length > 0) {
    print.header('Engagement by sentiment');
    const table = new Table({
      head: [chalk.cyan('Sentiment'), chalk.cyan('Videos'), chalk.cyan('Avg views'), chalk.cyan('Engagement'), chalk.cyan('Score')],
      colWidths: [11, 8, 14, 12, 8],
    });
    for (const row of bySentiment) {
      table.push([
        row.key,
        row.count.toString(),
        Math.round(row.avgViews).toLocaleString(),
        row.avgEngagementRatio === null ? '-' : `${(row.avgEngagementRatio * 100).toFixed(2)}%`,
        row.avgSentimentScore.toFixed(2),
      ]);
    }
    console.log(table.toString());
  }

  const keywords = aggregates.keywords.rows.slice(0, 20);
  if (keywords.length > 0) {
    print.header('Top keywords');
    print.dim(keywords.map((k) => `${k.token}(${k.count})`).join('  '));
  }

  const engaging = aggregates.highEngagementKeywords;
  if (engaging.rows.length > 0) {
    print.header(`Keywords of the ${engaging.records} most engaging videos`);
    print.dim(engaging.rows.map((k) => `${k.term}(${k.count})`).join('  '));
  }
}

function printHelp() {
  console.log(`
  vidtrend — keyword video trend collection and analysis

  Usage:
    npm run analyze -- [options]

  Options:
    --keywords <a,b>       Comma-separated search keywords (default: built-in list)
    --from <YYYY-MM-DD>    Start of the publish window (inclusive)
    --to <YYYY-MM-DD>      End of the publish window (inclusive)
    --max-results <n>      Result cap per keyword (default: 1000)
    --out <dir>            Output directory for report.json and videos.json (default: output)
    --no-enrich            Skip the per-video detail lookups (coin and share counts stay 0)
    --no-store             Skip database persistence even when DATABASE_URL is set
    --help, -h             Show this help

  Ctrl-C stops collection and analyzes what was gathered.
  `);
}

function getFlag(args: string[], flag: string): string | undefined {
  const idx = args.indexOf(flag);
  return idx >= 0 ? args[idx + 1] : undefined;
}

main().catch((err: unknown) => {
  print.error(err instanceof Error ? err.message : String(err));
  process.exit(1);
});
