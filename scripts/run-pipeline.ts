/**
 * NewsScout — Run Pipeline Script
 *
 * Fetches the configured feeds, scores the top story clusters and
 * writes the report.
 *
 * Usage:
 *   npm run pipeline                         # One run, report to console + reports/
 *   npm run pipeline -- --dry-run            # Console only, nothing written
 *   npm run pipeline -- --watch              # Run now, then every RUN_INTERVAL_MINUTES
 *   npm run pipeline -- --feed <url>         # Override FEED_URLS (repeatable)
 *   npm run pipeline -- --markdown           # Print the report as Markdown
 *   npm run pipeline -- --no-resolve         # Keep Google News redirect links as fetched
 */

import 'dotenv/config';
import { loadConfig, type AppConfig } from '../src/lib/config';
import { logger, errorMessage } from '../src/lib/logger';
import { RssFeedSource } from '../src/feeds/sources/rss';
import { createAnthropicClient } from '../src/llm/client';
import { createLlmReasoner } from '../src/scoring/reasoner';
import { GoogleNewsLinkResolver } from '../src/links/google-news';
import { runPipeline, type PipelineResult } from '../src/pipeline';
import {
  ConsoleReportSink,
  FileReportSink,
  SupabaseReportSink,
  deliverReport,
  type ReportSink,
} from '../src/report/sink';
import { renderReportMarkdown, renderReportText } from '../src/report/render';

// ============================================================
// OPTIONS
// ============================================================

interface ScriptOptions {
  dryRun: boolean;
  watch: boolean;
  markdown: boolean;
  resolveLinks: boolean;
  feeds: string[];
}

function parseArgs(argv: string[]): ScriptOptions {
  const options: ScriptOptions = {
    dryRun: false,
    watch: false,
    markdown: false,
    resolveLinks: true,
    feeds: [],
  };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === '--dry-run') {
      options.dryRun = true;
    } else if (arg === '--watch') {
      options.watch = true;
    } else if (arg === '--markdown') {
      options.markdown = true;
    } else if (arg === '--no-resolve') {
      options.resolveLinks = false;
    } else if (arg === '--feed' && argv[i + 1]) {
      options.feeds.push(argv[i + 1]);
      i++;
    } else {
      logger.warn('Ignoring unknown argument', { arg });
    }
  }

  return options;
}

function buildSinks(config: AppConfig, options: ScriptOptions): ReportSink[] {
  const sinks: ReportSink[] = [
    new ConsoleReportSink(undefined, options.markdown ? renderReportMarkdown : renderReportText),
  ];

  if (!options.dryRun) {
    sinks.push(new FileReportSink(config.reportsDir));
    if (config.supabase) {
      sinks.push(new SupabaseReportSink());
    }
  }

  return sinks;
}

// ============================================================
// RUN
// ============================================================

async function runOnce(config: AppConfig, options: ScriptOptions): Promise<PipelineResult> {
  const feedUrls = options.feeds.length > 0 ? options.feeds : config.feedUrls;
  const sources = feedUrls.map(
    url => new RssFeedSource(url, { maxItems: config.run.maxItemsPerSource })
  );

  const client = createAnthropicClient({
    apiKey: config.anthropic.apiKey,
    model: config.anthropic.model,
  });

  const result = await runPipeline({
    sources,
    capability: createLlmReasoner(client),
    linkResolver: config.resolveLinks && options.resolveLinks ? new GoogleNewsLinkResolver() : undefined,
    config: config.run,
  });

  if (result.status === 'failed') {
    console.error(`\nRun ${result.runId} failed during ${result.stage}: ${result.error}`);
    return result;
  }

  await deliverReport(result.report, buildSinks(config, options));
  return result;
}

async function main(): Promise<void> {
  const options = parseArgs(process.argv.slice(2));
  const config = loadConfig();

  logger.info('NewsScout starting', {
    feeds: options.feeds.length || config.feedUrls.length,
    dryRun: options.dryRun,
    watch: options.watch,
  });

  if (!options.watch) {
    const result = await runOnce(config, options);
    process.exitCode = result.status === 'done' ? 0 : 1;
    return;
  }

  let running = false;

  const tick = async () => {
    if (running) {
      logger.warn('Previous run still in progress, skipping tick');
      return;
    }
    running = true;
    try {
      await runOnce(config, options);
    } catch (error) {
      logger.error('Scheduled run crashed', { error: errorMessage(error) });
    } finally {
      running = false;
    }
  };

  await tick();

  const intervalMs = config.runIntervalMinutes * 60_000;
  const timer = setInterval(() => void tick(), intervalMs);

  logger.info('Watching feeds', { intervalMinutes: config.runIntervalMinutes });
  console.log('News scouting agent started. Press Ctrl+C to exit.');

  process.on('SIGINT', () => {
    clearInterval(timer);
    logger.info('Stopped');
    process.exit(0);
  });
}

main().catch(error => {
  logger.error('Pipeline script failed', { error: errorMessage(error) });
  process.exit(1);
});
