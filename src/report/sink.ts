/**
 * NewsScout — Report Sinks
 *
 * Where a finished report goes: a timestamped JSON file, the console,
 * or a Supabase table. Delivery failures are collected, never thrown.
 */

import { mkdir, writeFile } from 'fs/promises';
import { join } from 'path';
import type { Report } from '../types';
import { getAdminClient } from '../db/client';
import { fileTimestamp } from '../lib/trace';
import { renderReportText } from './render';
import { scopedLogger, errorMessage } from '../lib/logger';

const log = scopedLogger('report-sink');

export const REPORT_FILE_PREFIX = 'scout_report_';

export interface SinkResult {
  sink: string;
  success: boolean;
  /** File path, row id, ... */
  location?: string;
  error?: string;
}

export interface ReportSink {
  readonly name: string;
  write(report: Report): Promise<SinkResult>;
}

export function reportFilename(report: Report): string {
  return `${REPORT_FILE_PREFIX}${fileTimestamp(new Date(report.generatedAt))}.json`;
}

// ============================================================
// SINKS
// ============================================================

export class FileReportSink implements ReportSink {
  readonly name = 'file';

  constructor(private readonly dir: string) {}

  async write(report: Report): Promise<SinkResult> {
    await mkdir(this.dir, { recursive: true });
    const path = join(this.dir, reportFilename(report));
    await writeFile(path, JSON.stringify(report, null, 2), 'utf-8');
    return { sink: this.name, success: true, location: path };
  }
}

export class ConsoleReportSink implements ReportSink {
  readonly name = 'console';

  constructor(
    private readonly print: (text: string) => void = text => console.log(text),
    private readonly render: (report: Report) => string = renderReportText
  ) {}

  async write(report: Report): Promise<SinkResult> {
    this.print(this.render(report));
    return { sink: this.name, success: true };
  }
}

export class SupabaseReportSink implements ReportSink {
  readonly name = 'supabase';

  constructor(private readonly table = 'scout_reports') {}

  async write(report: Report): Promise<SinkResult> {
    const admin = getAdminClient();

    const { data, error } = await admin
      .from(this.table)
      .insert({
        report_id: report.id,
        generated_at: report.generatedAt,
        total_analyzed: report.totalAnalyzed,
        important_count: report.importantCount,
        threshold: report.threshold,
        content: report,
      })
      .select('id')
      .single();

    if (error) {
      return { sink: this.name, success: false, error: error.message };
    }

    return { sink: this.name, success: true, location: String(data.id) };
  }
}

// ============================================================
// DELIVERY
// ============================================================

/**
 * Hand a report to every sink in turn.
 */
export async function deliverReport(
  report: Report,
  sinks: readonly ReportSink[]
): Promise<SinkResult[]> {
  const results: SinkResult[] = [];

  for (const sink of sinks) {
    let result: SinkResult;
    try {
      result = await sink.write(report);
    } catch (error) {
      result = { sink: sink.name, success: false, error: errorMessage(error) };
    }

    if (result.success) {
      log.info('Report delivered', { reportId: report.id, sink: result.sink, location: result.location });
    } else {
      log.error('Report delivery failed', { reportId: report.id, sink: result.sink, error: result.error });
    }

    results.push(result);
  }

  return results;
}
