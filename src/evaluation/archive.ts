/**
 * NewsScout — Report Archive
 *
 * Lists and loads the report files written by FileReportSink,
 * and stores evaluation results next to them.
 */

import { mkdir, readdir, readFile, stat, writeFile } from 'fs/promises';
import { basename, join } from 'path';
import { z } from 'zod';
import { EvaluationReportSchema, ReportSchema, type EvaluationReport, type Report } from '../types';
import { REPORT_FILE_PREFIX } from '../report/sink';
import { fileTimestamp } from '../lib/trace';

export interface ReportFile {
  filename: string;
  path: string;
  modifiedAt: Date;
}

export const PICKER_LIMIT = 10;

function describeIssues(error: z.ZodError): string {
  return error.issues
    .slice(0, 5)
    .map(issue => `${issue.path.join('.')}: ${issue.message}`)
    .join('; ');
}

/**
 * Report files in `dir`, newest first. A missing directory yields [].
 */
export async function listReports(dir: string): Promise<ReportFile[]> {
  let names: string[];
  try {
    names = await readdir(dir);
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') return [];
    throw error;
  }

  const files = await Promise.all(
    names
      .filter(name => name.startsWith(REPORT_FILE_PREFIX) && name.endsWith('.json'))
      .map(async filename => {
        const path = join(dir, filename);
        const { mtime } = await stat(path);
        return { filename, path, modifiedAt: mtime };
      })
  );

  return files.sort(
    (a, b) => b.modifiedAt.getTime() - a.modifiedAt.getTime() || b.filename.localeCompare(a.filename)
  );
}

/**
 * Read and validate a saved report.
 */
export async function loadReport(path: string): Promise<Report> {
  const text = await readFile(path, 'utf-8');
  const parsed = ReportSchema.safeParse(JSON.parse(text));

  if (!parsed.success) {
    throw new Error(`Invalid report file ${basename(path)}: ${describeIssues(parsed.error)}`);
  }

  return parsed.data;
}

/**
 * evaluation_<report stem>_<YYYYMMDD_HHMMSS>.json
 */
export function evaluationFilename(reportFilename: string, evaluatedAt: Date): string {
  const stem = basename(reportFilename, '.json').replace(REPORT_FILE_PREFIX, '');
  return `evaluation_${stem}_${fileTimestamp(evaluatedAt)}.json`;
}

/**
 * Validate and write an evaluation; nothing is written when it does not
 * match EvaluationReportSchema.
 */
export async function saveEvaluation(
  evaluation: EvaluationReport,
  dir: string,
  reportFilename: string
): Promise<string> {
  const parsed = EvaluationReportSchema.safeParse(evaluation);
  if (!parsed.success) {
    throw new Error(`Invalid evaluation for ${basename(reportFilename)}: ${describeIssues(parsed.error)}`);
  }

  await mkdir(dir, { recursive: true });
  const path = join(dir, evaluationFilename(reportFilename, new Date(parsed.data.evaluatedAt)));
  await writeFile(path, JSON.stringify(parsed.data, null, 2), 'utf-8');
  return path;
}

/**
 * Read a picker answer: a 1-based report number, `q` to quit, or null
 * for anything else.
 */
export function parseReportChoice(input: string, count: number): number | 'quit' | null {
  const answer = input.trim().toLowerCase();
  if (answer === 'q') return 'quit';
  if (!/^\d+$/.test(answer)) return null;

  const choice = Number(answer);
  return choice >= 1 && choice <= count ? choice - 1 : null;
}
