/**
 * dataExporter.ts — Writes batch results to JSON, CSV and a run summary.
 *
 * Files, all under `outputDir`:
 *   <base>.json          pretty-printed array of ProfileRecords
 *   <base>.csv           one flattened row per record
 *   <base>.summary.json  counts and failures of this run
 *
 * All three are rewritten in full on every flush, so the files on disk
 * always reflect every record and failure finished so far.  The summary's
 * `finishedAt` stays null until the run completes.  In append mode the records
 * already in `<base>.json` are kept in front of the new ones.
 *
 * Any write failure is a FatalInfrastructureError and stops the batch.
 */

import { mkdir, readFile, writeFile } from 'fs/promises';
import path from 'path';
import { DateTime } from 'luxon';
import { z } from 'zod';
import type { ResultSink } from '../batchRunner';
import { FatalInfrastructureError, getErrorMessage } from '../core/errors';
import { Logger } from '../core/logger';
import type { BatchResult, ProfileRecord, TargetFailure } from '../core/types';
import { FAILURE_REASONS, NUMERIC_FIELDS, PROFILE_FIELDS } from '../core/types';

const logger = new Logger('DataExporter');

// ─── Record schema (append mode) ────────────────────────────

const fieldValueSchema = z.discriminatedUnion('status', [
  z.object({
    status: z.literal('extracted'),
    value: z.string(),
    normalized: z.number().optional(),
    source: z.enum(['attribute', 'pattern', 'reveal']),
  }),
  z.object({ status: z.literal('unavailable-public') }),
  z.object({ status: z.literal('unavailable-auth') }),
  z.object({ status: z.literal('extraction-failed'), reason: z.enum(FAILURE_REASONS) }),
]);

const profileRecordSchema = z.object({
  channelUrl: z.string(),
  channelHandle: z.string(),
  scrapedAt: z.string(),
  fields: z.object({
    channelName: fieldValueSchema,
    subscribers: fieldValueSchema,
    videoCount: fieldValueSchema,
    totalViews: fieldValueSchema,
    joinedDate: fieldValueSchema,
    country: fieldValueSchema,
    description: fieldValueSchema,
    email: fieldValueSchema,
  }),
  socialLinks: z.record(z.string()),
});

// ─── CSV flattening ─────────────────────────────────────────

/** Leading CSV columns; everything else follows alphabetically. */
export const PRIORITY_COLUMNS = [
  'channel_url',
  'channel_handle',
  'channel_name',
  'email',
  'subscribers',
  'video_count',
  'total_views',
  'joined_date',
  'country',
  'description',
  'social_links',
  'scraped_at',
];

function snakeCase(name: string): string {
  return name.replace(/[A-Z]/g, (c) => `_${c.toLowerCase()}`);
}

function socialColumn(label: string): string {
  const slug = label
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '_')
    .replace(/^_+|_+$/g, '');
  return `social_${slug || 'link'}`;
}

/**
 * One CSV row for `record`.  Fields that were not extracted render as a
 * bracketed marker, e.g. `[unavailable-auth]` or
 * `[extraction-failed:challenge-timed-out]`; numeric fields also get a
 * `<column>_number` column with the normalized value.
 */
export function flattenRecord(record: ProfileRecord): Record<string, string> {
  const row: Record<string, string> = {
    channel_url: record.channelUrl,
    channel_handle: record.channelHandle,
    scraped_at: record.scrapedAt,
  };

  for (const field of PROFILE_FIELDS) {
    const column = snakeCase(field);
    const value = record.fields[field];

    switch (value.status) {
      case 'extracted':
        row[column] = value.value;
        if (NUMERIC_FIELDS.includes(field) && value.normalized !== undefined) {
          row[`${column}_number`] = String(value.normalized);
        }
        break;
      case 'extraction-failed':
        row[column] = `[extraction-failed:${value.reason}]`;
        break;
      default:
        row[column] = `[${value.status}]`;
    }
  }

  const links = Object.entries(record.socialLinks);
  row.social_links = links.map(([label, url]) => `${label}: ${url}`).join('; ');
  for (const [label, url] of links) {
    const column = socialColumn(label);
    if (!(column in row)) row[column] = url;
  }

  return row;
}

export function csvEscape(value: string): string {
  return /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

/** Header = union of all row columns, priority columns first. */
export function toCsv(records: ProfileRecord[]): string {
  const rows = records.map(flattenRecord);
  const columns = new Set(rows.flatMap((row) => Object.keys(row)));

  const header = PRIORITY_COLUMNS.filter((c) => columns.has(c));
  const rest = [...columns].filter((c) => !PRIORITY_COLUMNS.includes(c)).sort();
  const ordered = [...header, ...rest];

  const lines = [
    ordered.map(csvEscape).join(','),
    ...rows.map((row) => ordered.map((c) => csvEscape(row[c] ?? '')).join(',')),
  ];
  return `${lines.join('\n')}\n`;
}

// ─── Summary ────────────────────────────────────────────────

export interface RunSummary {
  total: number;
  succeeded: number;
  failed: TargetFailure[];
  interrupted: boolean;
  emailsFound: number;
  /** Null while the run is still in progress. */
  finishedAt: string | null;
}

export function summarize(result: BatchResult, finishedAt: string | null): RunSummary {
  return {
    total: result.succeeded.length + result.failed.length,
    succeeded: result.succeeded.length,
    failed: result.failed,
    interrupted: result.interrupted,
    emailsFound: result.succeeded.filter((r) => r.fields.email.status === 'extracted').length,
    finishedAt,
  };
}

// ─── Exporter ───────────────────────────────────────────────

export interface DataExporterOptions {
  outputDir: string;
  /** File name without extension; defaults to `youtube_channels_<timestamp>`. */
  baseName?: string;
  /** Keep records already in `<base>.json`. */
  append?: boolean;
  now?: () => number;
}

export class DataExporter implements ResultSink {
  readonly jsonPath: string;
  readonly csvPath: string;
  readonly summaryPath: string;

  private readonly now: () => number;
  private existing: ProfileRecord[] = [];

  constructor(private readonly options: DataExporterOptions) {
    this.now = options.now ?? Date.now;
    const base =
      options.baseName ??
      `youtube_channels_${DateTime.fromMillis(this.now()).toFormat('yyyyMMdd_HHmmss')}`;

    this.jsonPath = path.join(options.outputDir, `${base}.json`);
    this.csvPath = path.join(options.outputDir, `${base}.csv`);
    this.summaryPath = path.join(options.outputDir, `${base}.summary.json`);
  }

  /**
   * Create the output directory and, in append mode, load the records
   * already exported under the same name.
   */
  async init(): Promise<void> {
    try {
      await mkdir(this.options.outputDir, { recursive: true });
    } catch (err) {
      throw new FatalInfrastructureError(
        `Cannot create output directory ${this.options.outputDir}: ${getErrorMessage(err)}`,
        err,
      );
    }

    if (this.options.append) {
      this.existing = await this.loadExisting();
    }
  }

  async flush(result: BatchResult): Promise<void> {
    const records = [...this.existing, ...result.succeeded];
    await this.write(this.jsonPath, `${JSON.stringify(records, null, 2)}\n`);
    await this.write(this.csvPath, toCsv(records));
    await this.writeSummary(summarize(result, null));
    logger.debug(
      `Flushed ${records.length} record(s) and ${result.failed.length} failure(s) to ${this.options.outputDir}`,
    );
  }

  async complete(result: BatchResult): Promise<void> {
    const finishedAt = DateTime.fromMillis(this.now()).toFormat('yyyy-MM-dd HH:mm:ss');
    const summary = summarize(result, finishedAt);
    await this.writeSummary(summary);

    logger.info(`✓ Exported ${result.succeeded.length} channel(s) to ${this.jsonPath}`);
    logger.info(`  CSV: ${this.csvPath}`);
    if (this.existing.length > 0) {
      logger.info(`  Total channels in file: ${this.existing.length + result.succeeded.length}`);
    }
    logger.info(
      `  ${summary.emailsFound}/${summary.succeeded} e-mail(s) found, ${summary.failed.length} failure(s)`,
    );
  }

  // ── Internals ──────────────────────────────────────────

  private async loadExisting(): Promise<ProfileRecord[]> {
    let raw: string;
    try {
      raw = await readFile(this.jsonPath, 'utf-8');
    } catch (err) {
      if (isMissingFile(err)) return [];
      throw new FatalInfrastructureError(
        `Cannot read ${this.jsonPath}: ${getErrorMessage(err)}`,
        err,
      );
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (err) {
      throw new FatalInfrastructureError(`${this.jsonPath} is not valid JSON`, err);
    }

    const parsed = z.array(profileRecordSchema).safeParse(json);
    if (!parsed.success) {
      throw new FatalInfrastructureError(
        `${this.jsonPath} does not hold exported profile records; ` +
          'choose another --output name or disable append',
      );
    }

    logger.info(`Appending to ${parsed.data.length} existing record(s) in ${this.jsonPath}`);
    return parsed.data;
  }

  private async writeSummary(summary: RunSummary): Promise<void> {
    await this.write(this.summaryPath, `${JSON.stringify(summary, null, 2)}\n`);
  }

  private async write(file: string, content: string): Promise<void> {
    try {
      await writeFile(file, content, 'utf-8');
    } catch (err) {
      throw new FatalInfrastructureError(`Cannot write ${file}: ${getErrorMessage(err)}`, err);
    }
  }
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}
