import fs from 'node:fs';
import { getLogger } from '../../utils/logger.js';
import { BOM, parseCsv, rowToRecord, stringifyCsv } from '../../utils/csv.js';
import { analyzeContent, type ContentAnalysis } from '../scoring/content-analysis.js';
import type { ContentEngine } from './engine.js';

const log = getLogger();

export const BACKUP_SUFFIX = '.bak';

export const ANALYSIS_COLUMNS = [
  'Cleaned_Content',
  'Original_Sentiment_Score',
  'Original_Sentiment_Label',
  'Optimized_Content',
  'Optimized_Sentiment_Score',
  'Optimized_Sentiment_Label',
  'Readability',
  'Trend_Relevance',
  'Engagement_Score',
  'Hashtag_Count',
  'Contains_CTA',
] as const;

type AnalysisColumn = (typeof ANALYSIS_COLUMNS)[number];

/** Input columns and the value a missing one is filled with. */
const INPUT_COLUMNS: ReadonlyArray<[string, string]> = [
  ['Generated_Content', ''],
  ['Topic', 'General'],
  ['Platform', 'unknown'],
];

export class ContentFileError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ContentFileError';
  }
}

export interface RowFailure {
  /** 1-based data row number */
  row: number;
  error: string;
}

export interface BatchResult {
  filePath: string;
  backupPath: string | null;
  rows: number;
  failures: RowFailure[];
}

export type ContentAnalyzer = (text: unknown, engine: ContentEngine) => ContentAnalysis;

function analysisCells(analysis: ContentAnalysis): Record<AnalysisColumn, string> {
  return {
    Cleaned_Content: analysis.cleaned,
    Original_Sentiment_Score: String(analysis.originalSentiment.polarity),
    Original_Sentiment_Label: analysis.originalSentiment.label,
    Optimized_Content: analysis.optimized,
    Optimized_Sentiment_Score: String(analysis.optimizedSentiment.polarity),
    Optimized_Sentiment_Label: analysis.optimizedSentiment.label,
    Readability: analysis.readability,
    Trend_Relevance: String(analysis.trendRelevance),
    Engagement_Score: String(analysis.engagementScore),
    Hashtag_Count: String(analysis.hashtags.length),
    Contains_CTA: analysis.containsCta ? 'True' : 'False',
  };
}

function backup(filePath: string): string | null {
  const backupPath = filePath + BACKUP_SUFFIX;
  try {
    fs.copyFileSync(filePath, backupPath);
    log.info({ backupPath }, 'Backup created');
    return backupPath;
  } catch (err) {
    log.warn({ err, backupPath }, 'Could not create backup, continuing without one');
    return null;
  }
}

/**
 * Analyze and optimize every row of a content CSV in place. Missing input
 * columns are added with defaults; analysis columns are added or overwritten.
 * A row that fails keeps empty analysis cells and is reported in the result.
 */
export function optimizeContentFile(
  filePath: string,
  engine: ContentEngine,
  analyze: ContentAnalyzer = analyzeContent,
): BatchResult {
  if (!fs.existsSync(filePath)) {
    throw new ContentFileError(`Content file not found: ${filePath}`);
  }

  const backupPath = backup(filePath);

  let table: string[][];
  try {
    table = parseCsv(fs.readFileSync(filePath, 'utf-8'));
  } catch (err) {
    throw new ContentFileError(`Could not read content file ${filePath}`, { cause: err });
  }

  const [sourceHeader = [], ...sourceRows] = table;
  const header = [...sourceHeader];
  for (const [column] of INPUT_COLUMNS) {
    if (!header.includes(column)) {
      if (column === 'Generated_Content') log.warn('Column Generated_Content not found, treating every row as empty');
      header.push(column);
    }
  }
  for (const column of ANALYSIS_COLUMNS) {
    if (!header.includes(column)) header.push(column);
  }

  const failures: RowFailure[] = [];
  const output = sourceRows.map((row, index) => {
    const record = rowToRecord(sourceHeader, row);
    for (const [column, fallback] of INPUT_COLUMNS) {
      if (!(column in record)) record[column] = fallback;
    }

    try {
      Object.assign(record, analysisCells(analyze(record['Generated_Content'], engine)));
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      failures.push({ row: index + 1, error: message });
      log.error({ row: index + 1, err }, 'Row analysis failed');
      for (const column of ANALYSIS_COLUMNS) record[column] = '';
    }

    log.debug({ row: index + 1, topic: record['Topic'], platform: record['Platform'] }, 'Row processed');
    return header.map(column => record[column] ?? '');
  });

  try {
    fs.writeFileSync(filePath, BOM + stringifyCsv([header, ...output]), 'utf-8');
  } catch (err) {
    throw new ContentFileError(`Could not write content file ${filePath}`, { cause: err });
  }

  log.info({ filePath, rows: output.length, failed: failures.length }, 'Content file optimized');
  return { filePath, backupPath, rows: output.length, failures };
}
