import fsPromises from 'node:fs/promises';
import path from 'node:path';
import type { ScanResult, ScanSummary } from '../schemas/output.schema.js';
import { prettyPrint } from '../utils/serializer.js';
import { resultsToCsv } from './csv-export.js';
import { renderHtmlReport } from './html-report.js';

export interface WrittenReports {
  summary: string;
  detailed: string;
  csv: string;
  /** Absent when no result is end-of-life */
  eolOnly?: string;
  html: string;
}

/** Artifact file names for one run; all embed the same timestamp. */
export function reportFileNames(timestamp: string): Required<WrittenReports> {
  return {
    summary: `summary_${timestamp}.json`,
    detailed: `detailed_results_${timestamp}.json`,
    csv: `eol_report_${timestamp}.csv`,
    eolOnly: `eol_packages_${timestamp}.csv`,
    html: `eol_report_${timestamp}.html`,
  };
}

/**
 * Write every artifact for one scanned file into `outputDir` (created when
 * missing) and return the paths written.
 */
export async function writeReports(
  results: readonly ScanResult[],
  summary: ScanSummary,
  outputDir: string,
  timestamp: string,
): Promise<WrittenReports> {
  await fsPromises.mkdir(outputDir, { recursive: true });
  const names = reportFileNames(timestamp);
  const target = (name: string): string => path.join(outputDir, name);

  const written: WrittenReports = {
    summary: target(names.summary),
    detailed: target(names.detailed),
    csv: target(names.csv),
    html: target(names.html),
  };

  await fsPromises.writeFile(written.summary, `${prettyPrint(summary)}\n`, 'utf-8');
  await fsPromises.writeFile(written.detailed, `${prettyPrint(results)}\n`, 'utf-8');
  await fsPromises.writeFile(written.csv, resultsToCsv(results), 'utf-8');

  const eolResults = results.filter((r) => r.supportStatus === 'eol');
  if (eolResults.length > 0) {
    written.eolOnly = target(names.eolOnly);
    await fsPromises.writeFile(written.eolOnly, resultsToCsv(eolResults), 'utf-8');
  }

  await fsPromises.writeFile(written.html, renderHtmlReport(results, summary, timestamp), 'utf-8');

  return written;
}
