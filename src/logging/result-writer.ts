import { writeFile } from 'node:fs/promises';
import type { ExtractionResult, QualityReport } from '../types/index.js';

export interface QualityReportFile {
  total_items: number;
  complete_items: number;
  completion_rate: number;
  missing_fields: string[];
  errors: string[];
}

export interface JobResultFile {
  status: ExtractionResult['status'];
  data: Record<string, unknown>;
  quality_report: QualityReportFile | Record<string, never>;
  error?: string;
}

function toQualityReportFile(report: QualityReport): QualityReportFile {
  return {
    total_items: report.totalItems,
    complete_items: report.completeItems,
    completion_rate: report.completionRate,
    missing_fields: report.missingFields,
    errors: report.errors,
  };
}

export function toJobResultFile(result: ExtractionResult): JobResultFile {
  const file: JobResultFile = {
    status: result.status,
    data: result.data,
    quality_report: result.qualityReport ? toQualityReportFile(result.qualityReport) : {},
  };
  if (result.error !== undefined) {
    file.error = result.error;
  }
  return file;
}

export async function writeJobResult(path: string, result: ExtractionResult): Promise<void> {
  const json = JSON.stringify(toJobResultFile(result), null, 2);
  await writeFile(path, `${json}\n`, 'utf-8');
}

/**
 * One-line summary for the end of a batch run, e.g. `12 items, 83.3% complete`.
 */
export function summarizeResult(result: ExtractionResult): string {
  if (result.status === 'error' || !result.qualityReport) {
    return `failed: ${result.error ?? 'unknown error'}`;
  }
  const { totalItems, completionRate } = result.qualityReport;
  const percent = (completionRate * 100).toFixed(1);
  return `${totalItems} items, ${percent}% complete`;
}
