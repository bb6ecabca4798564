export type ScrollDirection = 'top' | 'bottom' | 'up' | 'down';

export type Interaction =
  | { type: 'click'; selector: string }
  | { type: 'fill'; selector: string; value: string }
  | { type: 'wait'; duration: number }
  | { type: 'scroll'; direction: ScrollDirection };

export type TargetSchema = Record<string, unknown>;

export interface JobOptions {
  pagination: boolean;
  maxPages: number;
}

export interface ExtractionJobConfig {
  url: string;
  schema: TargetSchema;
  interactions: Interaction[];
  options: JobOptions;
}

export interface QualityReport {
  totalItems: number;
  completeItems: number;
  completionRate: number;
  missingFields: string[];
  errors: string[];
}

export type JobStatus = 'success' | 'error';

export interface ExtractionResult {
  status: JobStatus;
  data: Record<string, unknown>;
  qualityReport: QualityReport | null;
  error?: string;
  pagesProcessed: number;
}

export type JobState =
  | 'START'
  | 'NAVIGATED'
  | 'INTERACTED'
  | 'EXTRACTING'
  | 'STRUCTURED'
  | 'SCORED'
  | 'DONE'
  | 'ERROR';
