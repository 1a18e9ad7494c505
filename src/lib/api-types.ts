import { relative } from 'node:path';
import type { JobRecord, JobResult, JobStatus, SessionInfo, SessionKind } from './types';

/** Successful single-item response */
export interface ApiResponse<T> {
  data: T;
}

/** Error response */
export interface ApiErrorResponse {
  error: {
    code: string;
    message: string;
    context?: Record<string, unknown>;
  };
}

// ---- Wire shapes (snake_case, as polled by clients) ----

export interface SubmitJobResponse {
  job_id: string;
  status: 'started';
}

export interface JobResultView {
  artifacts: string[];
  /** Paths relative to the job's output directory. */
  report_file?: string;
  csv_file?: string;
  alt_texts: Record<string, string>;
  images_processed?: number;
  exit_code: number | null;
  partial: boolean;
  warnings: string[];
}

export interface JobView {
  job_id: string;
  kind: JobRecord['kind'];
  status: JobStatus;
  percent: number;
  message: string;
  phase?: string;
  current_image?: number;
  total_images?: number;
  created_at: string;
  updated_at: string;
  finished_at?: string;
  result?: JobResultView;
  error?: string;
}

export interface SessionView {
  session_id: string;
  kind: SessionKind;
  created_at: string;
  last_accessed_at: string;
  age_hours: number;
}

export interface SessionListResponse {
  data: SessionView[];
  counts: Record<SessionKind, number>;
}

function toResultView(result: JobResult): JobResultView {
  const view: JobResultView = {
    artifacts: result.artifacts,
    alt_texts: result.altTexts,
    exit_code: result.exitCode,
    partial: result.partial,
    warnings: result.warnings,
  };
  if (result.reportPath) view.report_file = relative(result.outputDir, result.reportPath);
  if (result.csvPath) view.csv_file = relative(result.outputDir, result.csvPath);
  if (result.imagesProcessed !== undefined) view.images_processed = result.imagesProcessed;
  return view;
}

/** Public view of a job. Absolute filesystem paths never leave the server. */
export function toJobView(job: JobRecord): JobView {
  const view: JobView = {
    job_id: job.jobId,
    kind: job.kind,
    status: job.status,
    percent: job.percent,
    message: job.message,
    created_at: new Date(job.createdAt).toISOString(),
    updated_at: new Date(job.updatedAt).toISOString(),
  };
  if (job.phase !== undefined) view.phase = job.phase;
  if (job.currentImage !== undefined) view.current_image = job.currentImage;
  if (job.totalImages !== undefined) view.total_images = job.totalImages;
  if (job.finishedAt !== undefined) view.finished_at = new Date(job.finishedAt).toISOString();
  if (job.result) view.result = toResultView(job.result);
  if (job.error !== undefined) view.error = job.error;
  return view;
}

export function toSessionView(session: SessionInfo): SessionView {
  return {
    session_id: session.sessionId,
    kind: session.kind,
    created_at: new Date(session.createdAt).toISOString(),
    last_accessed_at: new Date(session.lastAccessedAt).toISOString(),
    age_hours: Math.round(session.ageHours * 100) / 100,
  };
}
