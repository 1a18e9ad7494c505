// ---- Job types ----

export const JOB_STATUSES = ['starting', 'running', 'complete', 'error'] as const;
export type JobStatus = (typeof JOB_STATUSES)[number];

export const JOB_KINDS = ['page-analysis', 'batch-compare'] as const;
export type JobKind = (typeof JOB_KINDS)[number];

/** Summary produced by result extraction once a job's analyzer has exited. */
export interface JobResult {
  /** Artifact file names found in the job's output directory. */
  artifacts: string[];
  outputDir: string;
  reportPath?: string;
  csvPath?: string;
  /** image_id -> proposed alt text, read from the generated JSON files. */
  altTexts: Record<string, string>;
  imagesProcessed?: number;
  exitCode: number | null;
  /** True when artifacts were found but the analyzer exited non-zero. */
  partial: boolean;
  warnings: string[];
}

export interface JobRecord {
  jobId: string;
  kind: JobKind;
  sessionId: string;
  status: JobStatus;
  percent: number;
  message: string;
  phase?: string;
  currentImage?: number;
  totalImages?: number;
  createdAt: number;
  updatedAt: number;
  finishedAt?: number;
  result?: JobResult;
  error?: string;
}

export interface NewJob {
  kind: JobKind;
  sessionId: string;
}

/** Progress fields a snapshot may carry into a JobRecord. */
export type JobProgressPatch = Partial<
  Pick<JobRecord, 'percent' | 'message' | 'phase' | 'currentImage' | 'totalImages'>
>;

// ---- Progress channel ----

export interface ProgressSnapshot {
  percent?: number;
  message?: string;
  phase?: string;
  currentImage?: number;
  totalImages?: number;
  timestamp?: number;
}

// ---- Session types ----

export const SESSION_KINDS = ['web', 'cli'] as const;
export type SessionKind = (typeof SESSION_KINDS)[number];

export interface SessionRecord {
  sessionId: string;
  kind: SessionKind;
  createdAt: number;
  lastAccessedAt: number;
}

export interface SessionDirectories {
  root: string;
  images: string;
  context: string;
  altText: string;
  reports: string;
}

export interface JobDirectories extends SessionDirectories {
  /** `<session>/reports/<jobId>`; owned by one job alone. */
  output: string;
}

export interface SessionInfo extends SessionRecord {
  ageHours: number;
}

export interface ExpiryReport {
  removed: string[];
  failed: Array<{ sessionId: string; error: string }>;
}
