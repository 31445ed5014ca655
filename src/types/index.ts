export type JobStatus =
  | 'submitted'
  | 'closed'
  | 'timeout'
  | 'skipped_no_easy_apply'
  | 'skipped_excluded'
  | 'unknown';

export type ApplyOutcome = 'submitted' | 'closed' | 'timeout' | 'interrupted';

export interface AppliedJobRecord {
  status: JobStatus | string;
  title: string | null;
  company: string | null;
  url: string | null;
  updated_at: string;
}

export interface AppliedJobsState {
  jobs: Record<string, AppliedJobRecord>;
}

export interface JobCard {
  index: number;
  id: string | null;
}

export interface JobDetails {
  title: string | null;
  company: string | null;
  url: string;
}

export type EasyApplyOpenResult = 'opened' | 'missing' | 'failed';

export interface JobBoard {
  listCards(): Promise<JobCard[]>;
  openCard(card: JobCard): Promise<boolean>;
  readDetails(): Promise<JobDetails>;
  openEasyApply(): Promise<EasyApplyOpenResult>;
  hasOpenDialog(): Promise<boolean>;
  loadMore(): Promise<void>;
}

export type ModalAction = 'submit' | 'review' | 'next';

export interface EasyApplyModal {
  isOpen(): Promise<boolean>;
  visibleAction(): Promise<ModalAction | null>;
  click(action: Exclude<ModalAction, 'submit'>): Promise<void>;
  hasValidationError(): Promise<boolean>;
  fillKnownFields(): Promise<number>;
  dismissDone(): Promise<void>;
}

export interface FormAnswer {
  label: string;
  value: string;
}

export interface SearchFilters {
  location?: string;
  distance?: string | null;
  time_posted?: string;
  easy_apply?: boolean;
}

export interface BehaviorConfig {
  pause_on_unfilled: boolean;
  max_idle_seconds: number;
  fill_known_fields: boolean;
  max_jobs: number;
  exclude_keywords: string[];
  typing_delay_ms: number;
}

export interface BotConfig {
  browser: {
    cdp_url: string;
    jobs_url_pattern: string;
    default_timeout_ms: number;
  };
  filters: SearchFilters;
  behavior: BehaviorConfig;
  state: {
    file: string;
  };
  answers: FormAnswer[];
}

export interface RunStats {
  processed: number;
  skippedSeen: number;
  outcomes: Record<string, number>;
}
