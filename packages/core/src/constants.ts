export const TITLE_MAX_LENGTH = 100;
export const DESCRIPTION_MAX_LENGTH = 500;
export const MAX_TAGS = 5;

export const DEFAULT_PAGE = 1;
export const DEFAULT_PAGE_SIZE = 10;
export const MAX_PAGE_SIZE = 100;

/** Seconds of simulated work a job may be started with */
export const JOB_DURATION_MIN = 1;
export const JOB_DURATION_MAX = 60;

export const DEFAULT_JOB_STEP_MS = 1000;
export const DEFAULT_MAX_CONCURRENT_JOBS = 8;
