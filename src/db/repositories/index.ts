export { StatusRepository, DEFAULT_STATUSES } from './status-repository.js';
export type { ApplicationStatus } from './status-repository.js';
export { TitleRepository } from './title-repository.js';
export { SprintRepository } from './sprint-repository.js';
export type { NewSprint, SprintUpdate } from './sprint-repository.js';
export { JobRepository, escapeLike } from './job-repository.js';
export type { NewJob, JobUpdate } from './job-repository.js';
export { InterviewStageRepository } from './interview-stage-repository.js';
export type { NewInterviewStage, InterviewStageUpdate } from './interview-stage-repository.js';
export { STAGE_STATUSES } from './types.js';
export type {
  SprintRow,
  StatusRow,
  TitleRow,
  JobRow,
  InterviewStageRow,
  StageStatus,
  ListedJob,
  JobFilter,
  LabelCount,
  InsightRow,
} from './types.js';
