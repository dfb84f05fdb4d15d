export const SubmissionStatus = {
  SUBMITTED: 'SUBMITTED',
  RUNNING: 'RUNNING',
  FINISHED: 'FINISHED',
  FAILED: 'FAILED',
  CANCELLED: 'CANCELLED'
} as const

export type SubmissionStatus = (typeof SubmissionStatus)[keyof typeof SubmissionStatus]

export const CallbackStatus = {
  RUNNING: 'running',
  FINISHED: 'finished',
  FAILED: 'failed'
} as const

export type CallbackStatus = (typeof CallbackStatus)[keyof typeof CallbackStatus]

export const JobStatus = {
  PENDING: 'pending',
  RUNNING: 'running',
  FINISHED: 'finished',
  FAILED: 'failed'
} as const

export type JobStatus = (typeof JobStatus)[keyof typeof JobStatus]

export const TaskType = {
  EVALUATE_SUBMISSION: 'evaluate_submission',
  RUN: 'run'
} as const

export type TaskType = (typeof TaskType)[keyof typeof TaskType]

export const ScoreSorting = {
  ASC: 'asc',
  DESC: 'desc'
} as const

export type ScoreSorting = (typeof ScoreSorting)[keyof typeof ScoreSorting]

export const SignPermission = {
  READ: 'read',
  WRITE: 'write'
} as const

export type SignPermission = (typeof SignPermission)[keyof typeof SignPermission]

export const StorageBackendKind = {
  GCS: 'gcs',
  LOCAL: 'local'
} as const

export type StorageBackendKind = (typeof StorageBackendKind)[keyof typeof StorageBackendKind]
