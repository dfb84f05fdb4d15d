import type { MetadataValue } from 'shared'
import type { JobStatus, ScoreSorting, TaskType } from './enums.js'

// Isolated Cloud Tasks queue that carries only this competition's runs.
export type CompetitionQueue = {
  queueId: string
}

export type Competition = {
  competitionId: string
  title: string
  forceSubmissionToLeaderboard: boolean
  queue?: CompetitionQueue
}

export type Phase = {
  phaseId: string
  competitionId: string
  phaseNumber: number
  executionTimeLimit: number
  inputData?: string
  referenceData?: string
  scoringProgram?: string
  isBlind: boolean
  isScoringOnly: boolean
  forceBestSubmissionToLeaderboard: boolean
  autoMigration: boolean
}

export type ScoreDef = {
  scoreDefId: string
  competitionId: string
  key: string
  label: string
  sorting: ScoreSorting
  ordering: number
  selectionDefault: boolean
}

export type SubmissionScore = {
  submissionId: string
  phaseId: string
  scoreDefId: string
  value: number
}

export type LeaderboardEntry = {
  phaseId: string
  submissionId: string
  addedAt: string
}

export type EvaluationTaskArgs = {
  submissionId: string
  predict: boolean
}

export type Job = {
  jobId: string
  taskType: TaskType
  taskArgs: EvaluationTaskArgs
  status: JobStatus
  createdAt: string
  updatedAt: string
}

export type MetadataKind = 'predict' | 'score'

export type SubmissionMetadata = {
  submissionId: string
  kind: MetadataKind
  fields: Record<string, MetadataValue>
  updatedAt: string
}

export type DownloadRecord = {
  competitionId: string
  submissionId: string
  submissionOwner: string
  downloadedBy: string
  downloadedAt: string
}
