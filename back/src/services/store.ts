import type { MetadataValue } from 'shared'
import type { JobStatus, TaskType } from '../domain/enums.js'
import type {
  NewSubmission,
  StatusChange,
  Submission,
  SubmissionPatch,
  TransitionResult
} from '../domain/submissions.js'
import type {
  Competition,
  DownloadRecord,
  EvaluationTaskArgs,
  Job,
  LeaderboardEntry,
  MetadataKind,
  Phase,
  ScoreDef,
  SubmissionMetadata,
  SubmissionScore
} from '../domain/types.js'

export type StatusDecision = (current: Submission) => StatusChange | null

export type PatchDecision = (current: Submission) => SubmissionPatch

/**
 * Persistence port for the evaluation pipeline.
 *
 * `transitionSubmission` and `patchSubmission` each run as one atomic unit of
 * work holding a write lock on the submission record.
 */
export interface EvaluationStore {
  getSubmission(submissionId: string): Promise<Submission | null>
  getPhase(phaseId: string): Promise<Phase | null>
  getCompetition(competitionId: string): Promise<Competition | null>
  listPhases(competitionId: string): Promise<Phase[]>
  listPhaseSubmissions(phaseId: string): Promise<Submission[]>
  countParticipantSubmissions(phaseId: string, participantId: string): Promise<number>
  createSubmission(input: NewSubmission): Promise<Submission>

  transitionSubmission(submissionId: string, decide: StatusDecision): Promise<TransitionResult>
  patchSubmission(submissionId: string, decide: PatchDecision): Promise<Submission>

  createJob(taskType: TaskType, taskArgs: EvaluationTaskArgs): Promise<Job>
  getJob(jobId: string): Promise<Job | null>
  setJobStatus(jobId: string, status: JobStatus): Promise<void>

  listScoreDefs(competitionId: string): Promise<ScoreDef[]>
  findScoreDef(competitionId: string, key: string): Promise<ScoreDef | null>
  saveScore(score: SubmissionScore): Promise<void>
  listPhaseScores(phaseId: string, scoreDefId?: string): Promise<SubmissionScore[]>

  addToLeaderboard(phaseId: string, submissionId: string): Promise<LeaderboardEntry>
  listLeaderboard(phaseId: string): Promise<LeaderboardEntry[]>

  upsertSubmissionMetadata(
    submissionId: string,
    kind: MetadataKind,
    fields: Record<string, MetadataValue>
  ): Promise<SubmissionMetadata>

  listDownloads(competitionId: string): Promise<DownloadRecord[]>
}

export const getDefaultScoreDef = (defs: ScoreDef[]): ScoreDef | null => {
  const explicit = defs.find((def) => def.selectionDefault)
  if (explicit) return explicit
  const sorted = [...defs].sort((left, right) => left.ordering - right.ordering)
  return sorted[0] ?? null
}

// Continues after both the participant's counter and any numbers already stored in the phase.
export const nextSubmissionNumber = (
  lastCounted: number | undefined,
  existingNumbers: readonly number[]
): number => Math.max(lastCounted ?? 0, ...existingNumbers) + 1
