import type { MetadataValue } from 'shared'
import { JobStatus, SubmissionStatus } from '../domain/enums.js'
import type { TaskType } from '../domain/enums.js'
import { assertExecutionKeyGrows } from '../domain/phaseProgress.js'
import type { NewSubmission, Submission, TransitionResult } from '../domain/submissions.js'
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
import type { EvaluationStore, PatchDecision, StatusDecision } from '../services/store.js'
import { nextSubmissionNumber } from '../services/store.js'
import { AppError, ErrorCodes } from '../utils/errors.js'

const clone = <T>(value: T): T => structuredClone(value)

/** In-process stand-in for the Firestore repository, with per-submission locking. */
export class MemoryStore implements EvaluationStore {
  readonly submissions = new Map<string, Submission>()
  readonly phases = new Map<string, Phase>()
  readonly competitions = new Map<string, Competition>()
  readonly jobs = new Map<string, Job>()
  readonly scoreDefs: ScoreDef[] = []
  readonly scores = new Map<string, SubmissionScore>()
  readonly leaderboard = new Map<string, LeaderboardEntry>()
  readonly metadata = new Map<string, SubmissionMetadata>()
  readonly downloads: DownloadRecord[] = []
  readonly statusWrites: Array<{ submissionId: string; status: SubmissionStatus }> = []
  leaderboardWrites = 0

  private readonly locks = new Map<string, Promise<unknown>>()
  private sequence = 0

  private async withLock<T>(key: string, work: () => Promise<T> | T): Promise<T> {
    const previous = this.locks.get(key) ?? Promise.resolve()
    const run = previous.then(work, work)
    this.locks.set(
      key,
      run.catch(() => undefined)
    )
    return run
  }

  private requireSubmission(submissionId: string): Submission {
    const submission = this.submissions.get(submissionId)
    if (!submission) {
      throw new AppError(ErrorCodes.SUBMISSION_NOT_FOUND, 'submission not found', 404, {
        submissionId
      })
    }
    return submission
  }

  addSubmission(submission: Submission): void {
    this.submissions.set(submission.submissionId, clone(submission))
  }

  async getSubmission(submissionId: string): Promise<Submission | null> {
    const submission = this.submissions.get(submissionId)
    return submission ? clone(submission) : null
  }

  async getPhase(phaseId: string): Promise<Phase | null> {
    const phase = this.phases.get(phaseId)
    return phase ? clone(phase) : null
  }

  async getCompetition(competitionId: string): Promise<Competition | null> {
    const competition = this.competitions.get(competitionId)
    return competition ? clone(competition) : null
  }

  async listPhases(competitionId: string): Promise<Phase[]> {
    return [...this.phases.values()]
      .filter((phase) => phase.competitionId === competitionId)
      .sort((left, right) => left.phaseNumber - right.phaseNumber)
      .map(clone)
  }

  async listPhaseSubmissions(phaseId: string): Promise<Submission[]> {
    return [...this.submissions.values()]
      .filter((submission) => submission.phaseId === phaseId)
      .map(clone)
  }

  async countParticipantSubmissions(phaseId: string, participantId: string): Promise<number> {
    return [...this.submissions.values()].filter(
      (submission) =>
        submission.phaseId === phaseId && submission.participant.participantId === participantId
    ).length
  }

  async createSubmission(input: NewSubmission): Promise<Submission> {
    this.sequence += 1
    const previousNumbers = [...this.submissions.values()]
      .filter(
        (submission) =>
          submission.phaseId === input.phaseId &&
          submission.participant.participantId === input.participant.participantId
      )
      .map((submission) => submission.submissionNumber)

    const submission: Submission = {
      submissionId: `sub_new_${this.sequence}`,
      competitionId: input.competitionId,
      phaseId: input.phaseId,
      participant: clone(input.participant),
      status: SubmissionStatus.SUBMITTED,
      executionKey: '',
      secret: `secret-new-${this.sequence}`,
      submissionNumber: nextSubmissionNumber(undefined, previousNumbers),
      submittedAt: new Date(Date.UTC(2026, 0, 1, 0, 0, this.sequence)).toISOString(),
      files: clone(input.files),
      downloadCount: 0,
      likeCount: 0,
      dislikeCount: 0,
      ...(input.dockerImage ? { dockerImage: input.dockerImage } : {})
    }
    this.submissions.set(submission.submissionId, submission)
    return clone(submission)
  }

  async transitionSubmission(
    submissionId: string,
    decide: StatusDecision
  ): Promise<TransitionResult> {
    return this.withLock(submissionId, () => {
      const current = this.requireSubmission(submissionId)
      const change = decide(clone(current))
      if (!change) {
        return { submissionId, previous: current.status, current: current.status, applied: false }
      }

      const previous = current.status
      this.submissions.set(submissionId, { ...current, ...change })
      this.statusWrites.push({ submissionId, status: change.status })
      return { submissionId, previous, current: change.status, applied: true }
    })
  }

  async patchSubmission(submissionId: string, decide: PatchDecision): Promise<Submission> {
    return this.withLock(submissionId, () => {
      const current = this.requireSubmission(submissionId)
      const patch = decide(clone(current))
      if (patch.executionKey !== undefined) {
        assertExecutionKeyGrows(current.executionKey, patch.executionKey)
      }

      const next: Submission = {
        ...current,
        ...(patch.files ? { files: { ...current.files, ...patch.files } } : {}),
        ...(patch.executionKey !== undefined ? { executionKey: patch.executionKey } : {}),
        ...(patch.exceptionDetails !== undefined ? { exceptionDetails: patch.exceptionDetails } : {})
      }
      this.submissions.set(submissionId, next)
      return clone(next)
    })
  }

  async createJob(taskType: TaskType, taskArgs: EvaluationTaskArgs): Promise<Job> {
    const jobId = `job_${this.jobs.size + 1}`
    const now = '2026-01-01T00:00:00.000Z'
    const job: Job = {
      jobId,
      taskType,
      taskArgs: clone(taskArgs),
      status: JobStatus.PENDING,
      createdAt: now,
      updatedAt: now
    }
    this.jobs.set(jobId, job)
    return clone(job)
  }

  async getJob(jobId: string): Promise<Job | null> {
    const job = this.jobs.get(jobId)
    return job ? clone(job) : null
  }

  async setJobStatus(jobId: string, status: JobStatus): Promise<void> {
    const job = this.jobs.get(jobId)
    if (job) {
      this.jobs.set(jobId, { ...job, status })
    }
  }

  async listScoreDefs(competitionId: string): Promise<ScoreDef[]> {
    return this.scoreDefs
      .filter((def) => def.competitionId === competitionId)
      .sort((left, right) => left.ordering - right.ordering)
      .map(clone)
  }

  async findScoreDef(competitionId: string, key: string): Promise<ScoreDef | null> {
    const def = this.scoreDefs.find((item) => item.competitionId === competitionId && item.key === key)
    return def ? clone(def) : null
  }

  async saveScore(score: SubmissionScore): Promise<void> {
    this.scores.set(`${score.submissionId}__${score.scoreDefId}`, clone(score))
  }

  async listPhaseScores(phaseId: string, scoreDefId?: string): Promise<SubmissionScore[]> {
    return [...this.scores.values()]
      .filter((score) => score.phaseId === phaseId)
      .filter((score) => scoreDefId === undefined || score.scoreDefId === scoreDefId)
      .map(clone)
  }

  async addToLeaderboard(phaseId: string, submissionId: string): Promise<LeaderboardEntry> {
    this.leaderboardWrites += 1
    const key = `${phaseId}__${submissionId}`
    const existing = this.leaderboard.get(key)
    if (existing) return clone(existing)

    const entry: LeaderboardEntry = { phaseId, submissionId, addedAt: '2026-01-01T00:00:00.000Z' }
    this.leaderboard.set(key, entry)
    return clone(entry)
  }

  async listLeaderboard(phaseId: string): Promise<LeaderboardEntry[]> {
    return [...this.leaderboard.values()].filter((entry) => entry.phaseId === phaseId).map(clone)
  }

  async upsertSubmissionMetadata(
    submissionId: string,
    kind: MetadataKind,
    fields: Record<string, MetadataValue>
  ): Promise<SubmissionMetadata> {
    const key = `${submissionId}__${kind}`
    const current = this.metadata.get(key)
    const metadata: SubmissionMetadata = {
      submissionId,
      kind,
      fields: { ...(current?.fields ?? {}), ...fields },
      updatedAt: '2026-01-01T00:00:00.000Z'
    }
    this.metadata.set(key, metadata)
    return clone(metadata)
  }

  async listDownloads(competitionId: string): Promise<DownloadRecord[]> {
    return this.downloads.filter((record) => record.competitionId === competitionId).map(clone)
  }
}
