import { Firestore } from '@google-cloud/firestore'
import type { MetadataValue } from 'shared'
import type { AppConfig } from '../config.js'
import { requireSetting } from '../config.js'
import { JobStatus, SubmissionStatus } from '../domain/enums.js'
import { assertExecutionKeyGrows } from '../domain/phaseProgress.js'
import type { TaskType } from '../domain/enums.js'
import type {
  NewSubmission,
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
import { AppError, ErrorCodes } from '../utils/errors.js'
import { makeId, makeSecret } from '../utils/ids.js'
import type { EvaluationStore, PatchDecision, StatusDecision } from './store.js'
import { nextSubmissionNumber } from './store.js'

export const createFirestoreClient = (config: AppConfig): Firestore =>
  new Firestore({
    projectId: requireSetting(config.gcpProjectId, 'GCP_PROJECT_ID'),
    ...(config.firestoreDatabaseId ? { databaseId: config.firestoreDatabaseId } : {}),
    ignoreUndefinedProperties: true
  })

const nowIso = (): string => new Date().toISOString()

const toMillisOrZero = (value: string | undefined): number => {
  if (!value) return 0
  const parsed = Date.parse(value)
  return Number.isNaN(parsed) ? 0 : parsed
}

const scoreDocId = (submissionId: string, scoreDefId: string): string =>
  `${submissionId}__${scoreDefId}`

const leaderboardDocId = (phaseId: string, submissionId: string): string =>
  `${phaseId}__${submissionId}`

const metadataDocId = (submissionId: string, kind: MetadataKind): string =>
  `${submissionId}__${kind}`

const Collections = {
  SUBMISSIONS: 'submissions',
  PHASES: 'phases',
  COMPETITIONS: 'competitions',
  JOBS: 'jobs',
  SCORE_DEFS: 'scoreDefs',
  SCORES: 'scores',
  LEADERBOARD: 'leaderboard',
  METADATA: 'submissionMetadata',
  DOWNLOADS: 'downloads',
  PARTICIPANT_COUNTERS: 'participantCounters'
} as const

export class FirestoreRepo implements EvaluationStore {
  private readonly client: Firestore

  constructor(client: Firestore) {
    this.client = client
  }

  async getSubmission(submissionId: string): Promise<Submission | null> {
    const snap = await this.client.collection(Collections.SUBMISSIONS).doc(submissionId).get()
    if (!snap.exists) return null
    return snap.data() as Submission
  }

  async getPhase(phaseId: string): Promise<Phase | null> {
    const snap = await this.client.collection(Collections.PHASES).doc(phaseId).get()
    if (!snap.exists) return null
    return snap.data() as Phase
  }

  async getCompetition(competitionId: string): Promise<Competition | null> {
    const snap = await this.client.collection(Collections.COMPETITIONS).doc(competitionId).get()
    if (!snap.exists) return null
    return snap.data() as Competition
  }

  async listPhases(competitionId: string): Promise<Phase[]> {
    const snap = await this.client
      .collection(Collections.PHASES)
      .where('competitionId', '==', competitionId)
      .get()

    const phases = snap.docs.map((doc) => doc.data() as Phase)
    phases.sort((left, right) => left.phaseNumber - right.phaseNumber)
    return phases
  }

  async listPhaseSubmissions(phaseId: string): Promise<Submission[]> {
    const snap = await this.client
      .collection(Collections.SUBMISSIONS)
      .where('phaseId', '==', phaseId)
      .get()

    const submissions = snap.docs.map((doc) => doc.data() as Submission)
    submissions.sort(
      (left, right) => toMillisOrZero(left.submittedAt) - toMillisOrZero(right.submittedAt)
    )
    return submissions
  }

  async countParticipantSubmissions(phaseId: string, participantId: string): Promise<number> {
    const snap = await this.client
      .collection(Collections.SUBMISSIONS)
      .where('phaseId', '==', phaseId)
      .where('participant.participantId', '==', participantId)
      .count()
      .get()

    return snap.data().count
  }

  async createSubmission(input: NewSubmission): Promise<Submission> {
    const submissionId = makeId('sub')
    const counterRef = this.client
      .collection(Collections.PARTICIPANT_COUNTERS)
      .doc(`${input.phaseId}__${input.participant.participantId}`)
    const submissionRef = this.client.collection(Collections.SUBMISSIONS).doc(submissionId)

    const highestQuery = this.client
      .collection(Collections.SUBMISSIONS)
      .where('phaseId', '==', input.phaseId)
      .where('participant.participantId', '==', input.participant.participantId)
      .orderBy('submissionNumber', 'desc')
      .limit(1)

    return this.client.runTransaction(async (tx): Promise<Submission> => {
      const counterSnap = await tx.get(counterRef)
      // Submissions from the upload flow never touch the counter; fall back to the stored numbers.
      const existingNumbers = counterSnap.exists
        ? []
        : (await tx.get(highestQuery)).docs.map((doc) => Number(doc.get('submissionNumber') ?? 0))
      const lastCounted = counterSnap.exists
        ? Number((counterSnap.data() as { lastNumber?: number }).lastNumber ?? 0)
        : undefined

      const submission: Submission = {
        submissionId,
        competitionId: input.competitionId,
        phaseId: input.phaseId,
        participant: input.participant,
        status: SubmissionStatus.SUBMITTED,
        executionKey: '',
        secret: makeSecret(),
        submissionNumber: nextSubmissionNumber(lastCounted, existingNumbers),
        submittedAt: nowIso(),
        files: input.files,
        downloadCount: 0,
        likeCount: 0,
        dislikeCount: 0,
        ...(input.dockerImage ? { dockerImage: input.dockerImage } : {})
      }

      tx.set(counterRef, { lastNumber: submission.submissionNumber })
      tx.set(submissionRef, submission)
      return submission
    })
  }

  async transitionSubmission(
    submissionId: string,
    decide: StatusDecision
  ): Promise<TransitionResult> {
    return this.client.runTransaction(async (tx): Promise<TransitionResult> => {
      const submissionRef = this.client.collection(Collections.SUBMISSIONS).doc(submissionId)
      const snap = await tx.get(submissionRef)
      if (!snap.exists) {
        throw new AppError(ErrorCodes.SUBMISSION_NOT_FOUND, 'submission not found', 404, {
          submissionId
        })
      }

      const current = snap.data() as Submission
      const change = decide(current)
      if (!change) {
        return {
          submissionId,
          previous: current.status,
          current: current.status,
          applied: false
        }
      }

      tx.update(submissionRef, { ...change, updatedAt: nowIso() })
      return {
        submissionId,
        previous: current.status,
        current: change.status,
        applied: true
      }
    })
  }

  async patchSubmission(submissionId: string, decide: PatchDecision): Promise<Submission> {
    return this.client.runTransaction(async (tx): Promise<Submission> => {
      const submissionRef = this.client.collection(Collections.SUBMISSIONS).doc(submissionId)
      const snap = await tx.get(submissionRef)
      if (!snap.exists) {
        throw new AppError(ErrorCodes.SUBMISSION_NOT_FOUND, 'submission not found', 404, {
          submissionId
        })
      }

      const current = snap.data() as Submission
      const patch: SubmissionPatch = decide(current)
      if (patch.executionKey !== undefined) {
        assertExecutionKeyGrows(current.executionKey, patch.executionKey)
      }

      const next: Submission = {
        ...current,
        ...(patch.files ? { files: { ...current.files, ...patch.files } } : {}),
        ...(patch.executionKey !== undefined ? { executionKey: patch.executionKey } : {}),
        ...(patch.exceptionDetails !== undefined ? { exceptionDetails: patch.exceptionDetails } : {})
      }

      tx.update(submissionRef, {
        files: next.files,
        executionKey: next.executionKey,
        ...(next.exceptionDetails !== undefined ? { exceptionDetails: next.exceptionDetails } : {}),
        updatedAt: nowIso()
      })
      return next
    })
  }

  async createJob(taskType: TaskType, taskArgs: EvaluationTaskArgs): Promise<Job> {
    const now = nowIso()
    const job: Job = {
      jobId: makeId('job'),
      taskType,
      taskArgs,
      status: JobStatus.PENDING,
      createdAt: now,
      updatedAt: now
    }

    await this.client.collection(Collections.JOBS).doc(job.jobId).set(job)
    return job
  }

  async getJob(jobId: string): Promise<Job | null> {
    const snap = await this.client.collection(Collections.JOBS).doc(jobId).get()
    if (!snap.exists) return null
    return snap.data() as Job
  }

  async setJobStatus(jobId: string, status: JobStatus): Promise<void> {
    await this.client
      .collection(Collections.JOBS)
      .doc(jobId)
      .set({ status, updatedAt: nowIso() }, { merge: true })
  }

  async listScoreDefs(competitionId: string): Promise<ScoreDef[]> {
    const snap = await this.client
      .collection(Collections.SCORE_DEFS)
      .where('competitionId', '==', competitionId)
      .get()

    const defs = snap.docs.map((doc) => doc.data() as ScoreDef)
    defs.sort((left, right) => left.ordering - right.ordering)
    return defs
  }

  async findScoreDef(competitionId: string, key: string): Promise<ScoreDef | null> {
    const snap = await this.client
      .collection(Collections.SCORE_DEFS)
      .where('competitionId', '==', competitionId)
      .where('key', '==', key)
      .limit(1)
      .get()

    const doc = snap.docs[0]
    return doc ? (doc.data() as ScoreDef) : null
  }

  async saveScore(score: SubmissionScore): Promise<void> {
    await this.client
      .collection(Collections.SCORES)
      .doc(scoreDocId(score.submissionId, score.scoreDefId))
      .set(score)
  }

  async listPhaseScores(phaseId: string, scoreDefId?: string): Promise<SubmissionScore[]> {
    let query = this.client.collection(Collections.SCORES).where('phaseId', '==', phaseId)
    if (scoreDefId) {
      query = query.where('scoreDefId', '==', scoreDefId)
    }

    const snap = await query.get()
    return snap.docs.map((doc) => doc.data() as SubmissionScore)
  }

  async addToLeaderboard(phaseId: string, submissionId: string): Promise<LeaderboardEntry> {
    const entryRef = this.client
      .collection(Collections.LEADERBOARD)
      .doc(leaderboardDocId(phaseId, submissionId))

    return this.client.runTransaction(async (tx): Promise<LeaderboardEntry> => {
      const snap = await tx.get(entryRef)
      if (snap.exists) {
        return snap.data() as LeaderboardEntry
      }

      const entry: LeaderboardEntry = { phaseId, submissionId, addedAt: nowIso() }
      tx.set(entryRef, entry)
      return entry
    })
  }

  async listLeaderboard(phaseId: string): Promise<LeaderboardEntry[]> {
    const snap = await this.client
      .collection(Collections.LEADERBOARD)
      .where('phaseId', '==', phaseId)
      .get()

    return snap.docs.map((doc) => doc.data() as LeaderboardEntry)
  }

  async upsertSubmissionMetadata(
    submissionId: string,
    kind: MetadataKind,
    fields: Record<string, MetadataValue>
  ): Promise<SubmissionMetadata> {
    const metadataRef = this.client
      .collection(Collections.METADATA)
      .doc(metadataDocId(submissionId, kind))

    return this.client.runTransaction(async (tx): Promise<SubmissionMetadata> => {
      const snap = await tx.get(metadataRef)
      const currentFields = snap.exists
        ? ((snap.data() as SubmissionMetadata).fields ?? {})
        : {}

      const metadata: SubmissionMetadata = {
        submissionId,
        kind,
        fields: { ...currentFields, ...fields },
        updatedAt: nowIso()
      }
      tx.set(metadataRef, metadata)
      return metadata
    })
  }

  async listDownloads(competitionId: string): Promise<DownloadRecord[]> {
    const snap = await this.client
      .collection(Collections.DOWNLOADS)
      .where('competitionId', '==', competitionId)
      .get()

    const downloads = snap.docs.map((doc) => doc.data() as DownloadRecord)
    downloads.sort(
      (left, right) => toMillisOrZero(left.downloadedAt) - toMillisOrZero(right.downloadedAt)
    )
    return downloads
  }
}
