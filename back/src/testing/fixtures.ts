import { ScoreSorting, SubmissionStatus } from '../domain/enums.js'
import type { Submission } from '../domain/submissions.js'
import type { Competition, Phase, ScoreDef } from '../domain/types.js'

export const buildCompetition = (overrides: Partial<Competition> = {}): Competition => ({
  competitionId: 'comp_1',
  title: 'Image Labels',
  forceSubmissionToLeaderboard: false,
  ...overrides
})

export const buildPhase = (overrides: Partial<Phase> = {}): Phase => ({
  phaseId: 'phase_1',
  competitionId: 'comp_1',
  phaseNumber: 1,
  executionTimeLimit: 300,
  inputData: 'bundles/comp_1/input.zip',
  referenceData: 'bundles/comp_1/reference.zip',
  scoringProgram: 'bundles/comp_1/scoring.zip',
  isBlind: false,
  isScoringOnly: false,
  forceBestSubmissionToLeaderboard: false,
  autoMigration: false,
  ...overrides
})

export const buildScoreDef = (overrides: Partial<ScoreDef> = {}): ScoreDef => ({
  scoreDefId: 'def_accuracy',
  competitionId: 'comp_1',
  key: 'accuracy',
  label: 'Accuracy',
  sorting: ScoreSorting.DESC,
  ordering: 1,
  selectionDefault: true,
  ...overrides
})

export const buildSubmission = (overrides: Partial<Submission> = {}): Submission => ({
  submissionId: 'sub_1',
  competitionId: 'comp_1',
  phaseId: 'phase_1',
  participant: {
    participantId: 'part_1',
    username: 'alice',
    email: 'alice@example.com',
    emailOnSubmissionFinished: false
  },
  status: SubmissionStatus.SUBMITTED,
  executionKey: '',
  secret: 'test-secret',
  submissionNumber: 1,
  submittedAt: '2026-03-04T05:06:07.891Z',
  files: { file: 'uploads/sub_1/program.zip' },
  downloadCount: 0,
  likeCount: 0,
  dislikeCount: 0,
  ...overrides
})
