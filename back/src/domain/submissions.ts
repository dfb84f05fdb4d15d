import type { SubmissionStatus } from './enums.js'

export type SubmissionParticipant = {
  participantId: string
  username: string
  email?: string
  emailOnSubmissionFinished: boolean
}

// Storage object paths. Prediction-phase runs write to the `prediction*` slots.
export type SubmissionFiles = {
  file?: string
  runfile?: string
  inputfile?: string
  stdout?: string
  stderr?: string
  output?: string
  privateOutput?: string
  detailedResults?: string
  history?: string
  scores?: string
  coopetition?: string
  predictionRunfile?: string
  predictionStdout?: string
  predictionStderr?: string
  predictionOutput?: string
}

export type SubmissionFileSlot = keyof SubmissionFiles

export type Submission = {
  submissionId: string
  competitionId: string
  phaseId: string
  participant: SubmissionParticipant
  status: SubmissionStatus
  executionKey: string
  secret: string
  submissionNumber: number
  submittedAt: string
  dockerImage?: string
  files: SubmissionFiles
  exceptionDetails?: string
  startedAt?: string
  completedAt?: string
  whenMadePublic?: string
  whenUnmadePublic?: string
  downloadCount: number
  likeCount: number
  dislikeCount: number
}

// Fields outside the status latch. Status only moves through the state machine.
export type SubmissionPatch = {
  files?: SubmissionFiles
  executionKey?: string
  exceptionDetails?: string
}

export type NewSubmission = {
  competitionId: string
  phaseId: string
  participant: SubmissionParticipant
  files: SubmissionFiles
  dockerImage?: string
}

export type StatusChange = {
  status: SubmissionStatus
  startedAt?: string
  completedAt?: string
}

export type TransitionResult = {
  submissionId: string
  previous: SubmissionStatus
  current: SubmissionStatus
  applied: boolean
}
