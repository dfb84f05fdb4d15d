import type { Submission, SubmissionFileSlot } from '../../domain/submissions.js'

export const SUBMISSION_FILE_NAMES: Record<Exclude<SubmissionFileSlot, 'file'>, string> = {
  runfile: 'run.txt',
  inputfile: 'input.txt',
  stdout: 'stdout.txt',
  stderr: 'stderr.txt',
  output: 'output.zip',
  privateOutput: 'private_output.zip',
  detailedResults: 'detailed_results.zip',
  history: 'history.txt',
  scores: 'scores.txt',
  coopetition: 'coopetition.zip',
  predictionRunfile: 'prediction_run.txt',
  predictionStdout: 'prediction_stdout.txt',
  predictionStderr: 'prediction_stderr.txt',
  predictionOutput: 'prediction_output.zip'
}

export const submissionObjectPath = (
  submission: Pick<Submission, 'competitionId' | 'phaseId' | 'submissionId'>,
  slot: Exclude<SubmissionFileSlot, 'file'>
): string =>
  `submissions/${submission.competitionId}/${submission.phaseId}/${submission.submissionId}/${SUBMISSION_FILE_NAMES[slot]}`

export const placeholderText = (
  stream: 'output' | 'error',
  submission: Pick<Submission, 'submissionNumber' | 'participant'>
): string =>
  `Standard ${stream} for submission #${submission.submissionNumber} by ${submission.participant.username}.\n`
