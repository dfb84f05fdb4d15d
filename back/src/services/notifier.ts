export type SubmissionFinishedEmail = {
  to: string
  from: string
  competitionTitle: string
  competitionUrl: string
  submissionNumber: number
}

export interface Notifier {
  submissionFinished(email: SubmissionFinishedEmail): Promise<void>
}

// Mail transport is external; this records what would be sent.
export class LoggingNotifier implements Notifier {
  async submissionFinished(email: SubmissionFinishedEmail): Promise<void> {
    console.info(
      JSON.stringify({
        event: 'submission_finished_email',
        to: email.to,
        from: email.from,
        subject: `Submission #${email.submissionNumber} finished`,
        competitionTitle: email.competitionTitle,
        competitionUrl: email.competitionUrl
      })
    )
  }
}
