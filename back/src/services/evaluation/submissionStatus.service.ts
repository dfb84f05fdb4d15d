import { SubmissionStatus } from '../../domain/enums.js'
import { planTransition } from '../../domain/statusMachine.js'
import type { TransitionResult } from '../../domain/submissions.js'
import type { EvaluationStore } from '../store.js'

type Clock = () => Date

/** The only writer of `Submission.status`. Terminal states are latched. */
export class SubmissionStatusService {
  private readonly store: EvaluationStore
  private readonly now: Clock

  constructor(store: EvaluationStore, now: Clock = () => new Date()) {
    this.store = store
    this.now = now
  }

  async transition(submissionId: string, next: SubmissionStatus): Promise<TransitionResult> {
    const result = await this.store.transitionSubmission(submissionId, (current) =>
      planTransition(current, next, this.now().toISOString())
    )

    if (!result.applied) {
      console.info(
        JSON.stringify({
          event: 'submission_transition_ignored',
          submissionId,
          current: result.current,
          requested: next
        })
      )
    }
    return result
  }

  // Running workers are not interrupted; later callbacks hit the terminal latch.
  cancel(submissionId: string): Promise<TransitionResult> {
    return this.transition(submissionId, SubmissionStatus.CANCELLED)
  }
}
