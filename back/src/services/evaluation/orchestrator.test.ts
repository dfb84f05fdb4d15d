import { beforeEach, describe, expect, it, vi } from 'vitest'
import { SubmissionStatus } from '../../domain/enums.js'
import { buildCompetition, buildPhase } from '../../testing/fixtures.js'
import { createTestHarness, seedPipeline } from '../../testing/harness.js'
import type { TestHarness } from '../../testing/harness.js'
import { encodeArchive } from '../archive/zipWriter.js'

const SUBMISSION_DIR = 'submissions/comp_1/phase_1/sub_1'

describe('EvaluationOrchestrator', () => {
  let harness: TestHarness

  beforeEach(async () => {
    vi.spyOn(console, 'info').mockImplementation(() => {})
    vi.spyOn(console, 'warn').mockImplementation(() => {})
    vi.spyOn(console, 'error').mockImplementation(() => {})
    harness = createTestHarness()
    await seedPipeline(harness)
  })

  it('runs prediction then scoring through to a finished submission', async () => {
    const { runtime, store, storage, queue } = harness
    store.competitions.set('comp_1', buildCompetition({ forceSubmissionToLeaderboard: true }))

    const outcome = await runtime.orchestrator.evaluate('sub_1', false)
    expect(outcome).toEqual({ jobId: 'job_1', submissionId: 'sub_1', phase: 'predict', dispatched: true })

    const predicted = await store.getSubmission('sub_1')
    expect(predicted?.executionKey).toBe('{"predict":"job_1"}')
    expect(predicted?.status).toBe(SubmissionStatus.SUBMITTED)
    expect(storage.text(`${SUBMISSION_DIR}/prediction_stdout.txt`)).toBe('Standard output for submission #1 by alice.\n')
    expect(storage.text(`${SUBMISSION_DIR}/prediction_run.txt`)).toBe(
      [
        'program: memory://uploads/sub_1/program.zip?method=GET&ttl=86400',
        'input: memory://bundles/comp_1/input.zip?method=GET&ttl=86400',
        `stdout: memory://${SUBMISSION_DIR}/prediction_stdout.txt?method=PUT&ttl=86400`,
        `stderr: memory://${SUBMISSION_DIR}/prediction_stderr.txt?method=PUT&ttl=86400`
      ].join('\n')
    )

    const [predictRun] = queue.ofType('run')
    expect(predictRun?.envelope.id).toBe('job_1')
    expect(predictRun?.envelope.task_args.predict).toBe(true)

    await runtime.reconciler.handleCallback({ jobId: 'job_1', status: 'finished', secret: 'test-secret' })

    const scoring = await store.getSubmission('sub_1')
    expect(scoring?.executionKey).toBe('{"predict":"job_1","score":"job_2"}')
    expect(scoring?.status).toBe(SubmissionStatus.SUBMITTED)
    expect(store.jobs.get('job_1')?.status).toBe('finished')
    expect(queue.ofType('run').map((message) => [message.envelope.id, message.envelope.task_args.predict])).toEqual([
      ['job_1', true],
      ['job_2', false]
    ])
    expect(storage.text(`${SUBMISSION_DIR}/input.txt`).split('\n')[1]).toBe(
      `res: memory://${SUBMISSION_DIR}/prediction_output.zip?method=GET&ttl=86400`
    )

    await storage.save(
      `${SUBMISSION_DIR}/output.zip`,
      encodeArchive([{ name: 'scores.txt', data: 'accuracy: 0.87\nf1: 0.5\n' }])
    )
    await runtime.reconciler.handleCallback({ jobId: 'job_2', status: 'finished', secret: 'test-secret' })

    const finished = await store.getSubmission('sub_1')
    expect(finished?.status).toBe(SubmissionStatus.FINISHED)
    expect([...store.scores.values()]).toEqual([
      { submissionId: 'sub_1', phaseId: 'phase_1', scoreDefId: 'def_accuracy', value: 0.87 }
    ])
    expect(store.leaderboardWrites).toBe(1)
    expect(store.jobs.get('job_2')?.status).toBe('finished')
  })

  it('scores directly when the phase is scoring only', async () => {
    const { runtime, store, storage, queue } = harness

    await runtime.orchestrator.evaluate('sub_1', true)

    const submission = await store.getSubmission('sub_1')
    expect(submission?.executionKey).toBe('{"score":"job_1"}')
    expect(storage.text(`${SUBMISSION_DIR}/input.txt`).split('\n').slice(0, 2)).toEqual([
      'ref: memory://bundles/comp_1/reference.zip?method=GET&ttl=86400',
      'res: memory://uploads/sub_1/program.zip?method=GET&ttl=86400'
    ])
    expect(storage.text(`${SUBMISSION_DIR}/stderr.txt`)).toBe('Standard error for submission #1 by alice.\n')
    expect(storage.text(`${SUBMISSION_DIR}/run.txt`).split('\n').map((line) => line.split(':')[0])).toEqual([
      'program',
      'input',
      'stdout',
      'stderr',
      'private_output',
      'output'
    ])
    expect(storage.objects.get(`${SUBMISSION_DIR}/output.zip`)?.length).toBe(0)
    expect(queue.ofType('run')[0]?.envelope.task_args.predict).toBe(false)
  })

  it('marks an automatic submission in auto-migrating phases', async () => {
    const { runtime, store, storage } = harness
    store.phases.set('phase_1', buildPhase({ autoMigration: true }))

    await runtime.orchestrator.evaluate('sub_1', true)

    expect(storage.text(`${SUBMISSION_DIR}/input.txt`).split('\n').at(-1)).toBe('automatic-submission: true')
  })

  it('queues a failed update when dispatch fails', async () => {
    const { runtime, store, queue } = harness
    queue.failure = new Error('queue unreachable')

    const outcome = await runtime.orchestrator.evaluate('sub_1', false)

    expect(outcome.dispatched).toBe(false)
    expect(queue.ofType('submission_update')).toEqual([
      { type: 'submission_update', body: { job_id: 'job_1', status: 'failed', secret: 'test-secret' } }
    ])

    const [update] = queue.ofType('submission_update')
    if (!update) throw new Error('expected an update')
    await runtime.reconciler.handleCallback({
      jobId: update.body.job_id,
      status: update.body.status,
      secret: update.body.secret
    })
    expect((await store.getSubmission('sub_1'))?.status).toBe(SubmissionStatus.FAILED)
  })

  it('fails the submission itself when the update queue is down too', async () => {
    const { runtime, store, queue } = harness
    queue.failure = new Error('connect ECONNREFUSED')
    queue.failEverything = true

    const outcome = await runtime.orchestrator.evaluate('sub_1', false)

    const submission = await store.getSubmission('sub_1')
    expect(outcome).toEqual({ jobId: 'job_1', submissionId: 'sub_1', phase: 'predict', dispatched: false })
    expect(submission?.status).toBe(SubmissionStatus.FAILED)
    expect(submission?.exceptionDetails).toBe('dispatch failed: connect ECONNREFUSED')
    expect(store.jobs.get('job_1')?.status).toBe('failed')
    expect(queue.published).toEqual([])
  })

  it('dispatches scoring once when a prediction result arrives twice at the same time', async () => {
    const { runtime, store, queue } = harness
    await runtime.orchestrator.evaluate('sub_1', false)

    const finished = { jobId: 'job_1', status: 'finished', secret: 'test-secret' }
    const outcomes = await Promise.all([
      runtime.reconciler.handleCallback(finished),
      runtime.reconciler.handleCallback(finished)
    ])

    const submission = await store.getSubmission('sub_1')
    expect(outcomes.map((outcome) => outcome.jobStatus)).toEqual(['finished', 'finished'])
    expect(submission?.status).toBe(SubmissionStatus.SUBMITTED)
    expect(submission?.exceptionDetails).toBeUndefined()
    expect(submission?.executionKey).toBe('{"predict":"job_1","score":"job_2"}')
    expect(queue.ofType('run').map((message) => message.envelope.id)).toEqual(['job_1', 'job_2'])
    expect(store.jobs.get('job_3')?.status).toBe('failed')
  })

  it('does not dispatch without a scoring program', async () => {
    const { runtime, store, queue } = harness
    const phase = buildPhase()
    delete phase.scoringProgram
    store.phases.set('phase_1', phase)

    const outcome = await runtime.orchestrator.evaluate('sub_1', true)

    expect(outcome.dispatched).toBe(false)
    expect(queue.ofType('run')).toEqual([])
    expect((await store.getSubmission('sub_1'))?.executionKey).toBe('')
  })

  it('gives a zero time limit the default soft budget and fails on a worker timeout report', async () => {
    const { runtime, store, queue } = harness
    store.phases.set('phase_1', buildPhase({ executionTimeLimit: 0 }))

    await runtime.orchestrator.evaluate('sub_1', false)
    expect(queue.published[0]?.options.softTimeLimitSeconds).toBe(600)
    expect(queue.ofType('run')[0]?.envelope.task_args.execution_time_limit).toBe(600)

    await runtime.reconciler.handleCallback({ jobId: 'job_1', status: 'failed', secret: 'test-secret' })

    expect((await store.getSubmission('sub_1'))?.status).toBe(SubmissionStatus.FAILED)
    expect(queue.ofType('run')).toHaveLength(1)
  })
})
