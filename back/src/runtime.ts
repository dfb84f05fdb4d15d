import type { AppConfig } from './config.js'
import { BundleComposer } from './services/bundle/manifest.js'
import { Dispatcher } from './services/evaluation/dispatcher.js'
import { LeaderboardPromoter } from './services/evaluation/leaderboard.js'
import { EvaluationOrchestrator } from './services/evaluation/orchestrator.js'
import { ResultReconciler } from './services/evaluation/reconciler.js'
import { PhaseRerunner } from './services/evaluation/rerun.js'
import { SubmissionStatusService } from './services/evaluation/submissionStatus.service.js'
import { createFirestoreClient, FirestoreRepo } from './services/firestore.repo.js'
import { createOidcVerifier } from './services/internalAuth.js'
import type { InternalTokenVerifier } from './services/internalAuth.js'
import { LoggingNotifier } from './services/notifier.js'
import type { Notifier } from './services/notifier.js'
import { createStorageBackend, SignedAccessProvider } from './services/storage.service.js'
import type { StorageBackend } from './services/storage.service.js'
import type { EvaluationStore } from './services/store.js'
import { createTaskQueue, InProcessQueue, publishMessage } from './services/tasks.service.js'
import type { TaskQueue } from './services/tasks.service.js'
import { runComputeTask } from './services/worker/computeWorker.js'
import type { ExecuteRun } from './services/worker/computeWorker.js'
import { createFixedWindowRateLimiter } from './utils/rateLimit.js'
import type { RateLimiter } from './utils/rateLimit.js'

export type Runtime = {
  config: AppConfig
  store: EvaluationStore
  queue: TaskQueue
  status: SubmissionStatusService
  orchestrator: EvaluationOrchestrator
  reconciler: ResultReconciler
  rerunner: PhaseRerunner
  callbackLimiter: RateLimiter
  verifyInternalToken?: InternalTokenVerifier
}

export type RuntimeOverrides = {
  store?: EvaluationStore
  storage?: StorageBackend
  queue?: TaskQueue
  notifier?: Notifier
  executeRun?: ExecuteRun
  verifyInternalToken?: InternalTokenVerifier
}

// In-process runs have no sandbox to execute in; they stay queued until a worker reports.
const skipLocalRun: ExecuteRun = async (jobId, taskArgs) => {
  console.warn(
    JSON.stringify({
      event: 'compute_run_not_executed',
      jobId,
      submissionId: taskArgs.submission_id
    })
  )
}

export const createRuntime = (config: AppConfig, overrides: RuntimeOverrides = {}): Runtime => {
  const store = overrides.store ?? new FirestoreRepo(createFirestoreClient(config))
  const storage = overrides.storage ?? createStorageBackend(config)
  const queue = overrides.queue ?? createTaskQueue(config)
  const access = new SignedAccessProvider(storage, config.storage.signedUrlTtlSeconds)

  const status = new SubmissionStatusService(store)
  const orchestrator = new EvaluationOrchestrator({
    store,
    storage,
    composer: new BundleComposer(access),
    dispatcher: new Dispatcher({ queue, access, defaultDockerImage: config.dockerDefaultWorkerImage }),
    status,
    queue
  })
  const reconciler = new ResultReconciler({
    store,
    storage,
    status,
    orchestrator,
    promoter: new LeaderboardPromoter(store),
    notifier: overrides.notifier ?? new LoggingNotifier(),
    siteUrl: config.siteUrl,
    fromEmail: config.defaultFromEmail
  })
  const rerunner = new PhaseRerunner({ store, queue })

  if (queue instanceof InProcessQueue) {
    const executeRun = overrides.executeRun ?? skipLocalRun
    queue.register({
      run: async (message) => {
        await runComputeTask(message.envelope, {
          execute: executeRun,
          report: async (jobId, body) => {
            await publishMessage(queue, {
              type: 'submission_update',
              body: { job_id: jobId, ...body }
            })
          }
        })
      },
      submission_update: async (message) => {
        const { job_id, status: callbackStatus, secret, extra } = message.body
        await reconciler.handleCallback({
          jobId: job_id,
          status: callbackStatus,
          secret,
          ...(extra ? { extra } : {})
        })
      },
      evaluate: async (message) => {
        await orchestrator.evaluate(message.body.submission_id, message.body.is_scoring_only)
      },
      rerun_phase: async (message) => {
        await rerunner.rerunPhase(message.body.phase_id)
      }
    })
  }

  const verifyInternalToken =
    overrides.verifyInternalToken ??
    (config.internalAuthAudience
      ? createOidcVerifier({
          audience: config.internalAuthAudience,
          ...(config.tasks.serviceAccountEmail ? { serviceAccountEmail: config.tasks.serviceAccountEmail } : {})
        })
      : undefined)

  return {
    config,
    store,
    queue,
    status,
    orchestrator,
    reconciler,
    rerunner,
    callbackLimiter: createFixedWindowRateLimiter(config.callbackRateLimit),
    ...(verifyInternalToken ? { verifyInternalToken } : {})
  }
}
