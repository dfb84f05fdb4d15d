import { StorageBackendKind } from './domain/enums.js'

export type DispatchMode = 'cloud_tasks' | 'in_process'

export type AppConfig = {
  port: number
  gcpProjectId?: string
  firestoreDatabaseId?: string
  storage: {
    backend: StorageBackendKind
    bucketName?: string
    localRoot: string
    localSignedUrlBase: string
    signedUrlTtlSeconds: number
  }
  tasks: {
    dispatchMode: DispatchMode
    location?: string
    computeQueueId: string
    updateQueueId: string
    siteQueueId: string
    workerTargetUrl?: string
    tasksTargetUrl?: string
    serviceAccountEmail?: string
  }
  dockerDefaultWorkerImage: string
  siteUrl: string
  defaultFromEmail: string
  internalAuthAudience?: string
  callbackRateLimit: {
    maxRequests: number
    windowMs: number
  }
}

const DEFAULT_LOCAL_ROOT = '/tmp/submission-evaluator-storage'
const DEFAULT_SIGNED_URL_TTL_SECONDS = 60 * 60 * 24

const readNumber = (value: string | undefined, fallback: number): number => {
  if (value === undefined || value.trim() === '') return fallback
  const parsed = Number(value)
  return Number.isFinite(parsed) ? parsed : fallback
}

const present = (value: string | undefined): value is string =>
  value !== undefined && value.trim().length > 0

function normalizeDispatchMode(mode: string): DispatchMode {
  if (mode === 'cloud_tasks' || mode === 'in_process') {
    return mode
  }

  console.warn(
    JSON.stringify({
      event: 'tasks_dispatch_mode_invalid',
      value: mode,
      fallback: 'cloud_tasks'
    })
  )
  return 'cloud_tasks'
}

function normalizeStorageBackend(value: string): StorageBackendKind {
  if (value === StorageBackendKind.GCS || value === StorageBackendKind.LOCAL) {
    return value
  }

  console.warn(
    JSON.stringify({
      event: 'storage_backend_invalid',
      value,
      fallback: StorageBackendKind.LOCAL
    })
  )
  return StorageBackendKind.LOCAL
}

export const readConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => ({
  port: readNumber(env.PORT, 8080),
  ...(present(env.GCP_PROJECT_ID) ? { gcpProjectId: env.GCP_PROJECT_ID.trim() } : {}),
  ...(present(env.FIRESTORE_DB) ? { firestoreDatabaseId: env.FIRESTORE_DB.trim() } : {}),
  storage: {
    backend: normalizeStorageBackend((env.STORAGE_BACKEND ?? StorageBackendKind.LOCAL).toLowerCase()),
    ...(present(env.BUCKET_NAME) ? { bucketName: env.BUCKET_NAME.trim() } : {}),
    localRoot: env.LOCAL_STORAGE_ROOT ?? DEFAULT_LOCAL_ROOT,
    localSignedUrlBase: env.LOCAL_SIGNED_URL_BASE ?? 'https://storage.local',
    signedUrlTtlSeconds: readNumber(env.SIGNED_URL_TTL_SECONDS, DEFAULT_SIGNED_URL_TTL_SECONDS)
  },
  tasks: {
    dispatchMode: normalizeDispatchMode((env.TASKS_DISPATCH_MODE ?? 'cloud_tasks').toLowerCase()),
    ...(present(env.TASK_LOCATION) ? { location: env.TASK_LOCATION.trim() } : {}),
    computeQueueId: env.TASK_QUEUE_NAME ?? 'compute-worker',
    updateQueueId: env.UPDATE_QUEUE_NAME ?? 'submission-updates',
    siteQueueId: env.SITE_QUEUE_NAME ?? 'site-worker',
    ...(present(env.WORKER_TARGET_URL) ? { workerTargetUrl: env.WORKER_TARGET_URL.trim() } : {}),
    ...(present(env.TASKS_TARGET_URL) ? { tasksTargetUrl: env.TASKS_TARGET_URL.trim() } : {}),
    ...(present(env.TASK_SERVICE_ACCOUNT_EMAIL) ? { serviceAccountEmail: env.TASK_SERVICE_ACCOUNT_EMAIL.trim() } : {})
  },
  dockerDefaultWorkerImage: env.DOCKER_DEFAULT_WORKER_IMAGE ?? 'evaluator/compute-worker:latest',
  siteUrl: (env.SITE_URL ?? 'http://localhost:8080').replace(/\/$/, ''),
  defaultFromEmail: env.DEFAULT_FROM_EMAIL ?? 'noreply@localhost',
  ...(present(env.INTERNAL_AUTH_AUDIENCE) ? { internalAuthAudience: env.INTERNAL_AUTH_AUDIENCE.trim() } : {}),
  callbackRateLimit: {
    maxRequests: readNumber(env.CALLBACK_RATE_LIMIT_MAX, 120),
    windowMs: readNumber(env.CALLBACK_RATE_LIMIT_WINDOW_MS, 60_000)
  }
})

export const requireSetting = (value: string | undefined, name: string): string => {
  if (!value) {
    throw new Error(`${name} is required`)
  }
  return value
}
