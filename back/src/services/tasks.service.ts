import { CloudTasksClient } from '@google-cloud/tasks'
import type {
  EvaluateTaskBody,
  RerunPhaseTaskBody,
  RunEnvelope,
  SubmissionUpdateTaskBody
} from 'shared'
import type { AppConfig } from '../config.js'
import { requireSetting } from '../config.js'
import { AppError, ErrorCodes, errorMessage, toErrorResponse } from '../utils/errors.js'

export type QueueName = 'compute-worker' | 'submission-updates' | 'site-worker'

export type QueueMessage =
  | { type: 'run'; envelope: RunEnvelope }
  | { type: 'submission_update'; body: SubmissionUpdateTaskBody }
  | { type: 'evaluate'; body: EvaluateTaskBody }
  | { type: 'rerun_phase'; body: RerunPhaseTaskBody }

export type PublishOptions = {
  softTimeLimitSeconds?: number
  routingKey?: string
}

export interface TaskQueue {
  publish(queue: QueueName, message: QueueMessage, options?: PublishOptions): Promise<string>
}

export const QUEUE_FOR_MESSAGE: Record<QueueMessage['type'], QueueName> = {
  run: 'compute-worker',
  submission_update: 'submission-updates',
  evaluate: 'site-worker',
  rerun_phase: 'site-worker'
}

const INTERNAL_TASK_PATHS: Record<Exclude<QueueMessage['type'], 'run'>, string> = {
  submission_update: '/internal/tasks/submission-update',
  evaluate: '/internal/tasks/evaluate',
  rerun_phase: '/internal/tasks/rerun-phase'
}

const messageBody = (message: QueueMessage): unknown => {
  switch (message.type) {
    case 'run':
      return message.envelope
    case 'submission_update':
    case 'evaluate':
    case 'rerun_phase':
      return message.body
  }
}

type CloudTasksQueueConfig = AppConfig['tasks'] & { projectId?: string }

const requireTaskConfig = (config: CloudTasksQueueConfig) => {
  const tasksTargetUrl = requireSetting(config.tasksTargetUrl, 'TASKS_TARGET_URL')
  const serviceAccountEmail = requireSetting(config.serviceAccountEmail, 'TASK_SERVICE_ACCOUNT_EMAIL')
  if (tasksTargetUrl.includes('your-api-domain')) {
    throw new Error('TASKS_TARGET_URL must be a real endpoint (placeholder is not allowed)')
  }

  return {
    projectId: requireSetting(config.projectId, 'GCP_PROJECT_ID'),
    location: requireSetting(config.location, 'TASK_LOCATION'),
    tasksTargetUrl,
    serviceAccountEmail
  }
}

/** Publishes tasks onto Cloud Tasks queues; an isolated competition queue is chosen by routing key. */
export class CloudTasksQueue implements TaskQueue {
  private readonly config: CloudTasksQueueConfig
  private client: CloudTasksClient | null

  constructor(config: CloudTasksQueueConfig, client?: CloudTasksClient) {
    this.config = config
    this.client = client ?? null
  }

  async publish(queue: QueueName, message: QueueMessage, options: PublishOptions = {}): Promise<string> {
    const config = requireTaskConfig(this.config)
    const client = this.getClient()
    const queueId = options.routingKey ?? this.queueIdFor(queue)
    const parent = client.queuePath(config.projectId, config.location, queueId)

    const targetUrl =
      message.type === 'run'
        ? requireSetting(this.config.workerTargetUrl, 'WORKER_TARGET_URL')
        : `${config.tasksTargetUrl.replace(/\/$/, '')}${INTERNAL_TASK_PATHS[message.type]}`

    const headers: Record<string, string> = { 'Content-Type': 'application/json' }
    if (options.softTimeLimitSeconds !== undefined) {
      headers['X-Soft-Time-Limit'] = String(options.softTimeLimitSeconds)
    }

    const payload = Buffer.from(JSON.stringify(messageBody(message))).toString('base64')

    const [response] = await client.createTask({
      parent,
      task: {
        httpRequest: {
          httpMethod: 'POST',
          url: targetUrl,
          headers,
          body: payload,
          oidcToken: {
            serviceAccountEmail: config.serviceAccountEmail
          }
        }
      }
    })

    console.info(
      JSON.stringify({
        event: 'task_published',
        queue,
        queueId,
        type: message.type,
        taskName: response.name ?? ''
      })
    )
    return response.name ?? ''
  }

  private getClient(): CloudTasksClient {
    if (!this.client) {
      this.client = new CloudTasksClient()
    }
    return this.client
  }

  private queueIdFor(queue: QueueName): string {
    switch (queue) {
      case 'compute-worker':
        return this.config.computeQueueId
      case 'submission-updates':
        return this.config.updateQueueId
      case 'site-worker':
        return this.config.siteQueueId
    }
  }
}

type MessageOf<T extends QueueMessage['type']> = Extract<QueueMessage, { type: T }>

export type QueueHandlers = {
  [T in QueueMessage['type']]?: (message: MessageOf<T>, options: PublishOptions) => Promise<void>
}

// Runs handlers inside this process after the current task completes.
export class InProcessQueue implements TaskQueue {
  private handlers: QueueHandlers

  constructor(handlers: QueueHandlers = {}) {
    this.handlers = handlers
  }

  register(handlers: QueueHandlers): void {
    this.handlers = { ...this.handlers, ...handlers }
  }

  async publish(queue: QueueName, message: QueueMessage, options: PublishOptions = {}): Promise<string> {
    const run = this.resolve(message, options)
    if (!run) {
      throw new AppError(ErrorCodes.DISPATCH_FAILED, 'no in-process consumer for queue', 503, {
        queue,
        type: message.type
      })
    }

    const requestId = `in_process_${Date.now()}_${Math.random().toString(36).slice(2, 8)}`

    queueMicrotask(async () => {
      try {
        await run()
      } catch (error) {
        const response = toErrorResponse(error, errorMessage(error))
        console.error(
          JSON.stringify({
            event: 'in_process_task_failed',
            queue,
            type: message.type,
            requestId,
            status: response.status,
            code: response.payload.error.code,
            message: response.payload.error.message
          })
        )
      }
    })

    return requestId
  }

  private resolve(message: QueueMessage, options: PublishOptions): (() => Promise<void>) | null {
    switch (message.type) {
      case 'run': {
        const handler = this.handlers.run
        return handler ? () => handler(message, options) : null
      }
      case 'submission_update': {
        const handler = this.handlers.submission_update
        return handler ? () => handler(message, options) : null
      }
      case 'evaluate': {
        const handler = this.handlers.evaluate
        return handler ? () => handler(message, options) : null
      }
      case 'rerun_phase': {
        const handler = this.handlers.rerun_phase
        return handler ? () => handler(message, options) : null
      }
    }
  }
}

export const publishMessage = (
  queue: TaskQueue,
  message: QueueMessage,
  options?: PublishOptions
): Promise<string> => queue.publish(QUEUE_FOR_MESSAGE[message.type], message, options)

export const createTaskQueue = (config: AppConfig): TaskQueue => {
  console.info(
    JSON.stringify({
      event: 'tasks_dispatch_mode',
      mode: config.tasks.dispatchMode
    })
  )

  if (config.tasks.dispatchMode === 'in_process') {
    return new InProcessQueue()
  }
  return new CloudTasksQueue({
    ...config.tasks,
    ...(config.gcpProjectId ? { projectId: config.gcpProjectId } : {})
  })
}
