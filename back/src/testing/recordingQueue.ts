import type { PublishOptions, QueueMessage, QueueName, TaskQueue } from '../services/tasks.service.js'

export type PublishedTask = {
  queue: QueueName
  message: QueueMessage
  options: PublishOptions
}

export class RecordingQueue implements TaskQueue {
  readonly published: PublishedTask[] = []
  failure: Error | null = null
  // By default only compute runs fail; set to fail every publish.
  failEverything = false

  async publish(queue: QueueName, message: QueueMessage, options: PublishOptions = {}): Promise<string> {
    if (this.failure && (this.failEverything || message.type === 'run')) {
      throw this.failure
    }
    this.published.push({ queue, message, options })
    return `task_${this.published.length}`
  }

  ofType<T extends QueueMessage['type']>(type: T): Array<Extract<QueueMessage, { type: T }>> {
    return this.published
      .map((task) => task.message)
      .filter((message): message is Extract<QueueMessage, { type: T }> => message.type === type)
  }
}
