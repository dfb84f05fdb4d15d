import { randomBytes, randomUUID } from 'node:crypto'

export { makeId, makeSecret }

type IdPrefix = 'sub' | 'job'

const makeId = (prefix: IdPrefix): string => {
  return `${prefix}_${randomUUID()}`
}

// Per-submission capability token handed to the worker with each run.
const makeSecret = (): string => randomBytes(24).toString('hex')
