import type { CallbackExtra, MetadataValue } from 'shared'

export type Parsed<T> = { ok: true; value: T } | { ok: false; message: string }

export const isRecord = (value: unknown): value is Record<string, unknown> =>
  Boolean(value) && typeof value === 'object' && !Array.isArray(value)

export const readRequiredString = (record: Record<string, unknown>, key: string): Parsed<string> => {
  const value = record[key]
  if (typeof value !== 'string' || value.trim().length === 0) {
    return { ok: false, message: `${key} is required` }
  }
  return { ok: true, value: value.trim() }
}

const isMetadataValue = (value: unknown): value is MetadataValue =>
  value === null || typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean'

export const parseCallbackExtra = (value: unknown): Parsed<CallbackExtra | undefined> => {
  if (value === undefined || value === null) {
    return { ok: true, value: undefined }
  }
  if (!isRecord(value)) {
    return { ok: false, message: 'extra must be an object' }
  }

  const extra: CallbackExtra = {}
  if (value.traceback !== undefined && value.traceback !== null) {
    if (typeof value.traceback !== 'string') {
      return { ok: false, message: 'extra.traceback must be a string' }
    }
    extra.traceback = value.traceback
  }

  if (value.metadata !== undefined && value.metadata !== null) {
    if (!isRecord(value.metadata)) {
      return { ok: false, message: 'extra.metadata must be an object' }
    }
    const metadata: Record<string, MetadataValue> = {}
    for (const [key, field] of Object.entries(value.metadata)) {
      if (!isMetadataValue(field)) {
        return { ok: false, message: `extra.metadata.${key} must be a scalar` }
      }
      metadata[key] = field
    }
    extra.metadata = metadata
  }

  return { ok: true, value: extra }
}

export type CallbackFields = {
  status: string
  secret: string
  extra?: CallbackExtra
}

export const parseCallbackFields = (value: unknown): Parsed<CallbackFields> => {
  if (!isRecord(value)) {
    return { ok: false, message: 'request body must be an object' }
  }

  const status = readRequiredString(value, 'status')
  if (!status.ok) return status
  const secret = readRequiredString(value, 'secret')
  if (!secret.ok) return secret
  const extra = parseCallbackExtra(value.extra)
  if (!extra.ok) return extra

  return {
    ok: true,
    value: {
      status: status.value,
      secret: secret.value,
      ...(extra.value ? { extra: extra.value } : {})
    }
  }
}
