import { createHash, timingSafeEqual } from 'node:crypto'

export { secretsMatch, readBearerToken }

type HeaderReader = {
  header: (name: string) => string | undefined
}

const digest = (value: string): Buffer => createHash('sha256').update(value).digest()

const secretsMatch = (provided: string | undefined, expected: string): boolean => {
  if (!provided || !expected) return false
  return timingSafeEqual(digest(provided), digest(expected))
}

const readBearerToken = (reader: HeaderReader): string | null => {
  const header = reader.header('authorization')?.trim()
  if (!header) return null
  const match = /^Bearer\s+(.+)$/i.exec(header)
  return match?.[1]?.trim() || null
}
