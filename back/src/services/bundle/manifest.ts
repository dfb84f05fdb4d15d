import type { InputManifestKey, RunManifestKey } from 'shared'
import { SignPermission } from '../../domain/enums.js'
import { AppError, ErrorCodes } from '../../utils/errors.js'
import type { SignedAccessProvider } from '../storage.service.js'

export type ManifestLine<K extends string> = {
  key: K
  value: string
}

export const renderManifest = <K extends string>(lines: ReadonlyArray<ManifestLine<K>>): string =>
  lines.map((line) => `${line.key}: ${line.value}`).join('\n')

// Second precision, no fractional part: 2026-01-02T03:04:05Z
export const formatSubmittedAt = (iso: string): string => {
  const parsed = new Date(iso)
  if (Number.isNaN(parsed.getTime())) {
    throw new AppError(ErrorCodes.INVALID_INPUT, 'submission time is not a valid date', 400, { iso })
  }
  return parsed.toISOString().replace(/\.\d{3}Z$/, 'Z')
}

const requireSigned = (url: string, field: string, message: string): string => {
  if (url.length === 0) {
    throw new AppError(ErrorCodes.PRECONDITION_MISSING, message, 422, { field })
  }
  return url
}

export type RunManifestSources = {
  program: string | undefined
  input?: string | undefined
  stdout: string | undefined
  stderr: string | undefined
  privateOutput?: string | undefined
  output?: string | undefined
}

export type InputManifestSources = {
  ref?: string | undefined
  res: string | undefined
  history: string | undefined
  scores: string | undefined
  coopetition: string | undefined
  submittedBy: string
  submittedAt: string
  submissionNumber: number
  phaseNumber: number
  automaticSubmission: boolean
}

/** Builds the `key: value` manifests handed to compute workers, entirely from signed URLs. */
export class BundleComposer {
  private readonly access: SignedAccessProvider

  constructor(access: SignedAccessProvider) {
    this.access = access
  }

  async composeRunManifest(sources: RunManifestSources): Promise<string> {
    const program = requireSigned(
      await this.access.sign(sources.program, SignPermission.READ),
      'program',
      'program is missing'
    )

    const lines: Array<ManifestLine<RunManifestKey>> = [{ key: 'program', value: program }]

    const input = await this.access.sign(sources.input, SignPermission.READ)
    if (input) {
      lines.push({ key: 'input', value: input })
    }

    lines.push(
      { key: 'stdout', value: await this.access.sign(sources.stdout, SignPermission.WRITE) },
      { key: 'stderr', value: await this.access.sign(sources.stderr, SignPermission.WRITE) }
    )

    if (sources.privateOutput !== undefined) {
      lines.push({
        key: 'private_output',
        value: await this.access.sign(sources.privateOutput, SignPermission.WRITE)
      })
    }
    if (sources.output !== undefined) {
      lines.push({ key: 'output', value: await this.access.sign(sources.output, SignPermission.WRITE) })
    }

    return renderManifest(lines)
  }

  async composeInputManifest(sources: InputManifestSources): Promise<string> {
    const lines: Array<ManifestLine<InputManifestKey>> = []

    const ref = await this.access.sign(sources.ref, SignPermission.READ)
    if (ref) {
      lines.push({ key: 'ref', value: ref })
    }

    const res = requireSigned(
      await this.access.sign(sources.res, SignPermission.READ),
      'res',
      'results are missing'
    )

    lines.push(
      { key: 'res', value: res },
      { key: 'history', value: await this.access.sign(sources.history, SignPermission.READ) },
      { key: 'scores', value: await this.access.sign(sources.scores, SignPermission.READ) },
      { key: 'coopetition', value: await this.access.sign(sources.coopetition, SignPermission.READ) },
      { key: 'submitted-by', value: sources.submittedBy },
      { key: 'submitted-at', value: formatSubmittedAt(sources.submittedAt) },
      { key: 'competition-submission', value: String(sources.submissionNumber) },
      { key: 'competition-phase', value: String(sources.phaseNumber) },
      { key: 'automatic-submission', value: String(sources.automaticSubmission) }
    )

    return renderManifest(lines)
  }
}
