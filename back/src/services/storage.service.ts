import { access, mkdir, readFile, writeFile } from 'node:fs/promises'
import path from 'node:path'
import { Storage } from '@google-cloud/storage'
import type { AppConfig } from '../config.js'
import { requireSetting } from '../config.js'
import { SignPermission, StorageBackendKind } from '../domain/enums.js'
import { AppError, ErrorCodes, errorMessage } from '../utils/errors.js'

export const DEFAULT_SIGNED_URL_TTL_SECONDS = 60 * 60 * 24

export const assertSafeObjectPath = (objectPath: string): string => {
  const normalized = objectPath.replace(/\\/g, '/').replace(/^\/+/, '')
  if (!normalized || normalized.includes('\0')) {
    throw new AppError(ErrorCodes.INVALID_INPUT, 'invalid storage path', 400, { objectPath })
  }

  const segments = normalized.split('/')
  if (segments.some((segment) => segment === '..')) {
    throw new AppError(ErrorCodes.INVALID_INPUT, 'unsafe storage path', 400, { objectPath })
  }

  return normalized
}

const toSignedUrlExpiry = (ttlSeconds: number): string =>
  new Date(Date.now() + ttlSeconds * 1000).toISOString()

const httpMethodFor = (permission: SignPermission): 'GET' | 'PUT' =>
  permission === SignPermission.WRITE ? 'PUT' : 'GET'

/**
 * Private object store holding submission bundles and run artifacts.
 *
 * `sign` never throws: a path the backend cannot sign yields `''`.
 */
export interface StorageBackend {
  save(objectPath: string, content: Buffer | Uint8Array | string, contentType?: string): Promise<string>
  read(objectPath: string): Promise<Buffer>
  sign(objectPath: string, permission: SignPermission, ttlSeconds: number): Promise<string>
}

type GcsStorageBackendOptions = {
  bucketName: string
  client?: Storage
}

export class GcsStorageBackend implements StorageBackend {
  private readonly bucketName: string
  private readonly client: Storage

  constructor(options: GcsStorageBackendOptions) {
    this.bucketName = options.bucketName
    this.client = options.client ?? new Storage()
  }

  async save(
    objectPath: string,
    content: Buffer | Uint8Array | string,
    contentType = 'application/octet-stream'
  ): Promise<string> {
    const normalizedPath = this.toObjectPath(objectPath)
    await this.client.bucket(this.bucketName).file(normalizedPath).save(content, {
      contentType,
      resumable: false
    })
    return normalizedPath
  }

  async read(objectPath: string): Promise<Buffer> {
    const normalizedPath = this.toObjectPath(objectPath)
    try {
      const [content] = await this.client.bucket(this.bucketName).file(normalizedPath).download()
      return content
    } catch (error) {
      throw new AppError(ErrorCodes.STORAGE_NOT_FOUND, 'storage object not found', 404, {
        objectPath: normalizedPath,
        reason: errorMessage(error)
      })
    }
  }

  async sign(objectPath: string, permission: SignPermission, ttlSeconds: number): Promise<string> {
    try {
      const normalizedPath = this.toObjectPath(objectPath)
      const [signedUrl] = await this.client
        .bucket(this.bucketName)
        .file(normalizedPath)
        .getSignedUrl({
          action: permission === SignPermission.WRITE ? 'write' : 'read',
          expires: Date.now() + ttlSeconds * 1000,
          version: 'v4'
        })
      return signedUrl
    } catch (error) {
      console.warn(
        JSON.stringify({
          event: 'signed_url_failed',
          backend: StorageBackendKind.GCS,
          objectPath,
          permission,
          reason: errorMessage(error)
        })
      )
      return ''
    }
  }

  private toObjectPath(pathOrGs: string): string {
    if (pathOrGs.startsWith('gs://')) {
      const withoutScheme = pathOrGs.slice('gs://'.length)
      const firstSlash = withoutScheme.indexOf('/')
      if (firstSlash < 0) {
        throw new AppError(ErrorCodes.INVALID_INPUT, 'invalid gs path', 400, { pathOrGs })
      }
      const bucketName = withoutScheme.slice(0, firstSlash)
      if (bucketName !== this.bucketName) {
        throw new AppError(ErrorCodes.INVALID_INPUT, 'bucket mismatch', 400, {
          expected: this.bucketName,
          actual: bucketName
        })
      }
      return assertSafeObjectPath(withoutScheme.slice(firstSlash + 1))
    }

    return assertSafeObjectPath(pathOrGs)
  }
}

type LocalStorageBackendOptions = {
  root: string
  bucketName?: string
  signedUrlBase?: string
}

// Filesystem-backed store for development; signed URLs are descriptive only.
export class LocalStorageBackend implements StorageBackend {
  private readonly root: string
  private readonly bucketName: string
  private readonly signedUrlBase: string

  constructor(options: LocalStorageBackendOptions) {
    this.root = options.root
    this.bucketName = options.bucketName ?? 'local-bucket'
    this.signedUrlBase = (options.signedUrlBase ?? 'https://storage.local').replace(/\/$/, '')
  }

  async save(objectPath: string, content: Buffer | Uint8Array | string): Promise<string> {
    const normalizedPath = assertSafeObjectPath(objectPath)
    const targetPath = this.resolveLocalPath(normalizedPath)
    await mkdir(path.dirname(targetPath), { recursive: true })
    await writeFile(targetPath, content)
    return normalizedPath
  }

  async read(objectPath: string): Promise<Buffer> {
    const normalizedPath = assertSafeObjectPath(objectPath)
    try {
      return await readFile(this.resolveLocalPath(normalizedPath))
    } catch (error) {
      throw new AppError(ErrorCodes.STORAGE_NOT_FOUND, 'storage object not found', 404, {
        objectPath: normalizedPath,
        reason: errorMessage(error)
      })
    }
  }

  async sign(objectPath: string, permission: SignPermission, ttlSeconds: number): Promise<string> {
    const normalizedPath = await this.toSignablePath(objectPath, permission)
    if (normalizedPath === null) {
      return ''
    }

    const encodedPath = encodeURIComponent(normalizedPath)
    const method = httpMethodFor(permission)
    return `${this.signedUrlBase}/${this.bucketName}/${encodedPath}?method=${method}&expires=${toSignedUrlExpiry(ttlSeconds)}`
  }

  private async toSignablePath(objectPath: string, permission: SignPermission): Promise<string | null> {
    try {
      const normalizedPath = assertSafeObjectPath(objectPath)
      if (permission === SignPermission.READ) {
        await access(this.resolveLocalPath(normalizedPath))
      }
      return normalizedPath
    } catch (error) {
      console.warn(
        JSON.stringify({
          event: 'signed_url_failed',
          backend: StorageBackendKind.LOCAL,
          objectPath,
          permission,
          reason: errorMessage(error)
        })
      )
      return null
    }
  }

  private resolveLocalPath(objectPath: string): string {
    const fullPath = path.resolve(this.root, objectPath)
    const root = path.resolve(this.root)
    if (!fullPath.startsWith(`${root}${path.sep}`) && fullPath !== root) {
      throw new AppError(ErrorCodes.INVALID_INPUT, 'unsafe storage path', 400, { objectPath })
    }
    return fullPath
  }
}

export const createStorageBackend = (config: AppConfig): StorageBackend => {
  if (config.storage.backend === StorageBackendKind.GCS) {
    return new GcsStorageBackend({
      bucketName: requireSetting(config.storage.bucketName, 'BUCKET_NAME')
    })
  }

  return new LocalStorageBackend({
    root: config.storage.localRoot,
    ...(config.storage.bucketName ? { bucketName: config.storage.bucketName } : {}),
    signedUrlBase: config.storage.localSignedUrlBase
  })
}

/** Turns internal storage paths into time-limited URLs a compute worker can use. */
export class SignedAccessProvider {
  private readonly backend: StorageBackend
  private readonly defaultTtlSeconds: number

  constructor(backend: StorageBackend, defaultTtlSeconds = DEFAULT_SIGNED_URL_TTL_SECONDS) {
    this.backend = backend
    this.defaultTtlSeconds = defaultTtlSeconds
  }

  async sign(
    objectPath: string | undefined,
    permission: SignPermission = SignPermission.READ,
    ttlSeconds = this.defaultTtlSeconds
  ): Promise<string> {
    if (!objectPath || objectPath.trim().length === 0) {
      return ''
    }
    return this.backend.sign(objectPath, permission, ttlSeconds)
  }
}
