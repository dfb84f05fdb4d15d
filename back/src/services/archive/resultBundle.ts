import zlib from 'node:zlib'
import { AppError, ErrorCodes } from '../../utils/errors.js'

export const ZIP_EOCD_SIGNATURE = 0x06054b50
export const ZIP_CENTRAL_SIGNATURE = 0x02014b50
export const ZIP_LOCAL_SIGNATURE = 0x04034b50

const DEFAULT_MAX_ENTRIES = 2000
const DEFAULT_MAX_TOTAL_BYTES = 200 * 1024 * 1024

export type BundleEntry = {
  name: string
  data: Buffer
}

// Archive contents in central-directory order.
export type ResultBundle = BundleEntry[]

type ZipCentralEntry = {
  fileName: string
  compressionMethod: number
  compressedSize: number
  uncompressedSize: number
  localHeaderOffset: number
  isDirectory: boolean
}

type DecodeOptions = {
  maxEntries?: number
  maxTotalBytes?: number
}

const findEndOfCentralDirectoryOffset = (zipBuffer: Buffer): number => {
  const minimumLength = 22
  if (zipBuffer.length < minimumLength) {
    return -1
  }

  const maxCommentLength = 0xffff
  const searchStart = Math.max(0, zipBuffer.length - (minimumLength + maxCommentLength))

  for (let offset = zipBuffer.length - minimumLength; offset >= searchStart; offset -= 1) {
    if (zipBuffer.readUInt32LE(offset) === ZIP_EOCD_SIGNATURE) {
      return offset
    }
  }

  return -1
}

const parseCentralEntries = (zipBuffer: Buffer, maxEntries: number): ZipCentralEntry[] => {
  const eocdOffset = findEndOfCentralDirectoryOffset(zipBuffer)
  if (eocdOffset < 0) {
    throw new AppError(ErrorCodes.ZIP_CORRUPTED, 'end of central directory not found', 422)
  }

  const expectedEntries = zipBuffer.readUInt16LE(eocdOffset + 10)
  const centralDirectorySize = zipBuffer.readUInt32LE(eocdOffset + 12)
  const centralDirectoryOffset = zipBuffer.readUInt32LE(eocdOffset + 16)
  if (expectedEntries > maxEntries) {
    throw new AppError(ErrorCodes.ZIP_CORRUPTED, 'result bundle has too many entries', 422, {
      expectedEntries,
      maxEntries
    })
  }
  if (centralDirectoryOffset + centralDirectorySize > eocdOffset) {
    throw new AppError(ErrorCodes.ZIP_CORRUPTED, 'central directory out of bounds', 422)
  }

  const entries: ZipCentralEntry[] = []
  let cursor = centralDirectoryOffset
  const endOffset = centralDirectoryOffset + centralDirectorySize

  while (cursor < endOffset && entries.length < expectedEntries) {
    if (zipBuffer.readUInt32LE(cursor) !== ZIP_CENTRAL_SIGNATURE) {
      throw new AppError(ErrorCodes.ZIP_CORRUPTED, 'invalid central directory entry', 422, {
        cursor
      })
    }

    const compressionMethod = zipBuffer.readUInt16LE(cursor + 10)
    const compressedSize = zipBuffer.readUInt32LE(cursor + 20)
    const uncompressedSize = zipBuffer.readUInt32LE(cursor + 24)
    const fileNameLength = zipBuffer.readUInt16LE(cursor + 28)
    const extraLength = zipBuffer.readUInt16LE(cursor + 30)
    const fileCommentLength = zipBuffer.readUInt16LE(cursor + 32)
    const localHeaderOffset = zipBuffer.readUInt32LE(cursor + 42)
    const fileNameStart = cursor + 46
    const fileNameEnd = fileNameStart + fileNameLength
    const fileName = zipBuffer.toString('utf8', fileNameStart, fileNameEnd)

    if (
      compressedSize === 0xffffffff ||
      uncompressedSize === 0xffffffff ||
      localHeaderOffset === 0xffffffff
    ) {
      throw new AppError(ErrorCodes.ZIP_CORRUPTED, 'zip64 result bundles are not supported', 422)
    }

    entries.push({
      fileName,
      compressionMethod,
      compressedSize,
      uncompressedSize,
      localHeaderOffset,
      isDirectory: fileName.endsWith('/')
    })

    cursor = fileNameEnd + extraLength + fileCommentLength
  }

  return entries
}

const decodeZipEntry = (zipBuffer: Buffer, entry: ZipCentralEntry): Buffer => {
  const localOffset = entry.localHeaderOffset
  if (zipBuffer.readUInt32LE(localOffset) !== ZIP_LOCAL_SIGNATURE) {
    throw new AppError(ErrorCodes.ZIP_CORRUPTED, 'invalid local file header', 422, {
      fileName: entry.fileName
    })
  }

  const fileNameLength = zipBuffer.readUInt16LE(localOffset + 26)
  const extraLength = zipBuffer.readUInt16LE(localOffset + 28)
  const dataStart = localOffset + 30 + fileNameLength + extraLength
  const dataEnd = dataStart + entry.compressedSize
  if (dataEnd > zipBuffer.length) {
    throw new AppError(ErrorCodes.ZIP_CORRUPTED, 'entry data out of bounds', 422, {
      fileName: entry.fileName
    })
  }
  const compressed = zipBuffer.subarray(dataStart, dataEnd)

  if (entry.compressionMethod === 0) {
    return Buffer.from(compressed)
  }
  if (entry.compressionMethod === 8) {
    return zlib.inflateRawSync(compressed)
  }

  throw new AppError(ErrorCodes.ZIP_CORRUPTED, 'unsupported zip compression method', 422, {
    fileName: entry.fileName,
    compressionMethod: entry.compressionMethod
  })
}

/**
 * Decodes a worker's output archive into named blobs. A zero-length buffer is
 * the untouched output placeholder and decodes to an empty bundle.
 */
export const decodeResultBundle = (zipBuffer: Buffer, options: DecodeOptions = {}): ResultBundle => {
  if (zipBuffer.length === 0) {
    return []
  }

  const maxEntries = options.maxEntries ?? DEFAULT_MAX_ENTRIES
  const maxTotalBytes = options.maxTotalBytes ?? DEFAULT_MAX_TOTAL_BYTES
  const entries = parseCentralEntries(zipBuffer, maxEntries)

  let totalBytes = 0
  const bundle: ResultBundle = []
  for (const entry of entries) {
    if (entry.isDirectory) {
      continue
    }

    totalBytes += entry.uncompressedSize
    if (totalBytes > maxTotalBytes) {
      throw new AppError(ErrorCodes.ZIP_CORRUPTED, 'result bundle is too large', 422, {
        maxTotalBytes
      })
    }

    bundle.push({
      name: entry.fileName.replace(/\\/g, '/').replace(/^\.?\/+/, ''),
      data: decodeZipEntry(zipBuffer, entry)
    })
  }

  return bundle
}

export const findBundleEntry = (bundle: ResultBundle, name: string): BundleEntry | null =>
  bundle.find((entry) => entry.name === name) ?? null
