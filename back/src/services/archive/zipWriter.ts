import zlib from 'node:zlib'
import type { BundleEntry } from './resultBundle.js'
import { ZIP_CENTRAL_SIGNATURE, ZIP_EOCD_SIGNATURE, ZIP_LOCAL_SIGNATURE } from './resultBundle.js'

const UTF8_FLAG = 0x0800
const VERSION = 20
const METHOD_DEFLATE = 8

const CRC_TABLE = (() => {
  const table = new Uint32Array(256)
  for (let n = 0; n < 256; n += 1) {
    let c = n
    for (let k = 0; k < 8; k += 1) {
      c = c & 1 ? 0xedb88320 ^ (c >>> 1) : c >>> 1
    }
    table[n] = c >>> 0
  }
  return table
})()

export const crc32 = (data: Buffer): number => {
  let crc = 0xffffffff
  for (const byte of data) {
    crc = (CRC_TABLE[(crc ^ byte) & 0xff] ?? 0) ^ (crc >>> 8)
  }
  return (crc ^ 0xffffffff) >>> 0
}

const toDosDateTime = (date: Date): { time: number; date: number } => {
  const year = Math.max(1980, date.getUTCFullYear())
  return {
    time:
      (date.getUTCHours() << 11) | (date.getUTCMinutes() << 5) | Math.floor(date.getUTCSeconds() / 2),
    date: ((year - 1980) << 9) | ((date.getUTCMonth() + 1) << 5) | date.getUTCDate()
  }
}

export type ArchiveInput = Array<{ name: string; data: Buffer | string }>

/** Encodes named blobs as a deflate zip archive, preserving entry order. */
export const encodeArchive = (files: ArchiveInput, modifiedAt: Date = new Date()): Buffer => {
  const stamp = toDosDateTime(modifiedAt)
  const localParts: Buffer[] = []
  const centralParts: Buffer[] = []
  let offset = 0

  const entries: BundleEntry[] = files.map((file) => ({
    name: file.name,
    data: typeof file.data === 'string' ? Buffer.from(file.data, 'utf8') : file.data
  }))

  for (const entry of entries) {
    const name = Buffer.from(entry.name, 'utf8')
    const compressed = zlib.deflateRawSync(entry.data)
    const checksum = crc32(entry.data)

    const local = Buffer.alloc(30)
    local.writeUInt32LE(ZIP_LOCAL_SIGNATURE, 0)
    local.writeUInt16LE(VERSION, 4)
    local.writeUInt16LE(UTF8_FLAG, 6)
    local.writeUInt16LE(METHOD_DEFLATE, 8)
    local.writeUInt16LE(stamp.time, 10)
    local.writeUInt16LE(stamp.date, 12)
    local.writeUInt32LE(checksum, 14)
    local.writeUInt32LE(compressed.length, 18)
    local.writeUInt32LE(entry.data.length, 22)
    local.writeUInt16LE(name.length, 26)
    local.writeUInt16LE(0, 28)

    const central = Buffer.alloc(46)
    central.writeUInt32LE(ZIP_CENTRAL_SIGNATURE, 0)
    central.writeUInt16LE(VERSION, 4)
    central.writeUInt16LE(VERSION, 6)
    central.writeUInt16LE(UTF8_FLAG, 8)
    central.writeUInt16LE(METHOD_DEFLATE, 10)
    central.writeUInt16LE(stamp.time, 12)
    central.writeUInt16LE(stamp.date, 14)
    central.writeUInt32LE(checksum, 16)
    central.writeUInt32LE(compressed.length, 20)
    central.writeUInt32LE(entry.data.length, 24)
    central.writeUInt16LE(name.length, 28)
    central.writeUInt32LE(offset, 42)

    localParts.push(local, name, compressed)
    centralParts.push(central, name)
    offset += local.length + name.length + compressed.length
  }

  const centralDirectory = Buffer.concat(centralParts)
  const eocd = Buffer.alloc(22)
  eocd.writeUInt32LE(ZIP_EOCD_SIGNATURE, 0)
  eocd.writeUInt16LE(entries.length, 8)
  eocd.writeUInt16LE(entries.length, 10)
  eocd.writeUInt32LE(centralDirectory.length, 12)
  eocd.writeUInt32LE(offset, 16)

  return Buffer.concat([...localParts, centralDirectory, eocd])
}
