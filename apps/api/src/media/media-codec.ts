import { Injectable } from '@nestjs/common'
import type { ImageFrame, VideoClip } from '../generation/generation.types'

export const MEDIA_CODEC = Symbol('MEDIA_CODEC')

export interface MediaCodec {
  decodeImage(bytes: Buffer, sourceUrl: string, contentType?: string): ImageFrame
  decodeVideo(bytes: Buffer, sourceUrl: string, contentType?: string): VideoClip
  blankImage(width: number, height: number): ImageFrame
  emptyVideo(): VideoClip
}

export class MediaDecodeError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'MediaDecodeError'
  }
}

export const RAW_RGB_MIME = 'image/x-raw-rgb'

const MIME_EXTENSIONS: Readonly<Record<string, string>> = {
  'image/png': 'png',
  'image/jpeg': 'jpg',
  'image/webp': 'webp',
  'image/gif': 'gif',
  'video/mp4': 'mp4',
  'video/webm': 'webm',
  'video/quicktime': 'mov',
}

export function extensionForMime(mimeType: string): string | undefined {
  return Object.hasOwn(MIME_EXTENSIONS, mimeType) ? MIME_EXTENSIONS[mimeType] : undefined
}

interface ImageHeader {
  mimeType: string
  width: number
  height: number
}

function readPng(bytes: Buffer): ImageHeader | null {
  if (bytes.length < 24 || bytes.readUInt32BE(0) !== 0x89504e47 || bytes.toString('ascii', 12, 16) !== 'IHDR') {
    return null
  }
  return { mimeType: 'image/png', width: bytes.readUInt32BE(16), height: bytes.readUInt32BE(20) }
}

function readGif(bytes: Buffer): ImageHeader | null {
  if (bytes.length < 10 || bytes.toString('ascii', 0, 3) !== 'GIF') return null
  return { mimeType: 'image/gif', width: bytes.readUInt16LE(6), height: bytes.readUInt16LE(8) }
}

function readJpeg(bytes: Buffer): ImageHeader | null {
  if (bytes.length < 4 || bytes[0] !== 0xff || bytes[1] !== 0xd8) return null
  let offset = 2
  while (offset + 9 < bytes.length) {
    if (bytes[offset] !== 0xff) {
      offset += 1
      continue
    }
    const marker = bytes[offset + 1]
    // SOF0..SOF15 except DHT(C4), JPG(C8), DAC(CC)
    if (marker >= 0xc0 && marker <= 0xcf && marker !== 0xc4 && marker !== 0xc8 && marker !== 0xcc) {
      return {
        mimeType: 'image/jpeg',
        height: bytes.readUInt16BE(offset + 5),
        width: bytes.readUInt16BE(offset + 7),
      }
    }
    offset += 2 + bytes.readUInt16BE(offset + 2)
  }
  return null
}

function readWebp(bytes: Buffer): ImageHeader | null {
  if (bytes.length < 30 || bytes.toString('ascii', 0, 4) !== 'RIFF' || bytes.toString('ascii', 8, 12) !== 'WEBP') {
    return null
  }
  const chunk = bytes.toString('ascii', 12, 16)
  if (chunk === 'VP8X') {
    return { mimeType: 'image/webp', width: bytes.readUIntLE(24, 3) + 1, height: bytes.readUIntLE(27, 3) + 1 }
  }
  if (chunk === 'VP8L') {
    const bits = bytes.readUInt32LE(21)
    return { mimeType: 'image/webp', width: (bits & 0x3fff) + 1, height: ((bits >> 14) & 0x3fff) + 1 }
  }
  if (chunk === 'VP8 ') {
    return { mimeType: 'image/webp', width: bytes.readUInt16LE(26) & 0x3fff, height: bytes.readUInt16LE(28) & 0x3fff }
  }
  return null
}

function isVideoContainer(bytes: Buffer): string | null {
  if (bytes.length >= 12 && bytes.toString('ascii', 4, 8) === 'ftyp') {
    const brand = bytes.toString('ascii', 8, 12)
    return brand === 'qt  ' ? 'video/quicktime' : 'video/mp4'
  }
  if (bytes.length >= 4 && bytes.readUInt32BE(0) === 0x1a45dfa3) return 'video/webm'
  return null
}

/**
 * Keeps downloaded media as encoded bytes plus the header facts the pipeline
 * needs (type and pixel size). Placeholders are raw zeroed RGB frames.
 */
@Injectable()
export class BufferMediaCodec implements MediaCodec {
  decodeImage(bytes: Buffer, sourceUrl: string): ImageFrame {
    if (!bytes.length) throw new MediaDecodeError(`empty image payload from ${sourceUrl}`)
    const header = readPng(bytes) ?? readJpeg(bytes) ?? readGif(bytes) ?? readWebp(bytes)
    if (!header || header.width <= 0 || header.height <= 0) {
      throw new MediaDecodeError(`unrecognized image payload from ${sourceUrl}`)
    }
    return { kind: 'image', ...header, data: bytes, sourceUrl }
  }

  decodeVideo(bytes: Buffer, sourceUrl: string, contentType?: string): VideoClip {
    if (!bytes.length) throw new MediaDecodeError(`empty video payload from ${sourceUrl}`)
    const sniffed = isVideoContainer(bytes)
    const declared = contentType && contentType.startsWith('video/') ? contentType : null
    const mimeType = sniffed ?? declared
    if (!mimeType) throw new MediaDecodeError(`unrecognized video payload from ${sourceUrl}`)
    return { kind: 'video', mimeType, data: bytes, sourceUrl }
  }

  blankImage(width: number, height: number): ImageFrame {
    return {
      kind: 'image',
      mimeType: RAW_RGB_MIME,
      width,
      height,
      data: Buffer.alloc(width * height * 3),
      sourceUrl: null,
    }
  }

  emptyVideo(): VideoClip {
    return { kind: 'video', mimeType: 'video/mp4', data: Buffer.alloc(0), sourceUrl: null }
  }
}
