import { z } from 'zod'
import type { GenerationRequest, GenerationResult, MediaItem } from '../generation.types'

const ReferenceAssetSchema = z.object({
  sourceRef: z.string().min(1).optional(),
  /** base64 payload, optionally as a data: URI */
  data: z.string().min(1),
  mimeType: z.string().optional(),
  filename: z.string().optional(),
})

export const GenerationRequestSchema = z.object({
  vendor: z.enum(['haiyi', 'dashscope', 'gaga']),
  kind: z.enum([
    'text_to_image',
    'image_to_image',
    'image_edit',
    'text_to_video',
    'image_to_video',
    'multi_reference_video',
  ]),
  prompt: z.string().trim().min(1),
  model: z.string().optional(),
  negativePrompt: z.string().optional(),
  aspectRatio: z.string().optional(),
  resolution: z.string().optional(),
  durationSeconds: z.number().positive().optional(),
  seed: z.number().int().optional(),
  referenceAssets: z.array(ReferenceAssetSchema).optional(),
  extras: z.record(z.unknown()).optional(),
  progressChannel: z.string().optional(),
})

export type GenerationRequestDto = z.infer<typeof GenerationRequestSchema>

const DATA_URI = /^data:([^;,]+);base64,(.*)$/s

export function toGenerationRequest(dto: GenerationRequestDto): GenerationRequest {
  const { referenceAssets, ...rest } = dto
  return {
    ...rest,
    referenceAssets: referenceAssets?.map((asset, index) => {
      const match = DATA_URI.exec(asset.data)
      return {
        sourceRef: asset.sourceRef ?? `reference-${index}`,
        data: Buffer.from(match ? match[2] : asset.data, 'base64'),
        mimeType: asset.mimeType ?? match?.[1],
        filename: asset.filename,
      }
    }),
  }
}

export interface GenerationResponseDto {
  outputKind: GenerationResult['outputKind']
  usedFallback: boolean
  taskId?: string
  infoText: string
  assets: Array<{
    kind: 'image' | 'video'
    mimeType: string
    width?: number
    height?: number
    sourceUrl: string | null
    data: string
  }>
}

export function toGenerationResponse(result: GenerationResult): GenerationResponseDto {
  const assets: MediaItem[] = result.assets
  return {
    outputKind: result.outputKind,
    usedFallback: result.usedFallback,
    taskId: result.taskId,
    infoText: result.infoText,
    assets: assets.map((asset) => ({
      kind: asset.kind,
      mimeType: asset.mimeType,
      ...(asset.kind === 'image' ? { width: asset.width, height: asset.height } : {}),
      sourceUrl: asset.sourceUrl,
      data: asset.data.toString('base64'),
    })),
  }
}
