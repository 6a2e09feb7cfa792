import { z } from 'zod'

/**
 * Raw classifier output before normalization.
 * Field names follow the inference service's JSON.
 */
export const RawClassificationSchema = z.object({
  label: z.string().min(1),
  score: z.number().finite(),
  all_scores: z.record(z.number().finite()).optional(),
  is_spoof: z.boolean().optional(),
  logits: z.union([z.array(z.number()), z.array(z.array(z.number()))]).optional()
})

export type RawClassification = z.infer<typeof RawClassificationSchema>

/**
 * Audio classifier plugin interface
 * The only seam between the streaming core and a concrete model backend
 */
export interface ClassifierPlugin {
  /**
   * Plugin name for identification
   */
  name: string

  /**
   * Whether the model is loaded and warmed up
   */
  isReady(): boolean

  /**
   * Classify one analysis window
   * @param samples Mono float32 samples of fixed length
   * @param sampleRate Sample rate in Hz
   * @param signal Aborted when the requesting connection closes
   * @returns Raw classification; rejects on model failure
   */
  classify(samples: Float32Array, sampleRate: number, signal?: AbortSignal): Promise<RawClassification>

  /**
   * Optional: run a dummy inference so the first real window is not slow
   */
  warmup?(): Promise<void>

  /**
   * Optional: release backend resources
   */
  close?(): Promise<void>
}
