import { readFile } from 'node:fs/promises'
import type { Safe, SafePromise } from '@subreg/types'
import { BatchConfigError, safeError, safeResult, safeTry } from '@subreg/types'
import { z } from 'zod'

export const DEFAULT_MAX_RETRIES = 3

export const batchOperationSchema = z.object({
  operation: z.string(),
  subnet: z.number().int().min(0).max(0xffff),
  wallet: z.string().optional(),
  hotkey: z.string(),
  max_retries: z.number().int().positive().optional(),
})

export const batchConfigSchema = z.object({
  operations: z.array(batchOperationSchema),
})

export type BatchOperation = z.infer<typeof batchOperationSchema>
export type BatchConfig = z.infer<typeof batchConfigSchema>

export function parseBatchConfig(
  text: string,
): Safe<BatchConfig, BatchConfigError> {
  let json: unknown
  try {
    json = JSON.parse(text)
  } catch (error) {
    return safeError(
      new BatchConfigError('Batch config is not valid JSON', { cause: error }),
    )
  }

  const parsed = batchConfigSchema.safeParse(json)
  if (!parsed.success) {
    const issue = parsed.error.issues[0]
    const path = issue?.path.join('.') ?? ''
    return safeError(
      new BatchConfigError(
        `Invalid batch config at "${path}": ${issue?.message ?? 'unknown issue'}`,
      ),
    )
  }
  return safeResult(parsed.data)
}

export async function loadBatchConfig(
  path: string,
): SafePromise<BatchConfig, BatchConfigError> {
  const [readError, text] = await safeTry(readFile(path, 'utf-8'))
  if (readError) {
    return safeError(
      new BatchConfigError(`Failed to read batch config: ${path}`, {
        cause: readError,
      }),
    )
  }
  return parseBatchConfig(text)
}
