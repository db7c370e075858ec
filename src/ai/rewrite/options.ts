/**
 * 실행 옵션 검증 (처리 시작 전)
 */

import { z } from 'zod';
import { PipelineConfigError } from './errors';
import type { BatchComplexityClass, RewritePipelineConfig } from './types';
import { DEFAULT_PIPELINE_CONFIG } from './types';

export type RewritePipelineOverrides = Partial<Omit<RewritePipelineConfig, 'batchSizes'>> & {
  batchSizes?: Partial<Record<BatchComplexityClass, number>> | undefined;
};

const PipelineConfigSchema = z
  .object({
    ceilingMultiplier: z.number().positive(),
    mediumThresholdFactor: z.number().positive(),
    complexThresholdFactor: z.number().positive(),
    batchSizes: z.object({
      simple: z.number().int().min(1),
      medium: z.number().int().min(1),
      complex: z.number().int().min(1),
    }),
    maxBatchTokens: z.number().int().positive(),
    outputTokenFactor: z.number().min(0),
    concurrency: z.number().int().min(1),
    callTimeoutMs: z.number().positive(),
    maxAttempts: z.number().int().min(1),
    baseDelayMs: z.number().min(0),
    maxDelayMs: z.number().min(0),
    jitterMs: z.number().min(0),
    minContentOverlap: z.number().min(0).max(1),
    chunkStrategy: z.enum(['breakpoints', 'window']),
    cleanInput: z.boolean(),
  })
  .refine((c) => c.mediumThresholdFactor < c.complexThresholdFactor, {
    message: 'mediumThresholdFactor must be lower than complexThresholdFactor',
    path: ['mediumThresholdFactor'],
  });

export const RewriteRunOptionsSchema = z.object({
  sentences: z.array(z.string({ invalid_type_error: 'every sentence must be a string' })),
  limit: z.number({ invalid_type_error: 'limit must be a number' }).int().positive(),
  mode: z.enum(['oracle-rewrite', 'mechanical-only']),
  config: PipelineConfigSchema,
});

export type RewriteRunOptions = z.infer<typeof RewriteRunOptionsSchema>;

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.join('.');
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}

/**
 * 기본값과 병합 후 검증
 * @throws PipelineConfigError
 */
export function parseRewriteRunOptions(input: {
  sentences: unknown;
  limit: unknown;
  mode: unknown;
  config?: RewritePipelineOverrides | undefined;
}): RewriteRunOptions {
  const config = {
    ...DEFAULT_PIPELINE_CONFIG,
    ...input.config,
    batchSizes: { ...DEFAULT_PIPELINE_CONFIG.batchSizes, ...input.config?.batchSizes },
  };

  const result = RewriteRunOptionsSchema.safeParse({
    sentences: input.sentences,
    limit: input.limit,
    mode: input.mode,
    config,
  });
  if (!result.success) {
    throw new PipelineConfigError('Invalid rewrite options', formatIssues(result.error));
  }
  return result.data;
}
