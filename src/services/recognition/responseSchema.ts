import { z } from 'zod';
import { RecognitionTransportError } from '../../errors';
import { RecognizeResponse } from '../../types';

export const STATUS_OK = 0;

const statusSchema = z.object({
  code: z.number().int().default(STATUS_OK),
  message: z.string().default('')
});

const alternativeSchema = z.object({
  transcript: z.string().default(''),
  confidence: z.number().default(0)
});

const resultSchema = z.object({
  alternatives: z.array(alternativeSchema).default([]),
  isFinal: z.boolean().default(false)
});

export const recognizeResponseSchema = z.object({
  error: statusSchema.nullish().transform((status) => status ?? null),
  results: z.array(resultSchema).default([])
});

export const parseRecognizeResponse = (payload: unknown): RecognizeResponse => {
  const parsed = recognizeResponseSchema.safeParse(payload);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new RecognitionTransportError(`Malformed recognition response: ${detail}`);
  }

  return parsed.data;
};
