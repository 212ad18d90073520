import { z } from 'zod';

export const socialSearchResponseSchema = z.object({
  tweets: z
    .array(
      z.object({
        text: z.string().optional(),
      }),
    )
    .optional(),
});

export const sentimentModelResponseSchema = z.object({
  outputs: z.object({
    generation: z.string(),
  }),
});

export type SocialSearchResponse = z.infer<typeof socialSearchResponseSchema>;
export type SentimentModelResponse = z.infer<typeof sentimentModelResponseSchema>;
