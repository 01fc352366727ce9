import { z } from 'zod';

export const channelOrderSchema = z.enum(['rgb', 'bgr']);

export type ChannelOrder = z.infer<typeof channelOrderSchema>;

/**
 * Model description served by GET /v1/model
 */
export const modelInfoSchema = z.object({
  model: z.string().min(1).describe('Model identifier'),
  target_size: z.number().int().positive().describe('Square input resolution'),
  output_size: z.number().int().positive().describe('Embedding dimensionality'),
  channel_order: channelOrderSchema.default('rgb')
});

export type ModelInfo = z.infer<typeof modelInfoSchema>;

/**
 * Single image tensor sent to POST /v1/embed (HWC, uint8, base64)
 */
export const imageTensorSchema = z.object({
  shape: z.tuple([z.number().int().positive(), z.number().int().positive(), z.literal(3)]),
  data: z.string().describe('Base64 of the raw pixel buffer')
});

export type ImageTensor = z.infer<typeof imageTensorSchema>;

/**
 * Batch embedding request body
 */
export const embedRequestSchema = z.object({
  inputs: z.array(imageTensorSchema).min(1)
});

export type EmbedRequest = z.infer<typeof embedRequestSchema>;

/**
 * Batch embedding response body, one vector per input in input order
 */
export const embedResponseSchema = z.object({
  embeddings: z.array(z.array(z.number())).describe('Embedding vectors')
});

export type EmbedResponse = z.infer<typeof embedResponseSchema>;
