import { z } from "zod";

/**
 * Wire shapes of the persistent-agents REST surface. Only the fields the
 * harness reads are declared; everything else passes through unchecked.
 */

export const WireAgentSchema = z.object({
  id: z.string(),
  created_at: z.number(),
});

export const WireThreadSchema = z.object({
  id: z.string(),
});

export const WireTextBlockSchema = z.object({
  type: z.literal("text"),
  text: z.object({ value: z.string() }),
});

export const WireImageUrlBlockSchema = z.object({
  type: z.literal("image_url"),
  image_url: z.object({
    url: z.string(),
    detail: z.enum(["auto", "low", "high"]).optional(),
  }),
});

/** Any content block; text and image_url blocks are narrowed with the schemas above. */
const WireContentBlockSchema = z.object({ type: z.string() }).passthrough();

export const WireMessageSchema = z.object({
  id: z.string(),
  thread_id: z.string(),
  role: z.enum(["user", "assistant"]),
  content: z.array(WireContentBlockSchema),
  created_at: z.number(),
  run_id: z.string().nullish(),
});

export const WireMessageListSchema = z.object({
  data: z.array(WireMessageSchema),
  has_more: z.boolean().default(false),
  last_id: z.string().nullish(),
});

/** Payload of a `thread.message.delta` stream event. */
export const WireMessageDeltaSchema = z.object({
  id: z.string(),
  delta: z.object({
    content: z
      .array(
        z
          .object({
            type: z.string(),
            text: z.object({ value: z.string().nullish() }).passthrough().optional(),
          })
          .passthrough()
      )
      .default([]),
  }),
});

const WireToolCallSchema = z.object({
  id: z.string(),
  type: z.string(),
  function: z
    .object({
      name: z.string(),
      arguments: z.string(),
    })
    .optional(),
});

export const WireRunSchema = z.object({
  id: z.string(),
  thread_id: z.string(),
  assistant_id: z.string(),
  status: z.string(),
  required_action: z
    .object({
      type: z.literal("submit_tool_outputs"),
      submit_tool_outputs: z.object({ tool_calls: z.array(WireToolCallSchema) }),
    })
    .nullish(),
  last_error: z
    .object({
      code: z.string().nullish(),
      message: z.string(),
    })
    .nullish(),
});

export const WireFileSchema = z.object({
  id: z.string(),
});

export const WireVectorStoreSchema = z.object({
  id: z.string(),
  name: z.string().nullish(),
  status: z.enum(["in_progress", "completed", "expired"]),
  file_counts: z.object({
    in_progress: z.number(),
    completed: z.number(),
    failed: z.number(),
  }),
});

export type WireMessage = z.infer<typeof WireMessageSchema>;
export type WireRun = z.infer<typeof WireRunSchema>;
export type WireVectorStore = z.infer<typeof WireVectorStoreSchema>;
