/**
 * OpenAI-compatible chat wire format: transcript → messages, and response schemas.
 * Shared by the OpenRouter and Groq adapters.
 */

import { z } from 'zod';

import type { ConversationTurn } from '../types.js';

export type WireToolCall = {
  id: string;
  type: 'function';
  function: { name: string; arguments: string };
};

export type WireMessage =
  | { role: 'system' | 'user'; content: string }
  | { role: 'assistant'; content: string | null; tool_calls?: WireToolCall[] }
  | { role: 'tool'; tool_call_id: string; content: string };

export function toWireMessages(transcript: readonly ConversationTurn[]): WireMessage[] {
  return transcript.map((turn): WireMessage => {
    switch (turn.role) {
      case 'system':
      case 'user':
        return { role: turn.role, content: turn.content };
      case 'assistant':
        if (!turn.toolCalls?.length) return { role: 'assistant', content: turn.content };
        return {
          role: 'assistant',
          content: turn.content || null,
          tool_calls: turn.toolCalls.map((c) => ({
            id: c.id,
            type: 'function',
            function: { name: c.name, arguments: JSON.stringify(c.args) },
          })),
        };
      case 'tool':
        return { role: 'tool', tool_call_id: turn.result.callId, content: turn.content };
    }
  });
}

const UsageSchema = z
  .object({
    prompt_tokens: z.number().optional(),
    completion_tokens: z.number().optional(),
  })
  .nullish();

const ToolCallSchema = z.object({
  id: z.string().nullish(),
  type: z.string().nullish(),
  function: z.object({
    name: z.string(),
    arguments: z.union([z.string(), z.record(z.unknown())]).nullish(),
  }),
});

export const ChatCompletionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string().nullish(),
          tool_calls: z.array(ToolCallSchema).nullish(),
        }),
        finish_reason: z.string().nullish(),
      })
    )
    .min(1),
  usage: UsageSchema,
});

export type ChatCompletion = z.infer<typeof ChatCompletionSchema>;

const ToolCallDeltaSchema = z.object({
  index: z.number().optional(),
  id: z.string().nullish(),
  function: z
    .object({
      name: z.string().nullish(),
      arguments: z.string().nullish(),
    })
    .nullish(),
});

export const ChatChunkSchema = z.object({
  choices: z
    .array(
      z.object({
        delta: z
          .object({
            content: z.string().nullish(),
            tool_calls: z.array(ToolCallDeltaSchema).nullish(),
          })
          .nullish(),
        finish_reason: z.string().nullish(),
      })
    )
    .optional(),
  usage: UsageSchema,
  error: z.object({ message: z.string() }).passthrough().optional(),
});

export type ChatChunk = z.infer<typeof ChatChunkSchema>;

export const ModelsResponseSchema = z.object({
  data: z.array(
    z
      .object({
        id: z.string(),
        context_length: z.number().nullish(),
      })
      .passthrough()
  ),
});
