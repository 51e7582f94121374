import { z } from 'zod';

export const askAiSchema = z.object({
  question: z.string(),
  programming_language: z.string().optional().default(''),
  create_new_session: z.boolean().optional().default(false),
});

export const explainSyntaxSchema = z.object({
  syntax_element: z.string(),
  context: z.string().optional().default(''),
});

export const checkCodeSchema = z.object({
  code: z.string(),
  check_type: z.string().optional().default('syntax'),
});

export type AskAiRequest = z.infer<typeof askAiSchema>;
export type ExplainSyntaxRequest = z.infer<typeof explainSyntaxSchema>;
export type CheckCodeRequest = z.infer<typeof checkCodeSchema>;

/**
 * Body of every assistant endpoint
 */
export type AssistantResponse = {
  result: string;
  conversationId?: string;
  error?: string;
};

/**
 * POST /chat_api/v1/conversations/ answer
 */
export const conversationCreatedSchema = z.object({
  uuid: z.string().min(1),
});

/**
 * One `data:` event of the message stream
 */
export const messageChunkSchema = z.object({
  uuid: z.string().optional(),
  role: z.string().nullish(),
  content: z.record(z.unknown()).nullish(),
  parent_uuid: z.string().nullish(),
  finished: z.boolean().optional().default(false),
});

export interface ConversationRecord {
  readonly id: string;
  readonly createdAt: number;
  lastUsed: number;
  messagesCount: number;
}
