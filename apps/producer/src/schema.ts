import { z } from "genkit";

export const ModelObjectSchema = z.record(z.string(), z.unknown());

export type ModelObject = z.infer<typeof ModelObjectSchema>;

export const ChatCompletionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string().nullable(),
        }),
      }),
    )
    .min(1),
});

export type ChatRole = "system" | "user" | "assistant";

export interface ChatMessage {
  role: ChatRole;
  content: string;
}

export interface ChatCompletionRequest {
  model: string;
  messages: ChatMessage[];
  max_completion_tokens: number;
  temperature: number;
}

export const PromptInputSchema = z.object({
  topic: z.string().min(1),
  year: z.number().int(),
  categories: z.string().min(1),
  author: z.string().min(1),
});

export type PromptInput = z.infer<typeof PromptInputSchema>;
