import path from "node:path";
import { genkit } from "genkit";
import { getEnv } from "../../common/src/env.js";
import { PromptInputSchema, type ChatMessage, type ChatRole, type PromptInput } from "./schema.js";

export interface PromptRenderer {
  render(promptName: string, input: PromptInput): Promise<ChatMessage[]>;
}

function toChatRole(role: string): ChatRole | null {
  if (role === "system" || role === "user") {
    return role;
  }
  if (role === "model") {
    return "assistant";
  }
  return null;
}

export function createPromptRenderer(promptDir = getEnv().PROMPT_DIR): PromptRenderer {
  const ai = genkit({ promptDir: path.resolve(process.cwd(), promptDir) });

  return {
    async render(promptName, input) {
      const prompt = ai.prompt(promptName);
      const options = await prompt.render(PromptInputSchema.parse(input));

      const messages: ChatMessage[] = [];
      for (const message of options.messages ?? []) {
        const role = toChatRole(message.role);
        const content = message.content
          .map((part) => part.text ?? "")
          .join("")
          .trim();
        if (role && content.length > 0) {
          messages.push({ role, content });
        }
      }

      if (!messages.some((message) => message.role === "user")) {
        throw new Error(`prompt ${promptName} rendered without a user message`);
      }
      return messages;
    },
  };
}
