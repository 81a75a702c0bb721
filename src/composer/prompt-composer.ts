import { getAppKindProfile } from "../templates/catalog.js";
import { ChatMessage, GenerationRequest } from "../types.js";
import { extractFencedBlock } from "./fenced-block.js";
import { ChatCompletionClient } from "./providers.js";

const SYSTEM_PROMPT = "You are a senior Python engineer who ships small, self-contained web apps that run unmodified.";

export function composeMessages(request: Pick<GenerationRequest, "idea" | "kind">): ChatMessage[] {
  const profile = getAppKindProfile(request.kind);

  const user = [
    `Generate a ${profile.label} app for the following idea:`,
    request.idea.trim(),
    "",
    "Constraints:",
    ...profile.promptConstraints.map((line) => `- ${line}`),
    "- Only import packages that can be installed from PyPI or ship with Python.",
    `- Return the complete program in one \`\`\`${profile.fenceTag} fenced block.`
  ].join("\n");

  return [
    { role: "system", content: SYSTEM_PROMPT },
    { role: "user", content: user }
  ];
}

export interface ComposedCode {
  code: string;
  reply: string;
}

export async function generateCode(
  client: ChatCompletionClient,
  request: Pick<GenerationRequest, "idea" | "kind">
): Promise<ComposedCode> {
  const reply = await client.complete(composeMessages(request));
  const code = extractFencedBlock(reply, getAppKindProfile(request.kind).fenceTag);
  return { code, reply };
}
