import { GenerationError } from "../lib/errors.js";

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Returns the interior of the first fenced block tagged `tag`, exactly as it
 * appears between the opening fence line and the closing fence line.
 */
export function extractFencedBlock(text: string, tag: string): string {
  const pattern = new RegExp("```[ \\t]*" + escapeRegExp(tag) + "[ \\t]*\\r?\\n([\\s\\S]*?)\\r?\\n[ \\t]*```", "i");
  const match = pattern.exec(text);

  if (!match) {
    throw new GenerationError(`No \`\`\`${tag} code block found in the model reply.`, {
      tag,
      replyPreview: text.slice(0, 200)
    });
  }

  const block = match[1] ?? "";
  if (!block.trim()) {
    throw new GenerationError(`The \`\`\`${tag} code block in the model reply is empty.`, { tag });
  }

  return block;
}
