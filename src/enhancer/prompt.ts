export const CONTEXT_BLOCK_LABEL = "**项目上下文信息：**";
export const REQUEST_BLOCK_LABEL = "**用户需求：**";

export function buildRewriteUserContent(text: string, contextInfo?: string): string {
  const context = contextInfo?.trim() ?? "";
  if (!context) {
    return text;
  }
  return `${CONTEXT_BLOCK_LABEL}\n${context}\n\n${REQUEST_BLOCK_LABEL}\n${text}`;
}
