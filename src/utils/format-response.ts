import { AdbCommandError } from "../types.js";

type TextContent = { type: "text"; text: string };

export type ToolResponse = {
  content: TextContent[];
  isError?: boolean;
};

/**
 * Builds an MCP response: the action confirmation, then optional details
 * rendered as JSON.
 */
export function buildResponseContent(
  confirmationText: string,
  details?: unknown,
): TextContent[] {
  const content: TextContent[] = [
    { type: "text" as const, text: confirmationText },
  ];

  if (details !== undefined) {
    content.push({
      type: "text" as const,
      text: JSON.stringify(details, null, 2),
    });
  }

  return content;
}

export function formatError(error: unknown): string {
  if (error instanceof AdbCommandError) {
    const exit = error.exitCode === null ? "" : ` (exit code ${error.exitCode})`;
    return `${error.message}${exit}`;
  }
  if (error instanceof Error) return error.message;
  return String(error);
}

export function errorResponse(error: unknown): ToolResponse {
  return {
    content: [{ type: "text" as const, text: `Error: ${formatError(error)}` }],
    isError: true,
  };
}
