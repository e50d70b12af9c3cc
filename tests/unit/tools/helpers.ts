/**
 * Shared helpers for tool handler tests
 */

export interface ParsedToolResponse {
  success: boolean;
  data?: Record<string, unknown>;
  error?: {
    category: string;
    message: string;
    recovery?: { tool: string; hint: string };
    details?: Record<string, unknown>;
  };
}

export function parseResponse(response: {
  content: Array<{ type: string; text: string }>;
}): ParsedToolResponse {
  return JSON.parse(response.content[0].text);
}
