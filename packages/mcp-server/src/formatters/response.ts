/**
 * Render a tool result as MCP text content. Errors become `{ error }` with
 * `isError` set so the calling model can tell them apart from results.
 */
export function wrapResponse(result: unknown) {
  if (result instanceof Error) {
    return {
      content: [{ type: "text" as const, text: JSON.stringify({ error: result.message }) }],
      isError: true,
    };
  }
  return {
    content: [{ type: "text" as const, text: JSON.stringify(result, null, 2) }],
  };
}
