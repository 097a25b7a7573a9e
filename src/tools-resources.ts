import { getOverview } from "./overview.js";
import { log } from "./logger.js";
import { McpServer, serializePayload, type ContextProvider } from "./tool-helpers.js";

export function register(server: McpServer, context: ContextProvider) {
  server.registerResource(
    "projects-overview",
    "kanboard://projects/overview",
    {
      title: "Kanboard Projects Overview",
      description:
        "Active projects with columns, swimlanes, members and task counts per column",
      mimeType: "application/json",
    },
    async (uri) => {
      try {
        const { source } = await context();
        const overview = await getOverview(source);
        return {
          contents: [{ uri: uri.href, text: serializePayload(overview) }],
        };
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        log("error", "overview resource failed", { error: message });
        return {
          contents: [{ uri: uri.href, text: JSON.stringify({ error: message }) }],
        };
      }
    }
  );
}
