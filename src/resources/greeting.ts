import { ResourceTemplate, type McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";

export function greet(name: string): string {
  return `Namaste, ${name}!`;
}

export function registerGreeting(server: McpServer): void {
  server.resource("greeting", new ResourceTemplate("greeting://{name}", { list: undefined }), async (uri, variables) => {
    const name = Array.isArray(variables.name) ? variables.name.join(", ") : variables.name;
    return {
      contents: [{ uri: uri.href, mimeType: "text/plain", text: greet(name) }],
    };
  });
}
