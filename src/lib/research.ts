import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { StreamableHTTPClientTransport } from "@modelcontextprotocol/sdk/client/streamableHttp.js";
import { z } from "zod";
import { ExternalServiceError, getErrorMessage } from "./errors.js";
import logger from "./logger.js";
import type { ResearchSnippet } from "./types.js";

const CLIENT_INFO = { name: "autoblog", version: "0.1.0" };
const MAX_EXCERPT_LENGTH = 1500;
const UNLISTED_TOOL_CANDIDATES = ["microsoft_docs_search", "search", "query", "get_content"];

/** One open connection to a research server. */
export interface ResearchSession {
  listTools(): Promise<string[]>;
  callTool(name: string, args: Record<string, unknown>): Promise<unknown>;
  close(): Promise<void>;
}

export type ResearchConnector = (serverUrl: string) => Promise<ResearchSession>;

export interface CollectResearchOptions {
  connect: ResearchConnector;
  /** Tool to prefer when the server offers it. */
  preferredTool?: string;
}

const toolResultSchema = z.object({
  isError: z.boolean().optional(),
  content: z
    .array(
      z
        .object({
          type: z.string(),
          text: z.string().optional(),
          resource: z.object({ uri: z.string().optional(), text: z.string().optional() }).optional(),
        })
        .passthrough()
    )
    .default([]),
});

const recordSchema = z
  .object({
    title: z.string().optional(),
    name: z.string().optional(),
    url: z.string().optional(),
    contentUrl: z.string().optional(),
    link: z.string().optional(),
    source: z.string().optional(),
    content: z.string().optional(),
    text: z.string().optional(),
    excerpt: z.string().optional(),
    snippet: z.string().optional(),
  })
  .passthrough();

const recordListSchema = z.union([
  z.array(recordSchema),
  z.object({ results: z.array(recordSchema) }).transform((v) => v.results),
  z.object({ items: z.array(recordSchema) }).transform((v) => v.items),
  z.object({ documents: z.array(recordSchema) }).transform((v) => v.documents),
]);

/**
 * Open an MCP session over Streamable HTTP.
 */
export function createMcpConnector(options: { timeoutMs: number }): ResearchConnector {
  return async (serverUrl) => {
    const client = new Client(CLIENT_INFO);
    const transport = new StreamableHTTPClientTransport(new URL(serverUrl));
    const requestOptions = { timeout: options.timeoutMs };

    try {
      await client.connect(transport, requestOptions);
    } catch (error) {
      await client.close().catch((closeError: unknown) => {
        logger.debug(`Closing ${serverUrl} failed: ${getErrorMessage(closeError)}`);
      });
      throw new ExternalServiceError("MCP", `cannot connect to ${serverUrl}: ${getErrorMessage(error)}`, {
        cause: error,
      });
    }
    const info = client.getServerVersion();
    if (info) {
      logger.debug(`MCP session with ${serverUrl}: ${info.name} v${info.version}`);
    }

    return {
      async listTools() {
        const result = await client.listTools(undefined, requestOptions);
        return result.tools.map((tool) => tool.name);
      },
      async callTool(name, args) {
        return client.callTool({ name, arguments: args }, undefined, requestOptions);
      },
      async close() {
        await client.close();
      },
    };
  };
}

export function chooseTool(tools: string[], preferred?: string): string | undefined {
  if (preferred && tools.includes(preferred)) return preferred;
  return tools.find((tool) => tool.toLowerCase().includes("search")) ?? tools[0];
}

/** Cuts on code points so surrogate pairs stay whole. */
function truncate(text: string): string {
  const chars = Array.from(text.trim());
  if (chars.length <= MAX_EXCERPT_LENGTH) return chars.join("");
  return `${chars.slice(0, MAX_EXCERPT_LENGTH).join("").trimEnd()}…`;
}

function parseRecords(text: string): ResearchSnippet[] | null {
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch {
    return null;
  }

  const parsed = recordListSchema.safeParse(json);
  if (!parsed.success) return null;

  const snippets: ResearchSnippet[] = [];
  for (const record of parsed.data) {
    const excerpt = record.content ?? record.text ?? record.excerpt ?? record.snippet;
    if (!excerpt?.trim()) continue;
    snippets.push({
      title: record.title ?? record.name ?? "Untitled",
      source: record.url ?? record.contentUrl ?? record.link ?? record.source ?? "",
      excerpt: truncate(excerpt),
    });
  }
  return snippets;
}

/**
 * Turn a tool result into snippets, keeping the order of its content items.
 */
export function toSnippets(result: unknown, toolName: string, serverUrl: string): ResearchSnippet[] {
  const parsed = toolResultSchema.safeParse(result);
  if (!parsed.success) {
    throw new ExternalServiceError("MCP", `unexpected result from ${toolName}`);
  }
  if (parsed.data.isError) {
    const message = parsed.data.content.map((item) => item.text ?? "").join(" ").trim();
    throw new ExternalServiceError("MCP", `${toolName} reported an error${message ? `: ${message}` : ""}`);
  }

  const snippets: ResearchSnippet[] = [];
  for (const item of parsed.data.content) {
    const text = item.text ?? item.resource?.text;
    if (!text?.trim()) continue;

    const records = parseRecords(text);
    if (records && records.length > 0) {
      snippets.push(...records);
      continue;
    }

    snippets.push({
      title: `${toolName} result`,
      source: item.resource?.uri ?? serverUrl,
      excerpt: truncate(text),
    });
  }
  return snippets;
}

/**
 * Some servers answer tools/list with nothing yet still accept calls. Try the
 * usual search tool names in turn and keep the first non-empty answer.
 */
async function probeUnlistedTools(
  session: ResearchSession,
  serverUrl: string,
  topic: string,
  preferredTool?: string
): Promise<ResearchSnippet[]> {
  const candidates = [...new Set([preferredTool, ...UNLISTED_TOOL_CANDIDATES])].filter(
    (name): name is string => Boolean(name)
  );
  for (const name of candidates) {
    try {
      const snippets = toSnippets(await session.callTool(name, { query: topic }), name, serverUrl);
      if (snippets.length > 0) return snippets;
    } catch (error) {
      logger.debug(`${serverUrl} rejected ${name}: ${getErrorMessage(error)}`);
    }
  }
  throw new ExternalServiceError("MCP", `${serverUrl} lists no tools and none of ${candidates.join(", ")} answered`);
}

async function queryServer(
  serverUrl: string,
  topic: string,
  options: CollectResearchOptions
): Promise<ResearchSnippet[]> {
  const session = await options.connect(serverUrl);
  try {
    const tools = await session.listTools();
    const tool = chooseTool(tools, options.preferredTool);
    if (tool) {
      logger.debug(`Querying ${serverUrl} with ${tool}`);
      const result = await session.callTool(tool, { query: topic });
      return toSnippets(result, tool, serverUrl);
    }
    return probeUnlistedTools(session, serverUrl, topic, options.preferredTool);
  } finally {
    await session.close().catch((error: unknown) => {
      logger.debug(`Closing ${serverUrl} failed: ${getErrorMessage(error)}`);
    });
  }
}

/**
 * Query every server in parallel. A failing server is skipped with a warning;
 * results keep server-list order and are not deduplicated.
 */
export async function collectResearch(
  topic: string,
  servers: readonly string[],
  options: CollectResearchOptions
): Promise<ResearchSnippet[]> {
  if (servers.length === 0) {
    return [];
  }

  const settled = await Promise.allSettled(servers.map((server) => queryServer(server, topic, options)));

  const snippets: ResearchSnippet[] = [];
  settled.forEach((outcome, index) => {
    if (outcome.status === "fulfilled") {
      logger.debug(`${servers[index]} returned ${outcome.value.length} snippet(s)`);
      snippets.push(...outcome.value);
    } else {
      logger.warn(`Could not gather research from ${servers[index]}: ${getErrorMessage(outcome.reason)}`);
    }
  });

  if (snippets.length === 0) {
    logger.warn("No references gathered from research servers. Continuing without research data.");
  }
  return snippets;
}

export function formatResearchContext(snippets: ResearchSnippet[]): string {
  if (snippets.length === 0) return "";

  const sections = snippets.map((snippet, index) => {
    const source = snippet.source ? `\nSource: ${snippet.source}` : "";
    return `### Source ${index + 1}: ${snippet.title}${source}\n${snippet.excerpt}`;
  });
  return `## Reference Materials\n\n${sections.join("\n\n")}`;
}
