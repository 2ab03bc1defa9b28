import { describe, test, expect, vi, beforeEach, afterEach } from "vitest";
import {
  chooseTool,
  collectResearch,
  formatResearchContext,
  toSnippets,
  type ResearchConnector,
  type ResearchSession,
} from "./research.js";

interface FakeServer {
  tools: string[];
  result?: unknown;
  error?: Error;
  delayMs?: number;
  /** Unlisted tool the server still answers; other names are rejected. */
  hiddenTool?: string;
}

function textResult(text: string) {
  return { content: [{ type: "text", text }] };
}

function fakeConnector(servers: Record<string, FakeServer | Error>) {
  const calls: Array<{ server: string; tool: string; args: Record<string, unknown> }> = [];
  const closed: string[] = [];

  const connect = vi.fn<ResearchConnector>(async (url) => {
    const server = servers[url];
    if (!server) throw new Error(`no fake for ${url}`);
    if (server instanceof Error) throw server;

    const session: ResearchSession = {
      listTools: async () => server.tools,
      callTool: async (tool, args) => {
        calls.push({ server: url, tool, args });
        if (server.hiddenTool && tool !== server.hiddenTool) throw new Error(`unknown tool ${tool}`);
        if (server.delayMs) await new Promise((resolve) => setTimeout(resolve, server.delayMs));
        if (server.error) throw server.error;
        return server.result;
      },
      close: async () => {
        closed.push(url);
      },
    };
    return session;
  });

  return { connect, calls, closed };
}

beforeEach(() => {
  vi.spyOn(console, "error").mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe("research", () => {
  describe("chooseTool", () => {
    test("prefers the configured tool when offered", () => {
      expect(chooseTool(["search", "microsoft_docs_search"], "microsoft_docs_search")).toBe(
        "microsoft_docs_search"
      );
    });

    test("falls back to the first search-like tool", () => {
      expect(chooseTool(["fetch_page", "doc_search"], "missing")).toBe("doc_search");
    });

    test("falls back to the first tool", () => {
      expect(chooseTool(["fetch_page", "read"])).toBe("fetch_page");
    });

    test("returns undefined without tools", () => {
      expect(chooseTool([])).toBeUndefined();
    });
  });

  describe("toSnippets", () => {
    test("maps JSON result records in source order", () => {
      const payload = JSON.stringify({
        results: [
          { title: "Dockerfile reference", contentUrl: "https://docs.example/dockerfile", content: "FROM sets the base." },
          { title: "Compose", url: "https://docs.example/compose", text: "Compose runs stacks." },
          { title: "Empty", content: "   " },
        ],
      });

      expect(toSnippets(textResult(payload), "docs_search", "http://mcp.test")).toEqual([
        { title: "Dockerfile reference", source: "https://docs.example/dockerfile", excerpt: "FROM sets the base." },
        { title: "Compose", source: "https://docs.example/compose", excerpt: "Compose runs stacks." },
      ]);
    });

    test("accepts a bare JSON array", () => {
      const payload = JSON.stringify([{ name: "Guide", link: "https://docs.example/g", snippet: "Read me." }]);

      expect(toSnippets(textResult(payload), "search", "http://mcp.test")).toEqual([
        { title: "Guide", source: "https://docs.example/g", excerpt: "Read me." },
      ]);
    });

    test("turns plain text into one snippet per content item", () => {
      const result = {
        content: [
          { type: "text", text: "First block." },
          { type: "image", data: "aGk=", mimeType: "image/png" },
          { type: "resource", resource: { uri: "https://docs.example/r", text: "Resource body." } },
        ],
      };

      expect(toSnippets(result, "search", "http://mcp.test")).toEqual([
        { title: "search result", source: "http://mcp.test", excerpt: "First block." },
        { title: "search result", source: "https://docs.example/r", excerpt: "Resource body." },
      ]);
    });

    test("cuts long excerpts", () => {
      const [snippet] = toSnippets(textResult("x".repeat(2000)), "search", "http://mcp.test");

      expect(snippet?.excerpt).toHaveLength(1501);
      expect(snippet?.excerpt.endsWith("…")).toBe(true);
    });

    test("never splits a surrogate pair when cutting", () => {
      const text = `${"a".repeat(1499)}😀${"b".repeat(10)}`;
      const [snippet] = toSnippets(textResult(text), "search", "http://mcp.test");

      expect(snippet?.excerpt).toBe(`${"a".repeat(1499)}😀…`);
    });

    test("treats an error result as a failure", () => {
      const result = { isError: true, content: [{ type: "text", text: "quota exceeded" }] };

      expect(() => toSnippets(result, "search", "http://mcp.test")).toThrow(
        "MCP error: search reported an error: quota exceeded"
      );
    });

    test("rejects results without a content list", () => {
      expect(() => toSnippets("nope", "search", "http://mcp.test")).toThrow(/unexpected result/);
    });
  });

  describe("collectResearch", () => {
    test("returns an empty list without contacting anything when no servers are configured", async () => {
      const fake = fakeConnector({});

      expect(await collectResearch("Docker", [], { connect: fake.connect })).toEqual([]);
      expect(fake.connect).not.toHaveBeenCalled();
    });

    test("queries the preferred tool with the topic", async () => {
      const fake = fakeConnector({
        "http://docs.test/mcp": {
          tools: ["fetch", "microsoft_docs_search"],
          result: textResult("Docker docs excerpt."),
        },
      });

      const snippets = await collectResearch("Docker Tips", ["http://docs.test/mcp"], {
        connect: fake.connect,
        preferredTool: "microsoft_docs_search",
      });

      expect(fake.calls).toEqual([
        { server: "http://docs.test/mcp", tool: "microsoft_docs_search", args: { query: "Docker Tips" } },
      ]);
      expect(snippets).toEqual([
        { title: "microsoft_docs_search result", source: "http://docs.test/mcp", excerpt: "Docker docs excerpt." },
      ]);
      expect(fake.closed).toEqual(["http://docs.test/mcp"]);
    });

    test("keeps server-list order even when later servers answer first", async () => {
      const fake = fakeConnector({
        "http://slow.test": { tools: ["search"], result: textResult("slow"), delayMs: 30 },
        "http://fast.test": { tools: ["search"], result: textResult("fast") },
      });

      const snippets = await collectResearch("topic", ["http://slow.test", "http://fast.test"], {
        connect: fake.connect,
      });

      expect(snippets.map((snippet) => snippet.excerpt)).toEqual(["slow", "fast"]);
    });

    test("does not deduplicate repeated snippets", async () => {
      const fake = fakeConnector({
        "http://a.test": { tools: ["search"], result: textResult("same") },
        "http://b.test": { tools: ["search"], result: textResult("same") },
      });

      const snippets = await collectResearch("topic", ["http://a.test", "http://b.test"], {
        connect: fake.connect,
      });

      expect(snippets).toHaveLength(2);
    });

    test("skips failing servers with a warning", async () => {
      const fake = fakeConnector({
        "http://down.test": new Error("ECONNREFUSED"),
        "http://up.test": { tools: ["search"], result: textResult("useful") },
      });

      const snippets = await collectResearch("topic", ["http://down.test", "http://up.test"], {
        connect: fake.connect,
      });

      expect(snippets).toEqual([{ title: "search result", source: "http://up.test", excerpt: "useful" }]);
      expect(console.error).toHaveBeenCalledWith(
        expect.anything(),
        "Could not gather research from http://down.test: ECONNREFUSED"
      );
    });

    test("returns an empty list when every server fails", async () => {
      const fake = fakeConnector({
        "http://a.test": new Error("timeout"),
        "http://b.test": { tools: [], error: new Error("unknown tool") },
        "http://c.test": { tools: ["search"], error: new Error("boom") },
      });

      const snippets = await collectResearch("topic", ["http://a.test", "http://b.test", "http://c.test"], {
        connect: fake.connect,
      });

      expect(snippets).toEqual([]);
      expect(console.error).toHaveBeenCalledWith(
        expect.anything(),
        "No references gathered from research servers. Continuing without research data."
      );
    });

    test("tries common tool names when the server lists none", async () => {
      const fake = fakeConnector({
        "http://quiet.test": { tools: [], hiddenTool: "query", result: textResult("hidden answer") },
      });

      const snippets = await collectResearch("topic", ["http://quiet.test"], {
        connect: fake.connect,
        preferredTool: "microsoft_docs_search",
      });

      expect(fake.calls.map((call) => call.tool)).toEqual(["microsoft_docs_search", "search", "query"]);
      expect(snippets).toEqual([{ title: "query result", source: "http://quiet.test", excerpt: "hidden answer" }]);
    });

    test("warns when no common tool name answers", async () => {
      const fake = fakeConnector({
        "http://quiet.test": { tools: [], error: new Error("unknown tool") },
      });

      const snippets = await collectResearch("topic", ["http://quiet.test"], { connect: fake.connect });

      expect(snippets).toEqual([]);
      expect(fake.calls.map((call) => call.tool)).toEqual(["microsoft_docs_search", "search", "query", "get_content"]);
      expect(console.error).toHaveBeenCalledWith(
        expect.anything(),
        "Could not gather research from http://quiet.test: MCP error: http://quiet.test lists no tools and none of microsoft_docs_search, search, query, get_content answered"
      );
    });

    test("closes the session when the tool call fails", async () => {
      const fake = fakeConnector({
        "http://c.test": { tools: ["search"], error: new Error("boom") },
      });

      await collectResearch("topic", ["http://c.test"], { connect: fake.connect });

      expect(fake.closed).toEqual(["http://c.test"]);
    });
  });

  describe("formatResearchContext", () => {
    test("is empty without snippets", () => {
      expect(formatResearchContext([])).toBe("");
    });

    test("numbers each source", () => {
      expect(
        formatResearchContext([
          { title: "Guide", source: "https://docs.example/g", excerpt: "Read me." },
          { title: "Notes", source: "", excerpt: "Plain." },
        ])
      ).toBe(
        "## Reference Materials\n\n### Source 1: Guide\nSource: https://docs.example/g\nRead me.\n\n### Source 2: Notes\nPlain."
      );
    });
  });
});
