/**
 * Web search over an instant-answer JSON endpoint (DuckDuckGo shaped).
 */
import { z } from "zod";
import { BaseTool } from "../BaseTool.js";
import type { FetchLike, ToolContext, ToolEnvironment } from "../types.js";
import { withTimeout } from "../../utils/abort.js";

const WebSearchSchema = z.object({
  query: z.string().trim().min(1).max(400).describe("The search query"),
  max_results: z.coerce.number().int().min(1).max(20).optional().describe("Maximum number of results"),
});

interface RelatedTopic {
  Text?: string;
  FirstURL?: string;
  Topics?: RelatedTopic[];
}

const RelatedTopicSchema: z.ZodType<RelatedTopic> = z.lazy(() =>
  z.object({
    Text: z.string().optional(),
    FirstURL: z.string().optional(),
    Topics: z.array(RelatedTopicSchema).optional(),
  }),
);

const InstantAnswerSchema = z.object({
  Heading: z.string().optional(),
  AbstractText: z.string().optional(),
  AbstractURL: z.string().optional(),
  RelatedTopics: z.array(RelatedTopicSchema).optional(),
});

export interface WebSearchResultItem {
  title: string;
  url: string;
  snippet: string;
}

export interface WebSearchOutput {
  query: string;
  results: WebSearchResultItem[];
}

export class WebSearchTool extends BaseTool<typeof WebSearchSchema> {
  private readonly fetchImpl: FetchLike;

  constructor(private readonly env: ToolEnvironment) {
    super(
      {
        name: "web_search",
        description: "Search the web and return titles, links and snippets",
        category: "web",
        dangerLevel: "low",
        requiresConfirmation: false,
        examples: ['[TOOL: web_search("TypeScript tutorials")]'],
      },
      WebSearchSchema,
    );
    this.fetchImpl = env.fetch ?? fetch;
  }

  protected async run(params: z.infer<typeof WebSearchSchema>, context: ToolContext): Promise<WebSearchOutput> {
    const { endpoint, maxResults, timeoutMs } = this.env.config.search;
    const limit = params.max_results ?? maxResults;

    const url = new URL(endpoint);
    url.searchParams.set("q", params.query);
    url.searchParams.set("format", "json");
    url.searchParams.set("no_html", "1");
    url.searchParams.set("skip_disambig", "1");

    const signal = withTimeout(context.signal, timeoutMs);
    const response = await this.fetchImpl(url, { signal, headers: { Accept: "application/json" } });
    if (!response.ok) {
      throw new Error(`Search request failed: ${response.status} ${response.statusText}`);
    }

    const body = InstantAnswerSchema.parse(await response.json());
    return { query: params.query, results: collectResults(body).slice(0, limit) };
  }
}

function collectResults(body: z.infer<typeof InstantAnswerSchema>): WebSearchResultItem[] {
  const results: WebSearchResultItem[] = [];

  if (body.AbstractText && body.AbstractURL) {
    results.push({ title: body.Heading ?? body.AbstractURL, url: body.AbstractURL, snippet: body.AbstractText });
  }

  const visit = (topics: RelatedTopic[]) => {
    for (const topic of topics) {
      if (topic.Topics) {
        visit(topic.Topics);
      } else if (topic.Text && topic.FirstURL) {
        const [title] = topic.Text.split(" - ");
        results.push({ title, url: topic.FirstURL, snippet: topic.Text });
      }
    }
  };
  visit(body.RelatedTopics ?? []);

  return results;
}
