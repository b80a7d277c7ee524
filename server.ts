import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
  type CallToolResult,
} from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";
import { type PagerankConfig, loadConfig, DampingSchema, SamplesSchema, ToleranceSchema, MaxIterationsSchema, SeedSchema } from "./src/config.js";
import { crawl } from "./src/crawl.js";
import { PagerankError, PreconditionError } from "./src/errors.js";
import { type LinkGraph, linkGraph, toLinkRecord } from "./src/graph.js";
import { iterateRanks } from "./src/iterate.js";
import { sampleVisits } from "./src/pagerank.js";
import { type RandomSource, seededRandom } from "./src/random.js";
import { assertSumsToOne, normalizeCounts, ranksToObject } from "./src/ranks.js";
import { transitionModel } from "./src/transition.js";

export const SERVER_NAME = "pagerank-server";
export const SERVER_VERSION = "0.1.0";

const GraphSchema = z.record(z.string(), z.array(z.string()));

const CorpusInputSchema = z.object({
  directory: z.string().min(1),
});

const TransitionInputSchema = z.object({
  graph: GraphSchema,
  page: z.string(),
  damping: DampingSchema.optional(),
});

const GraphSourceSchema = z.object({
  graph: GraphSchema.optional(),
  directory: z.string().min(1).optional(),
});

const SampleInputSchema = GraphSourceSchema.extend({
  damping: DampingSchema.optional(),
  samples: SamplesSchema.optional(),
  seed: SeedSchema.optional(),
});

const IterateInputSchema = GraphSourceSchema.extend({
  damping: DampingSchema.optional(),
  tolerance: ToleranceSchema.optional(),
  maxIterations: MaxIterationsSchema.optional(),
});

const RankCorpusInputSchema = CorpusInputSchema.extend({
  damping: DampingSchema.optional(),
  samples: SamplesSchema.optional(),
  seed: SeedSchema.optional(),
});

// JSON Schema fragments shared by the tool listings
const graphProperty = {
  type: "object",
  description: "Link graph: each page name maps to the pages it links to. Every target must also be a key; no page may link to itself.",
  additionalProperties: { type: "array", items: { type: "string" } },
};
const directoryProperty = { type: "string", description: "Directory containing the corpus .html files" };
const dampingProperty = { type: "number", exclusiveMinimum: 0, exclusiveMaximum: 1, description: "Probability of following a link rather than jumping to a random page (default 0.85)" };
const samplesProperty = { type: "integer", minimum: 1, description: "Number of random-walk steps (default 10000)" };
const seedProperty = { type: "integer", minimum: 0, maximum: 4294967295, description: "Unsigned 32-bit seed for a reproducible walk. Omit for Math.random." };

function textResult(value: unknown): CallToolResult {
  return { content: [{ type: "text", text: JSON.stringify(value, null, 2) }] };
}

function errorResult(kind: string, message: string): CallToolResult {
  return { content: [{ type: "text", text: `${kind}: ${message}` }], isError: true };
}

async function resolveGraph(input: { graph?: Record<string, string[]>; directory?: string }): Promise<LinkGraph> {
  if (input.graph !== undefined) return linkGraph(input.graph);
  if (input.directory !== undefined) return crawl(input.directory);
  throw new PreconditionError("Either graph or directory is required");
}

/** Ranks as JSON, after checking they still sum to 1. */
function rankOutput(ranks: ReadonlyMap<string, number>): Record<string, number> {
  assertSumsToOne(ranks);
  return ranksToObject(ranks);
}

function randomFor(seed: number | undefined): RandomSource {
  return seed === undefined ? Math.random : seededRandom(seed);
}

/**
 * Creates a configured MCP server instance with all ranking tools registered.
 * @param config Defaults for arguments a tool call leaves out (env-derived unless given)
 */
export function createServer(config: PagerankConfig = loadConfig()): Server {
  const server = new Server({
    name: SERVER_NAME,
    version: SERVER_VERSION,
  }, {
    capabilities: {
      tools: {},
    },
  });

  server.setRequestHandler(ListToolsRequestSchema, async () => {
    return {
      tools: [
        {
          name: "crawl_corpus",
          description: "Read a directory of HTML pages and return the link graph between them",
          inputSchema: {
            type: "object",
            properties: { directory: directoryProperty },
            required: ["directory"],
          },
        },
        {
          name: "transition_model",
          description: "Probability distribution over the next page a random surfer visits from the given page",
          inputSchema: {
            type: "object",
            properties: {
              graph: graphProperty,
              page: { type: "string", description: "Current page; must be a key of graph" },
              damping: dampingProperty,
            },
            required: ["graph", "page"],
          },
        },
        {
          name: "sample_pagerank",
          description: "Estimate PageRank by sampling a random surfer's walk. Pass either graph or directory.",
          inputSchema: {
            type: "object",
            properties: {
              graph: graphProperty,
              directory: directoryProperty,
              damping: dampingProperty,
              samples: samplesProperty,
              seed: seedProperty,
            },
          },
        },
        {
          name: "iterate_pagerank",
          description: "Compute PageRank by iterating the PageRank equations until convergence. Pass either graph or directory.",
          inputSchema: {
            type: "object",
            properties: {
              graph: graphProperty,
              directory: directoryProperty,
              damping: dampingProperty,
              tolerance: { type: "number", exclusiveMinimum: 0, description: "Largest per-page change accepted as converged (default 0.001)" },
              maxIterations: { type: "integer", minimum: 1, description: "Sweeps allowed before failing (default: enough for the damping factor and tolerance, at least 1000)" },
            },
          },
        },
        {
          name: "rank_corpus",
          description: "Crawl a directory of HTML pages and rank them by both sampling and iteration",
          inputSchema: {
            type: "object",
            properties: {
              directory: directoryProperty,
              damping: dampingProperty,
              samples: samplesProperty,
              seed: seedProperty,
            },
            required: ["directory"],
          },
        },
      ],
    };
  });

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args = {} } = request.params;

    try {
      switch (name) {
        case "crawl_corpus": {
          const input = CorpusInputSchema.parse(args);
          return textResult({ pages: toLinkRecord(await crawl(input.directory)) });
        }
        case "transition_model": {
          const input = TransitionInputSchema.parse(args);
          const distribution = transitionModel(linkGraph(input.graph), input.page, input.damping ?? config.damping);
          return textResult(rankOutput(distribution));
        }
        case "sample_pagerank": {
          const input = SampleInputSchema.parse(args);
          const graph = await resolveGraph(input);
          const run = sampleVisits(graph, input.damping ?? config.damping, input.samples ?? config.samples, randomFor(input.seed));
          return textResult({ samples: run.samples, ranks: rankOutput(normalizeCounts(run.visits, run.samples)) });
        }
        case "iterate_pagerank": {
          const input = IterateInputSchema.parse(args);
          const graph = await resolveGraph(input);
          const run = iterateRanks(graph, input.damping ?? config.damping, {
            tolerance: input.tolerance ?? config.tolerance,
            maxIterations: input.maxIterations ?? config.maxIterations,
          });
          return textResult({ iterations: run.iterations, ranks: rankOutput(run.ranks) });
        }
        case "rank_corpus": {
          const input = RankCorpusInputSchema.parse(args);
          const graph = await crawl(input.directory);
          const damping = input.damping ?? config.damping;
          const samples = input.samples ?? config.samples;
          const sampled = sampleVisits(graph, damping, samples, randomFor(input.seed));
          const iterated = iterateRanks(graph, damping, { tolerance: config.tolerance, maxIterations: config.maxIterations });
          return textResult({
            pages: toLinkRecord(graph),
            sampled: { samples, ranks: rankOutput(normalizeCounts(sampled.visits, samples)) },
            iterated: { iterations: iterated.iterations, ranks: rankOutput(iterated.ranks) },
          });
        }
        default:
          throw new Error(`Unknown tool: ${name}`);
      }
    } catch (error) {
      if (error instanceof z.ZodError) {
        const detail = error.issues.map(issue => `${issue.path.join(".") || "(root)"}: ${issue.message}`).join("; ");
        return errorResult("INVALID_ARGUMENT", detail);
      }
      if (error instanceof PagerankError) {
        return errorResult(error.code, error.message);
      }
      throw error;
    }
  });

  return server;
}
