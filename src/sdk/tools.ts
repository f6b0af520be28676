/**
 * Function-calling tool definitions for LLM agents.
 *
 * toolDefinitions() returns the tools in the OpenAI function format;
 * executeTool() runs one against a FeedAgent and reports the outcome as a
 * plain object instead of throwing.
 */

import { z } from "zod";

import { DidFeedError } from "../protocol/index.js";
import type { FeedAgent } from "./agent.js";

export interface ToolDefinition {
  readonly type: "function";
  readonly function: {
    readonly name: string;
    readonly description: string;
    readonly parameters: {
      readonly type: "object";
      readonly properties: Readonly<Record<string, unknown>>;
      readonly required: readonly string[];
    };
  };
}

export type ToolResult =
  | { success: true; result: Record<string, unknown> }
  | { success: false; error: string };

const stringList = (description: string) => ({
  type: "array",
  items: { type: "string" },
  description,
});

function tool(
  name: string,
  description: string,
  properties: Record<string, unknown> = {},
  required: string[] = []
): ToolDefinition {
  return {
    type: "function",
    function: {
      name,
      description,
      parameters: { type: "object", properties, required },
    },
  };
}

/** The tool set, in OpenAI function-calling format. */
export function toolDefinitions(): ToolDefinition[] {
  const cid = (description: string) => ({ type: "string", description });
  return [
    tool("didfeed_whoami", "Get the current agent's DID (decentralized identifier)"),
    tool(
      "didfeed_post",
      "Post a message to your feed. Signs it with your identity and stores it in IPFS.",
      {
        content: { type: "string", description: "The message content to post" },
        refs: stringList("List of CIDs this post references"),
        tags: stringList("List of topic tags"),
      },
      ["content"]
    ),
    tool(
      "didfeed_read",
      "Read a post from IPFS by its CID and verify the signature",
      { cid: cid("The IPFS content identifier of the post") },
      ["cid"]
    ),
    tool(
      "didfeed_reply",
      "Reply to an existing post (shorthand for post with refs=[cid])",
      {
        cid: cid("The CID of the post to reply to"),
        content: { type: "string", description: "The reply message content" },
        tags: stringList("List of topic tags"),
      },
      ["cid", "content"]
    ),
    tool(
      "didfeed_verify",
      "Verify if a post's signature is valid",
      { cid: cid("The CID of the post to verify") },
      ["cid"]
    ),
    tool(
      "didfeed_follow",
      "Follow another agent's feed by DID",
      {
        did: { type: "string", description: "The did:key identifier to follow" },
        alias: { type: "string", description: "Optional local name for this agent" },
      },
      ["did"]
    ),
    tool(
      "didfeed_unfollow",
      "Stop following an agent's feed",
      { did: { type: "string", description: "The did:key identifier to unfollow" } },
      ["did"]
    ),
    tool(
      "didfeed_check_feeds",
      "Check every followed feed for new posts and return the verified ones"
    ),
  ];
}

// ---------------------------------------------------------------------------
// Argument schemas
// ---------------------------------------------------------------------------

const required = (what: string) =>
  z.string({ required_error: `${what} is required` }).min(1, `${what} is required`);

const NoArgs = z.object({});

const PostArgs = z.object({
  content: required("Content"),
  refs: z.array(z.string()).optional(),
  tags: z.array(z.string()).optional(),
});

const CidArgs = z.object({ cid: required("CID") });

const ReplyArgs = z.object({
  cid: required("CID"),
  content: required("Content"),
  tags: z.array(z.string()).optional(),
});

const FollowArgs = z.object({
  did: required("DID"),
  alias: z.string().min(1).optional(),
});

const UnfollowArgs = z.object({ did: required("DID") });

function parseArgs<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, args: unknown): T {
  const parsed = schema.safeParse(args ?? {});
  if (!parsed.success) {
    throw new DidFeedError(parsed.error.issues[0]?.message ?? "Invalid arguments");
  }
  return parsed.data;
}

async function requireStore(agent: FeedAgent): Promise<void> {
  if (!(await agent.store.isAvailable())) {
    throw new DidFeedError("IPFS daemon not available");
  }
}

/**
 * Run a tool by name. Never throws: every failure, including an unknown
 * tool name or invalid arguments, comes back as `{ success: false }`.
 */
export async function executeTool(
  agent: FeedAgent,
  name: string,
  args: unknown
): Promise<ToolResult> {
  try {
    return { success: true, result: await dispatch(agent, name, args) };
  } catch (err) {
    return { success: false, error: err instanceof Error ? err.message : String(err) };
  }
}

async function dispatch(
  agent: FeedAgent,
  name: string,
  args: unknown
): Promise<Record<string, unknown>> {
  switch (name) {
    case "didfeed_whoami": {
      parseArgs(NoArgs, args);
      const did = await agent.whoami();
      if (did === null) {
        throw new DidFeedError("No identity found. Initialize first.");
      }
      return { did };
    }

    case "didfeed_post": {
      const { content, refs, tags } = parseArgs(PostArgs, args);
      await requireStore(agent);
      const cid = await agent.post(content, { refs, tags });
      return { cid, content, refs: refs ?? [], tags: tags ?? [] };
    }

    case "didfeed_read": {
      const { cid } = parseArgs(CidArgs, args);
      await requireStore(agent);
      const { post, verified } = await agent.read(cid);
      return { cid, post, verified };
    }

    case "didfeed_reply": {
      const { cid, content, tags } = parseArgs(ReplyArgs, args);
      await requireStore(agent);
      const replyCid = await agent.reply(cid, content, { tags });
      return { cid: replyCid, refs: [cid], tags: tags ?? [], content };
    }

    case "didfeed_verify": {
      const { cid } = parseArgs(CidArgs, args);
      await requireStore(agent);
      const { post, verified } = await agent.read(cid);
      return { cid, verified, author: post.author };
    }

    case "didfeed_follow": {
      const { did, alias } = parseArgs(FollowArgs, args);
      const { status, entry } = agent.follow(did, alias);
      return { status, did: entry.did, alias: entry.alias ?? null };
    }

    case "didfeed_unfollow": {
      const { did } = parseArgs(UnfollowArgs, args);
      return { status: agent.unfollow(did).status, did };
    }

    case "didfeed_check_feeds": {
      parseArgs(NoArgs, args);
      await requireStore(agent);
      const report = await agent.poll();
      return {
        feeds: report.results.map((r) => ({
          did: r.did,
          label: r.label,
          status: r.status,
          ...(r.error !== undefined ? { error: r.error } : {}),
          posts: r.ingested.map(({ cid, post }) => ({
            cid,
            content: post.content,
            timestamp: post.timestamp,
            refs: post.refs,
          })),
        })),
      };
    }

    default:
      throw new DidFeedError(`Unknown tool: ${name}`);
  }
}
