/**
 * didfeed post / reply -- sign, store and announce a post.
 *
 * Both wait for the feed index to be republished before exiting, since the
 * process would otherwise drop the background publication.
 */

import type { FeedAgent } from "../../sdk/agent.js";
import { createAgent, cliError, errorMessage, requireStore } from "../helpers.js";

async function publish(
  agent: FeedAgent,
  send: () => Promise<string>
): Promise<string> {
  await requireStore(agent);
  try {
    const cid = await send();
    await agent.pendingPublish();
    return cid;
  } catch (err) {
    cliError(`Error: ${errorMessage(err)}`);
  }
}

export async function postCommand(
  content: string,
  options: { ref: string[]; tag: string[] }
): Promise<void> {
  const agent = createAgent();
  const cid = await publish(agent, () =>
    agent.post(content, { refs: options.ref, tags: options.tag })
  );
  console.log("Posted.");
  console.log(`CID: ${cid}`);
  if (options.ref.length > 0) console.log(`Refs: ${options.ref.join(", ")}`);
  if (options.tag.length > 0) console.log(`Tags: ${options.tag.join(", ")}`);
}

export async function replyCommand(
  cid: string,
  content: string,
  options: { tag: string[] }
): Promise<void> {
  const agent = createAgent();
  const replyCid = await publish(agent, () =>
    agent.reply(cid, content, { tags: options.tag })
  );
  console.log("Reply posted.");
  console.log(`CID: ${replyCid}`);
}
