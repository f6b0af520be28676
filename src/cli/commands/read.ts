/**
 * didfeed read -- fetch a post and check its signature.
 */

import { createAgent, cliError, errorMessage, formatPost, requireStore } from "../helpers.js";

export async function readCommand(cid: string): Promise<void> {
  const agent = createAgent();
  await requireStore(agent);
  try {
    const { post, verified } = await agent.read(cid);
    console.log(formatPost(cid, post, verified));
  } catch (err) {
    cliError(`Error fetching post: ${errorMessage(err)}`);
  }
}
