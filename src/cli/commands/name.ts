/**
 * didfeed name -- print the IPNS name a DID's feed is published under.
 */

import { createAgent, cliError, errorMessage } from "../helpers.js";

export async function nameCommand(did?: string): Promise<void> {
  const agent = createAgent();
  try {
    console.log(did === undefined ? await agent.feedName() : agent.nameFor(did));
  } catch (err) {
    cliError(`Error: ${errorMessage(err)}`);
  }
}
