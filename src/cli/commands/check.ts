/**
 * didfeed check -- poll every followed feed and print new verified posts.
 */

import { summarize } from "../../sdk/follow-engine.js";
import { createAgent, cliError, errorMessage, formatPost, requireStore } from "../helpers.js";

export async function checkCommand(): Promise<void> {
  const agent = createAgent();
  await requireStore(agent);

  try {
    const report = await agent.poll();
    for (const result of report.results) {
      for (const { cid, post } of result.ingested) {
        console.log(`--- ${result.label}`);
        console.log(formatPost(cid, post, true));
        console.log();
      }
    }
    console.log(summarize(report));
  } catch (err) {
    cliError(`Error checking feeds: ${errorMessage(err)}`);
  }
}
