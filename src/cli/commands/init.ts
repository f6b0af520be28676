/**
 * didfeed init -- create the local identity.
 */

import { createAgent, cliError, errorMessage } from "../helpers.js";

export async function initCommand(options: { force?: boolean }): Promise<void> {
  const agent = createAgent();

  try {
    const existing = await agent.whoami();
    if (existing !== null && !options.force) {
      console.log("Identity already exists.");
      console.log(`DID: ${existing}`);
      console.log("Run `didfeed init --force` to replace it.");
      return;
    }

    const identity = await agent.init({ overwrite: options.force });
    console.log("Identity created.");
    console.log(`DID:       ${identity.did}`);
    console.log(`Feed name: ${agent.nameFor(identity.did)}`);
    console.log(`Stored in: ${agent.config.identityPath}`);
  } catch (err) {
    cliError(`Error: ${errorMessage(err)}`);
  }
}
