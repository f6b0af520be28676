/**
 * didfeed whoami -- print the local DID (offline).
 */

import { createAgent, cliError, errorMessage } from "../helpers.js";

export async function whoamiCommand(): Promise<void> {
  let did: string | null;
  try {
    did = await createAgent().whoami();
  } catch (err) {
    cliError(`Error: ${errorMessage(err)}`);
  }
  if (did === null) {
    cliError("No identity found. Run `didfeed init` first.");
  }
  console.log(did);
}
